// ---------------------------------------------------------------------------
// Domain configuration
//
// Policy constants are read from SHIPFLOW_* environment variables:
//   SHIPFLOW_PICKUP_MAX_ATTEMPTS           pickup attempts before FAILED (default 3)
//   SHIPFLOW_DELIVERY_MAX_ATTEMPTS         delivery attempts before RETURNED (default 3)
//   SHIPFLOW_OVERDUE_GRACE_MINUTES         minutes after scheduledDate before overdue (default 120)
//   SHIPFLOW_AUTO_RESCHEDULE_REASONS       comma-separated failure reasons that reschedule automatically
//   SHIPFLOW_DELIVERY_WINDOW_START_HOUR    UTC hour the next delivery window opens (default 8)
//   SHIPFLOW_MAX_PENDING_EVENTS            undrained events allowed per aggregate (default 1000)
//   SHIPFLOW_ROUTE_AVERAGE_SPEED_KMH       speed used to estimate route duration (default 25)
//   SHIPFLOW_ROUTE_SERVICE_MINUTES         minutes spent at each stop (default 10)
//   SHIPFLOW_LOG_LEVEL                     debug | info | warn | error | silent (default info)
// ---------------------------------------------------------------------------

import { z } from 'zod'
import type { LogLevel } from './logger'
import { parseOrThrow } from './validation'

export const DEFAULT_AUTO_RESCHEDULE_REASONS: readonly string[] = [
  'customer_not_available',
  'address_not_found',
  'traffic_delay',
] as const

export interface DomainConfig {
  readonly pickupMaxAttempts: number
  readonly deliveryMaxAttempts: number
  readonly overdueGraceMinutes: number
  readonly autoRescheduleReasons: readonly string[]
  readonly deliveryWindowStartHour: number
  readonly maxPendingEventsPerAggregate: number
  readonly routeAverageSpeedKmh: number
  readonly routeServiceMinutesPerStop: number
  readonly logLevel: LogLevel
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent'])

const ReasonListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((r) => r.trim())
      .filter((r) => r !== ''),
  )

const EnvSchema = z.object({
  SHIPFLOW_PICKUP_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SHIPFLOW_DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SHIPFLOW_OVERDUE_GRACE_MINUTES: z.coerce.number().int().min(0).default(120),
  SHIPFLOW_AUTO_RESCHEDULE_REASONS: ReasonListSchema.optional(),
  SHIPFLOW_DELIVERY_WINDOW_START_HOUR: z.coerce.number().int().min(0).max(23).default(8),
  SHIPFLOW_MAX_PENDING_EVENTS: z.coerce.number().int().min(1).default(1000),
  SHIPFLOW_ROUTE_AVERAGE_SPEED_KMH: z.coerce.number().positive().default(25),
  SHIPFLOW_ROUTE_SERVICE_MINUTES: z.coerce.number().min(0).default(10),
  SHIPFLOW_LOG_LEVEL: LogLevelSchema.default('info'),
})

export const DEFAULT_CONFIG: DomainConfig = Object.freeze({
  pickupMaxAttempts: 3,
  deliveryMaxAttempts: 3,
  overdueGraceMinutes: 120,
  autoRescheduleReasons: DEFAULT_AUTO_RESCHEDULE_REASONS,
  deliveryWindowStartHour: 8,
  maxPendingEventsPerAggregate: 1000,
  routeAverageSpeedKmh: 25,
  routeServiceMinutesPerStop: 10,
  logLevel: 'info',
})

/**
 * Builds a DomainConfig from environment variables. Unset variables take
 * their defaults; empty strings count as unset.
 *
 * @throws {ValidationError} listing every invalid variable.
 */
export function loadDomainConfig(env: Readonly<Record<string, string | undefined>> = process.env): DomainConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('SHIPFLOW_') && value !== undefined && value !== ''),
  )
  const parsed = parseOrThrow(EnvSchema, present, 'configuration')
  return Object.freeze({
    pickupMaxAttempts: parsed.SHIPFLOW_PICKUP_MAX_ATTEMPTS,
    deliveryMaxAttempts: parsed.SHIPFLOW_DELIVERY_MAX_ATTEMPTS,
    overdueGraceMinutes: parsed.SHIPFLOW_OVERDUE_GRACE_MINUTES,
    autoRescheduleReasons: parsed.SHIPFLOW_AUTO_RESCHEDULE_REASONS ?? DEFAULT_AUTO_RESCHEDULE_REASONS,
    deliveryWindowStartHour: parsed.SHIPFLOW_DELIVERY_WINDOW_START_HOUR,
    maxPendingEventsPerAggregate: parsed.SHIPFLOW_MAX_PENDING_EVENTS,
    routeAverageSpeedKmh: parsed.SHIPFLOW_ROUTE_AVERAGE_SPEED_KMH,
    routeServiceMinutesPerStop: parsed.SHIPFLOW_ROUTE_SERVICE_MINUTES,
    logLevel: parsed.SHIPFLOW_LOG_LEVEL,
  })
}

/** Merges overrides onto the defaults, e.g. for tests. */
export function defineConfig(overrides: Partial<DomainConfig> = {}): DomainConfig {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides })
}
