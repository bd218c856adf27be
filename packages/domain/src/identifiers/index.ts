// ---------------------------------------------------------------------------
// Identifier types
// Opaque, validated identifiers for every aggregate and external party.
// ---------------------------------------------------------------------------

import { randomInt, randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { Brand } from '../shared/types'
import { parseOrThrow } from '../shared/validation'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies an Order aggregate. */
export type OrderId = Brand<string, 'OrderId'>

/** Uniquely identifies a Guide (waybill) and the Shipment it belongs to. */
export type GuideId = Brand<string, 'GuideId'>

/** Identifies the customer who owns orders and pickups. */
export type CustomerId = Brand<string, 'CustomerId'>

/** Uniquely identifies a PickupRequest. */
export type PickupId = Brand<string, 'PickupId'>

/** Identifies a logistics operator (courier or messenger). */
export type OperatorId = Brand<string, 'OperatorId'>

/** Uniquely identifies a PickupRoute. */
export type RouteId = Brand<string, 'RouteId'>

/** Uniquely identifies an Incident. */
export type IncidentId = Brand<string, 'IncidentId'>

/** Uniquely identifies a DeliveryRetry envelope. */
export type RetryId = Brand<string, 'RetryId'>

/** Identifies a PickupTimeSlot published by the capacity provider. */
export type TimeSlotId = Brand<string, 'TimeSlotId'>

/** Identifies a logistics point where small customers drop parcels off. */
export type PointId = Brand<string, 'PointId'>

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const IdSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .max(64, 'must be at most 64 characters')
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.:-]*$/, 'may only contain letters, digits, "_", ".", ":" and "-"')

const GuideIdSchema = z.string().regex(/^GU\d{9}$/, 'must look like GU followed by 9 digits')

function parseId(raw: string, kind: string): string {
  return parseOrThrow(IdSchema, raw, kind)
}

// ---------------------------------------------------------------------------
// Factory helpers (the only place we use `as` casts)
// ---------------------------------------------------------------------------

export const toOrderId = (raw: string): OrderId => parseId(raw, 'OrderId') as OrderId
export const toGuideId = (raw: string): GuideId => parseOrThrow(GuideIdSchema, raw, 'GuideId') as GuideId
export const toCustomerId = (raw: string): CustomerId => parseId(raw, 'CustomerId') as CustomerId
export const toPickupId = (raw: string): PickupId => parseId(raw, 'PickupId') as PickupId
export const toOperatorId = (raw: string): OperatorId => parseId(raw, 'OperatorId') as OperatorId
export const toRouteId = (raw: string): RouteId => parseId(raw, 'RouteId') as RouteId
export const toIncidentId = (raw: string): IncidentId => parseId(raw, 'IncidentId') as IncidentId
export const toRetryId = (raw: string): RetryId => parseId(raw, 'RetryId') as RetryId
export const toTimeSlotId = (raw: string): TimeSlotId => parseId(raw, 'TimeSlotId') as TimeSlotId
export const toPointId = (raw: string): PointId => parseId(raw, 'PointId') as PointId

// ---------------------------------------------------------------------------
// Generators
// ---------------------------------------------------------------------------

export const newOrderId = (): OrderId => toOrderId(randomUUID())
export const newPickupId = (): PickupId => toPickupId(randomUUID())
export const newIncidentId = (): IncidentId => toIncidentId(randomUUID())
export const newRetryId = (): RetryId => toRetryId(randomUUID())

/**
 * Guide numbers are printed on labels: `GU`, the two-digit year, then seven
 * random digits, e.g. `GU260482913`.
 */
export function newGuideId(at: Date = new Date(), digit: () => number = () => randomInt(10)): GuideId {
  const year = String(at.getUTCFullYear() % 100).padStart(2, '0')
  const serial = Array.from({ length: 7 }, () => String(digit())).join('')
  return toGuideId(`GU${year}${serial}`)
}
