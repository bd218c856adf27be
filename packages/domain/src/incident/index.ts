// ---------------------------------------------------------------------------
// Incident bounded context
// Exceptions raised against an in-flight shipment, and the bounded envelope
// of delivery attempts that decides between another try and a return.
// ---------------------------------------------------------------------------

import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { GuideId, IncidentId, RetryId } from '../identifiers/index'
import { InvalidStateTransitionError, RetryExhaustedError, ValidationError } from '../shared/errors'
import { addDays, addHours, hoursBetween, startOfDay } from '../shared/types'
import { parseOrThrow } from '../shared/validation'
import type { Transition } from '../events/index'
import { createEvent } from '../events/index'

// ---------------------------------------------------------------------------
// Incident value objects
// ---------------------------------------------------------------------------

export const INCIDENT_TYPES = [
  'DELIVERY_FAILED',
  'RECIPIENT_NOT_FOUND',
  'WRONG_ADDRESS',
  'PACKAGE_DAMAGED',
  'PACKAGE_LOST',
  'REFUSED_BY_RECIPIENT',
  'SECURITY_ISSUE',
  'WEATHER_DELAY',
  'VEHICLE_BREAKDOWN',
  'OTHER',
] as const

export type IncidentType = (typeof INCIDENT_TYPES)[number]

export const INCIDENT_SEVERITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const

export type IncidentSeverity = (typeof INCIDENT_SEVERITIES)[number]

/**
 * Lifecycle status of an Incident.
 *
 * Allowed transitions:
 *   REPORTED → IN_REVIEW → RESOLVED → CLOSED
 *   REPORTED | IN_REVIEW → ESCALATED → RESOLVED
 */
export type IncidentStatus = 'REPORTED' | 'IN_REVIEW' | 'ESCALATED' | 'RESOLVED' | 'CLOSED'

export const INCIDENT_STATUSES: readonly IncidentStatus[] = [
  'REPORTED',
  'IN_REVIEW',
  'ESCALATED',
  'RESOLVED',
  'CLOSED',
] as const

export const INCIDENT_TRANSITIONS: Readonly<Record<IncidentStatus, readonly IncidentStatus[]>> = {
  REPORTED: ['IN_REVIEW', 'ESCALATED'],
  IN_REVIEW: ['ESCALATED', 'RESOLVED'],
  ESCALATED: ['RESOLVED'],
  RESOLVED: ['CLOSED'],
  CLOSED: [],
}

export interface IncidentEvidence {
  readonly id: string
  /** photo, document or audio */
  readonly fileType: string
  readonly fileUrl: string
  readonly fileName: string
  readonly description: string
  readonly uploadedAt: Date
}

/**
 * @invariant `resolvedAt` is set iff status is RESOLVED or CLOSED.
 */
export interface Incident {
  readonly id: IncidentId
  readonly guideId: GuideId
  readonly type: IncidentType
  readonly severity: IncidentSeverity
  readonly status: IncidentStatus
  readonly title: string
  readonly description: string
  readonly location: string
  /** messenger, customer or system */
  readonly reportedBy: string
  readonly assignedTo?: string
  readonly evidence: readonly IncidentEvidence[]
  readonly resolutionNotes: string
  readonly reportedAt: Date
  readonly acknowledgedAt?: Date
  readonly resolvedAt?: Date
  readonly closedAt?: Date
  readonly updatedAt: Date
  readonly version: number
}

const required = z.string().trim().min(1, 'is required')

export const ReportIncidentInputSchema = z.object({
  type: z.enum(INCIDENT_TYPES),
  severity: z.enum(INCIDENT_SEVERITIES).default('MEDIUM'),
  title: required,
  description: z.string().default(''),
  location: z.string().default(''),
  reportedBy: required,
})

export type ReportIncidentInput = z.input<typeof ReportIncidentInputSchema>

export const EvidenceInputSchema = z.object({
  fileType: required,
  fileUrl: required,
  fileName: required,
  description: z.string().default(''),
})

export type EvidenceInput = z.input<typeof EvidenceInputSchema>

// ---------------------------------------------------------------------------
// Incident functions
// ---------------------------------------------------------------------------

const SEVERITY_RANK: Record<IncidentSeverity, number> = { LOW: 0, MEDIUM: 1, HIGH: 2, CRITICAL: 3 }

export function canIncidentTransition(current: IncidentStatus, next: IncidentStatus): boolean {
  return INCIDENT_TRANSITIONS[current].includes(next)
}

function assertIncident(incident: Incident, next: IncidentStatus, requested: string): void {
  if (!canIncidentTransition(incident.status, next)) {
    throw new InvalidStateTransitionError('Incident', incident.status, requested)
  }
}

function advanceIncident(incident: Incident, status: IncidentStatus, now: Date, patch: Partial<Incident> = {}): Incident {
  return { ...incident, ...patch, status, updatedAt: now, version: incident.version + 1 }
}

export function reportIncident(
  id: IncidentId,
  guideId: GuideId,
  input: ReportIncidentInput,
  now: Date,
): Transition<Incident, 'IncidentReported'> {
  const parsed = parseOrThrow(ReportIncidentInputSchema, input, 'incident')
  const incident: Incident = {
    id,
    guideId,
    type: parsed.type,
    severity: parsed.severity,
    status: 'REPORTED',
    title: parsed.title,
    description: parsed.description,
    location: parsed.location,
    reportedBy: parsed.reportedBy,
    evidence: [],
    resolutionNotes: '',
    reportedAt: now,
    updatedAt: now,
    version: 1,
  }
  return {
    state: incident,
    event: createEvent('IncidentReported', id, now, {
      guideId,
      status: incident.status,
      incidentType: incident.type,
      severity: incident.severity,
      title: incident.title,
      description: incident.description,
      location: incident.location,
      reportedBy: incident.reportedBy,
    }),
  }
}

/** REPORTED → IN_REVIEW, assigning the incident to `assignee`. */
export function acknowledgeIncident(
  incident: Incident,
  assignee: string,
  now: Date,
): Transition<Incident, 'IncidentAcknowledged'> {
  assertIncident(incident, 'IN_REVIEW', 'acknowledge')
  const next = advanceIncident(incident, 'IN_REVIEW', now, { assignedTo: assignee, acknowledgedAt: now })
  return {
    state: next,
    event: createEvent('IncidentAcknowledged', incident.id, now, {
      from: incident.status,
      to: next.status,
      assignedTo: assignee,
    }),
  }
}

/** REPORTED | IN_REVIEW → ESCALATED. Severity is raised to at least HIGH. */
export function escalateIncident(incident: Incident, reason: string, now: Date): Transition<Incident, 'IncidentEscalated'> {
  assertIncident(incident, 'ESCALATED', 'escalate')
  const severity: IncidentSeverity = SEVERITY_RANK[incident.severity] >= SEVERITY_RANK.HIGH ? incident.severity : 'HIGH'
  const next = advanceIncident(incident, 'ESCALATED', now, { severity })
  return {
    state: next,
    event: createEvent('IncidentEscalated', incident.id, now, {
      from: incident.status,
      to: next.status,
      reason,
      previousSeverity: incident.severity,
      severity,
    }),
  }
}

/** IN_REVIEW | ESCALATED → RESOLVED. */
export function resolveIncident(
  incident: Incident,
  resolutionNotes: string,
  now: Date,
): Transition<Incident, 'IncidentResolved'> {
  assertIncident(incident, 'RESOLVED', 'resolve')
  const next = advanceIncident(incident, 'RESOLVED', now, { resolutionNotes, resolvedAt: now })
  return {
    state: next,
    event: createEvent('IncidentResolved', incident.id, now, {
      from: incident.status,
      to: next.status,
      resolutionNotes,
      resolutionTimeHours: hoursBetween(incident.reportedAt, now),
    }),
  }
}

/** RESOLVED → CLOSED. */
export function closeIncident(incident: Incident, now: Date): Transition<Incident, 'IncidentClosed'> {
  assertIncident(incident, 'CLOSED', 'close')
  const next = advanceIncident(incident, 'CLOSED', now, { closedAt: now })
  return {
    state: next,
    event: createEvent('IncidentClosed', incident.id, now, { from: incident.status, to: next.status }),
  }
}

/** Attaches evidence to any incident that is not CLOSED. */
export function addIncidentEvidence(
  incident: Incident,
  input: EvidenceInput,
  now: Date,
): Transition<Incident, 'IncidentEvidenceAdded'> {
  if (incident.status === 'CLOSED') {
    throw new InvalidStateTransitionError('Incident', incident.status, 'add evidence to')
  }
  const parsed = parseOrThrow(EvidenceInputSchema, input, 'evidence')
  const evidence: IncidentEvidence = { id: randomUUID(), ...parsed, uploadedAt: now }
  const next = advanceIncident(incident, incident.status, now, { evidence: [...incident.evidence, evidence] })
  return {
    state: next,
    event: createEvent('IncidentEvidenceAdded', incident.id, now, {
      evidenceId: evidence.id,
      fileType: evidence.fileType,
      fileName: evidence.fileName,
    }),
  }
}

/** Statuses in which an incident still needs attention. */
export const ACTIVE_INCIDENT_STATUSES: readonly IncidentStatus[] = ['REPORTED', 'IN_REVIEW', 'ESCALATED'] as const

export function isIncidentActive(incident: Incident): boolean {
  return ACTIVE_INCIDENT_STATUSES.includes(incident.status)
}

/** Hours from report to resolution, or null while unresolved. */
export function resolutionTimeHours(incident: Incident): number | null {
  return incident.resolvedAt !== undefined ? hoursBetween(incident.reportedAt, incident.resolvedAt) : null
}

// ---------------------------------------------------------------------------
// Delivery retry
// ---------------------------------------------------------------------------

export type DeliveryOutcome = 'SUCCESS' | 'FAILED' | 'RESCHEDULED'

/** OPEN while attempts remain; every other status is terminal. */
export type RetryStatus = 'OPEN' | 'DELIVERED' | 'RETURNED' | 'ABANDONED'

/** One try at final delivery. Immutable once recorded. */
export interface DeliveryAttempt {
  readonly attemptNumber: number
  readonly outcome: DeliveryOutcome
  readonly failureReason?: string
  readonly notes: string
  readonly location: string
  readonly messengerId?: string
  readonly attemptedAt: Date
  /** Proposed start of the next attempt when the failure reschedules automatically. */
  readonly nextAttemptAt?: Date
}

/**
 * @invariant `attempts.length` ≤ `maxAttempts`.
 * @invariant attempt numbers run 1, 2, … without gaps.
 */
export interface DeliveryRetry {
  readonly id: RetryId
  readonly guideId: GuideId
  readonly maxAttempts: number
  readonly attempts: readonly DeliveryAttempt[]
  readonly status: RetryStatus
  readonly completedAt?: Date
  readonly createdAt: Date
  readonly updatedAt: Date
  readonly version: number
}

export interface DeliveryAttemptInput {
  readonly outcome: DeliveryOutcome
  readonly notes?: string
  readonly failureReason?: string
  readonly location?: string
  readonly messengerId?: string
}

export interface RetryPolicy {
  readonly autoRescheduleReasons: readonly string[]
  /** UTC hour at which the next day's delivery window opens. */
  readonly deliveryWindowStartHour: number
}

/** An empty retry envelope. It is first persisted together with its first attempt. */
export function openDeliveryRetry(id: RetryId, guideId: GuideId, maxAttempts: number, now: Date): DeliveryRetry {
  return { id, guideId, maxAttempts, attempts: [], status: 'OPEN', createdAt: now, updatedAt: now, version: 0 }
}

export function attemptsRemaining(retry: DeliveryRetry): number {
  return retry.status === 'OPEN' ? Math.max(0, retry.maxAttempts - retry.attempts.length) : 0
}

/** Start of the delivery window on the UTC day after `now`. */
export function nextDeliveryWindow(now: Date, startHour: number): Date {
  return addHours(startOfDay(addDays(now, 1)), startHour)
}

export function isAutoRescheduleReason(reason: string | undefined, policy: RetryPolicy): boolean {
  return reason !== undefined && policy.autoRescheduleReasons.includes(reason)
}

/**
 * Appends one attempt. SUCCESS closes the retry DELIVERED; a failure on the
 * last allowed attempt closes it RETURNED; any other failure leaves it OPEN,
 * with a proposed `nextAttemptAt` when the reason reschedules automatically.
 *
 * @throws {RetryExhaustedError} when the retry is closed or out of attempts;
 *         nothing is appended.
 * @throws {ValidationError} when a FAILED attempt has no reason.
 */
export function recordDeliveryAttempt(
  retry: DeliveryRetry,
  input: DeliveryAttemptInput,
  policy: RetryPolicy,
  now: Date,
): Transition<DeliveryRetry, 'DeliveryAttemptRecorded'> {
  if (attemptsRemaining(retry) === 0) {
    throw new RetryExhaustedError('DeliveryRetry', retry.guideId, retry.maxAttempts)
  }
  const failureReason = input.failureReason?.trim()
  if (input.outcome === 'FAILED' && (failureReason === undefined || failureReason === '')) {
    throw new ValidationError('Invalid delivery attempt: failureReason is required', ['failureReason: is required'])
  }

  const attemptNumber = retry.attempts.length + 1
  const failed = input.outcome !== 'SUCCESS'
  const exhausted = failed && attemptNumber >= retry.maxAttempts
  const autoReschedule =
    failed && !exhausted && (input.outcome === 'RESCHEDULED' || isAutoRescheduleReason(failureReason, policy))
  const nextAttemptAt = autoReschedule ? nextDeliveryWindow(now, policy.deliveryWindowStartHour) : undefined

  const attempt: DeliveryAttempt = {
    attemptNumber,
    outcome: input.outcome,
    ...(failureReason !== undefined && failureReason !== '' ? { failureReason } : {}),
    notes: input.notes ?? '',
    location: input.location ?? '',
    ...(input.messengerId !== undefined ? { messengerId: input.messengerId } : {}),
    attemptedAt: now,
    ...(nextAttemptAt !== undefined ? { nextAttemptAt } : {}),
  }
  const status: RetryStatus = !failed ? 'DELIVERED' : exhausted ? 'RETURNED' : 'OPEN'
  const next: DeliveryRetry = {
    ...retry,
    attempts: [...retry.attempts, attempt],
    status,
    ...(status !== 'OPEN' ? { completedAt: now } : {}),
    updatedAt: now,
    version: retry.version + 1,
  }
  return {
    state: next,
    event: createEvent('DeliveryAttemptRecorded', retry.id, now, {
      from: retry.status,
      to: status,
      guideId: retry.guideId,
      attemptNumber,
      outcome: input.outcome,
      failureReason: attempt.failureReason ?? null,
      autoReschedule,
      nextAttemptAt: nextAttemptAt ?? null,
      attemptsRemaining: attemptsRemaining(next),
    }),
  }
}

/** OPEN → ABANDONED. */
export function abandonDeliveryRetry(
  retry: DeliveryRetry,
  reason: string,
  now: Date,
): Transition<DeliveryRetry, 'DeliveryRetryAbandoned'> {
  if (retry.status !== 'OPEN') {
    throw new InvalidStateTransitionError('DeliveryRetry', retry.status, 'abandon')
  }
  const next: DeliveryRetry = {
    ...retry,
    status: 'ABANDONED',
    completedAt: now,
    updatedAt: now,
    version: retry.version + 1,
  }
  return {
    state: next,
    event: createEvent('DeliveryRetryAbandoned', retry.id, now, {
      from: retry.status,
      to: next.status,
      guideId: retry.guideId,
      reason,
    }),
  }
}
