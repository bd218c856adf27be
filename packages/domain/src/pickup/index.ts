// ---------------------------------------------------------------------------
// Pickup bounded context
// Owns the collection of a parcel from the customer: the pickup request's
// lifecycle, its attempts, and the time slots operators publish.
// ---------------------------------------------------------------------------

import { z } from 'zod'
import type { CustomerId, GuideId, OperatorId, PickupId, PointId, TimeSlotId } from '../identifiers/index'
import { toCustomerId, toGuideId } from '../identifiers/index'
import {
  InvalidPickupTypeError,
  InvalidStateTransitionError,
  RetryExhaustedError,
  ValidationError,
} from '../shared/errors'
import type { GeoPoint } from '../shared/types'
import { addHours, addMinutes, isSameDay } from '../shared/types'
import { parseOrThrow } from '../shared/validation'
import type { Transition } from '../events/index'
import { createEvent } from '../events/index'

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of a PickupRequest.
 *
 * Allowed transitions:
 *   SCHEDULED → CONFIRMED → IN_PROGRESS → COMPLETED
 *   IN_PROGRESS → RESCHEDULED → CONFIRMED          (failed attempt, then a new slot)
 *   IN_PROGRESS → FAILED                           (last allowed attempt failed)
 *   CONFIRMED → CONFIRMED                          (reschedule to another slot)
 *   SCHEDULED | CONFIRMED | IN_PROGRESS | RESCHEDULED → CANCELLED
 */
export type PickupStatus =
  | 'SCHEDULED'
  | 'CONFIRMED'
  | 'IN_PROGRESS'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED'
  | 'RESCHEDULED'

export const PICKUP_STATUSES: readonly PickupStatus[] = [
  'SCHEDULED',
  'CONFIRMED',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'RESCHEDULED',
] as const

export const PICKUP_TRANSITIONS: Readonly<Record<PickupStatus, readonly PickupStatus[]>> = {
  SCHEDULED: ['CONFIRMED', 'CANCELLED'],
  CONFIRMED: ['IN_PROGRESS', 'CONFIRMED', 'CANCELLED'],
  IN_PROGRESS: ['COMPLETED', 'RESCHEDULED', 'FAILED', 'CANCELLED'],
  RESCHEDULED: ['CONFIRMED', 'CANCELLED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
}

/**
 * POINT_DELIVERY: the customer drops the parcel at a logistics point.
 * DIRECT_PICKUP: a courier collects at the customer's address.
 * SCHEDULED_PICKUP: a courier collects at an agreed appointment.
 */
export type PickupType = 'POINT_DELIVERY' | 'DIRECT_PICKUP' | 'SCHEDULED_PICKUP'

export const PICKUP_PRIORITIES = ['URGENT', 'HIGH', 'NORMAL', 'LOW'] as const

export type PickupPriority = (typeof PICKUP_PRIORITIES)[number]

/** Lower rank is served first. */
export const PRIORITY_RANK: Readonly<Record<PickupPriority, number>> = { URGENT: 0, HIGH: 1, NORMAL: 2, LOW: 3 }

export type CustomerTier = 'SMALL' | 'MEDIUM' | 'LARGE'

export type TimePreference = 'MORNING' | 'AFTERNOON' | 'ANY'

/**
 * A capacity-bounded window one operator publishes for pickups. Usage is not
 * stored here: the CapacityLedger owns it.
 */
export interface PickupTimeSlot {
  readonly id: TimeSlotId
  readonly operatorId: OperatorId
  readonly startTime: Date
  readonly endTime: Date
  readonly isAvailable: boolean
  readonly maxPickups: number
}

/** The slot a pickup is booked on, as copied onto the pickup. */
export interface SlotBooking {
  readonly slotId: TimeSlotId
  readonly startTime: Date
  readonly endTime: Date
}

export interface PickupAttempt {
  readonly attemptNumber: number
  readonly outcome: 'SUCCESS' | 'FAILED'
  readonly operatorId: OperatorId
  readonly notes: string
  readonly failureReason?: string
  readonly evidence: readonly string[]
  readonly attemptedAt: Date
}

export interface PickupCancellation {
  readonly reason: string
  readonly cancelledBy: string
  readonly at: Date
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/**
 * The PickupRequest aggregate root.
 *
 * @invariant `attempts.length` ≤ `maxAttempts`.
 * @invariant POINT_DELIVERY requests never hold a time slot.
 * @invariant `timeSlot` and `assignedOperatorId` are set whenever a DIRECT or
 *            SCHEDULED request is CONFIRMED or later.
 */
export interface PickupRequest {
  readonly id: PickupId
  readonly guideId: GuideId
  readonly customerId: CustomerId
  readonly type: PickupType
  readonly status: PickupStatus
  readonly priority: PickupPriority
  readonly pickupAddress: string
  readonly location?: GeoPoint
  readonly contactName: string
  readonly contactPhone: string
  readonly preferredDate?: Date
  readonly scheduledDate?: Date
  readonly timeSlot?: SlotBooking
  readonly assignedOperatorId?: OperatorId
  readonly assignedPointId?: PointId
  readonly attempts: readonly PickupAttempt[]
  readonly maxAttempts: number
  readonly specialInstructions: string
  readonly estimatedPackages: number
  readonly totalWeightKg?: number
  readonly packagesCollected?: number
  readonly completedAt?: Date
  readonly cancellation?: PickupCancellation
  readonly createdAt: Date
  readonly updatedAt: Date
  readonly version: number
}

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

const required = z.string().trim().min(1, 'is required')

export const PickupRequestInputSchema = z.object({
  guideId: required,
  customerId: required,
  customerTier: z.enum(['SMALL', 'MEDIUM', 'LARGE']),
  pickupAddress: required,
  contactName: required,
  contactPhone: required,
  location: z.object({ lat: z.number().min(-90).max(90), lng: z.number().min(-180).max(180) }).optional(),
  preferredDate: z.date().optional(),
  specialInstructions: z.string().default(''),
  estimatedPackages: z.number().int().positive().default(1),
  totalWeightKg: z.number().positive().optional(),
})

export type PickupRequestInput = z.input<typeof PickupRequestInputSchema>

// ---------------------------------------------------------------------------
// Policy functions
// ---------------------------------------------------------------------------

/** Small customers drop parcels at a point; everyone else is collected. */
export function derivePickupType(tier: CustomerTier): PickupType {
  return tier === 'SMALL' ? 'POINT_DELIVERY' : 'DIRECT_PICKUP'
}

const URGENT_WINDOW_HOURS = 4

export function derivePickupPriority(tier: CustomerTier, preferredDate: Date | undefined, now: Date): PickupPriority {
  if (tier === 'LARGE') return 'HIGH'
  if (tier === 'MEDIUM') return 'NORMAL'
  return preferredDate !== undefined && preferredDate <= addHours(now, URGENT_WINDOW_HOURS) ? 'HIGH' : 'NORMAL'
}

export function matchesTimePreference(slot: PickupTimeSlot, preference: TimePreference): boolean {
  const hour = slot.startTime.getUTCHours()
  switch (preference) {
    case 'MORNING':
      return hour < 12
    case 'AFTERNOON':
      return hour >= 12 && hour < 18
    case 'ANY':
      return true
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function canPickupTransition(current: PickupStatus, next: PickupStatus): boolean {
  return PICKUP_TRANSITIONS[current].includes(next)
}

export function isPickupTerminal(status: PickupStatus): boolean {
  return PICKUP_TRANSITIONS[status].length === 0
}

export function canBeRescheduled(pickup: PickupRequest): boolean {
  return pickup.attempts.length < pickup.maxAttempts && pickup.status !== 'COMPLETED' && pickup.status !== 'CANCELLED'
}

export const DEFAULT_OVERDUE_GRACE_MINUTES = 120

/** True once `now` is past the scheduled date plus the grace period while the pickup is still open. */
export function isOverdue(pickup: PickupRequest, now: Date, graceMinutes: number = DEFAULT_OVERDUE_GRACE_MINUTES): boolean {
  if (pickup.scheduledDate === undefined) return false
  if (pickup.status !== 'CONFIRMED' && pickup.status !== 'IN_PROGRESS') return false
  return now > addMinutes(pickup.scheduledDate, graceMinutes)
}

export interface PickupSummary {
  readonly pickupId: PickupId
  readonly guideId: GuideId
  readonly status: PickupStatus
  readonly pickupType: PickupType
  readonly pickupAddress: string
  readonly contactName: string
  readonly scheduledDate: Date | null
  readonly timeSlotId: TimeSlotId | null
  readonly assignedOperatorId: OperatorId | null
  readonly assignedPointId: PointId | null
  readonly attemptsCount: number
  readonly maxAttempts: number
  readonly priority: PickupPriority
  readonly isOverdue: boolean
  readonly canBeRescheduled: boolean
  readonly completedAt: Date | null
  readonly specialInstructions: string
  readonly estimatedPackages: number
  readonly totalWeightKg: number | null
}

export function getPickupSummary(
  pickup: PickupRequest,
  now: Date,
  graceMinutes: number = DEFAULT_OVERDUE_GRACE_MINUTES,
): PickupSummary {
  return {
    pickupId: pickup.id,
    guideId: pickup.guideId,
    status: pickup.status,
    pickupType: pickup.type,
    pickupAddress: pickup.pickupAddress,
    contactName: pickup.contactName,
    scheduledDate: pickup.scheduledDate ?? null,
    timeSlotId: pickup.timeSlot?.slotId ?? null,
    assignedOperatorId: pickup.assignedOperatorId ?? null,
    assignedPointId: pickup.assignedPointId ?? null,
    attemptsCount: pickup.attempts.length,
    maxAttempts: pickup.maxAttempts,
    priority: pickup.priority,
    isOverdue: isOverdue(pickup, now, graceMinutes),
    canBeRescheduled: canBeRescheduled(pickup),
    completedAt: pickup.completedAt ?? null,
    specialInstructions: pickup.specialInstructions,
    estimatedPackages: pickup.estimatedPackages,
    totalWeightKg: pickup.totalWeightKg ?? null,
  }
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

function assertPickup(pickup: PickupRequest, next: PickupStatus, requested: string, reason?: string): void {
  if (!canPickupTransition(pickup.status, next)) {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, requested, reason)
  }
}

function assertCollectable(pickup: PickupRequest, operation: string): void {
  if (pickup.type === 'POINT_DELIVERY') {
    throw new InvalidPickupTypeError(pickup.id, pickup.type, operation)
  }
}

function assertAssignedOperator(pickup: PickupRequest, operatorId: OperatorId, requested: string): void {
  if (pickup.assignedOperatorId !== undefined && pickup.assignedOperatorId !== operatorId) {
    throw new InvalidStateTransitionError(
      'PickupRequest',
      pickup.status,
      requested,
      `assigned to operator ${pickup.assignedOperatorId}, not ${operatorId}`,
    )
  }
}

function booking(slot: PickupTimeSlot): SlotBooking {
  return { slotId: slot.id, startTime: slot.startTime, endTime: slot.endTime }
}

function assertSlotFor(date: Date, slot: PickupTimeSlot, operatorId: OperatorId): void {
  const issues: string[] = []
  if (slot.operatorId !== operatorId) issues.push(`slot: belongs to operator ${slot.operatorId}`)
  if (!isSameDay(date, slot.startTime)) issues.push('date: must fall on the day of the slot')
  if (issues.length > 0) throw new ValidationError(`Invalid slot booking: ${issues.join('; ')}`, issues)
}

function advance(pickup: PickupRequest, status: PickupStatus, now: Date, patch: Partial<PickupRequest> = {}): PickupRequest {
  return { ...pickup, ...patch, status, updatedAt: now, version: pickup.version + 1 }
}

export function requestPickup(
  id: PickupId,
  input: PickupRequestInput,
  maxAttempts: number,
  now: Date,
): Transition<PickupRequest, 'PickupRequested'> {
  const parsed = parseOrThrow(PickupRequestInputSchema, input, 'pickup request')
  const pickup: PickupRequest = {
    id,
    guideId: toGuideId(parsed.guideId),
    customerId: toCustomerId(parsed.customerId),
    type: derivePickupType(parsed.customerTier),
    status: 'SCHEDULED',
    priority: derivePickupPriority(parsed.customerTier, parsed.preferredDate, now),
    pickupAddress: parsed.pickupAddress,
    ...(parsed.location !== undefined ? { location: parsed.location } : {}),
    contactName: parsed.contactName,
    contactPhone: parsed.contactPhone,
    ...(parsed.preferredDate !== undefined ? { preferredDate: parsed.preferredDate } : {}),
    attempts: [],
    maxAttempts,
    specialInstructions: parsed.specialInstructions,
    estimatedPackages: parsed.estimatedPackages,
    ...(parsed.totalWeightKg !== undefined ? { totalWeightKg: parsed.totalWeightKg } : {}),
    createdAt: now,
    updatedAt: now,
    version: 1,
  }
  return {
    state: pickup,
    event: createEvent('PickupRequested', id, now, {
      guideId: pickup.guideId,
      customerId: pickup.customerId,
      status: pickup.status,
      pickupType: pickup.type,
      pickupAddress: pickup.pickupAddress,
      preferredDate: pickup.preferredDate ?? null,
      priority: pickup.priority,
    }),
  }
}

export interface ScheduleRequest {
  readonly date: Date
  readonly slot: PickupTimeSlot
  readonly operatorId: OperatorId
}

/**
 * SCHEDULED | RESCHEDULED → CONFIRMED on the given slot. Capacity is the
 * scheduler's concern; this only checks the request itself.
 */
export function schedulePickup(
  pickup: PickupRequest,
  request: ScheduleRequest,
  now: Date,
): Transition<PickupRequest, 'PickupScheduled'> {
  if (pickup.status !== 'SCHEDULED' && pickup.status !== 'RESCHEDULED') {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'schedule')
  }
  assertCollectable(pickup, 'schedule')
  assertSlotFor(request.date, request.slot, request.operatorId)
  const next = advance(pickup, 'CONFIRMED', now, {
    scheduledDate: request.date,
    timeSlot: booking(request.slot),
    assignedOperatorId: request.operatorId,
  })
  return {
    state: next,
    event: createEvent('PickupScheduled', pickup.id, now, {
      from: pickup.status,
      to: next.status,
      scheduledDate: request.date,
      operatorId: request.operatorId,
      timeSlotId: request.slot.id,
      timeSlotStart: request.slot.startTime,
      timeSlotEnd: request.slot.endTime,
      releasedTimeSlotId: pickup.timeSlot?.slotId ?? null,
    }),
  }
}

/** SCHEDULED | RESCHEDULED → CONFIRMED at a logistics point. No slot capacity is involved. */
export function assignPickupToPoint(
  pickup: PickupRequest,
  pointId: PointId,
  now: Date,
): Transition<PickupRequest, 'PickupAssignedToPoint'> {
  if (pickup.type !== 'POINT_DELIVERY') {
    throw new InvalidPickupTypeError(pickup.id, pickup.type, 'assignment to a point')
  }
  if (pickup.status !== 'SCHEDULED' && pickup.status !== 'RESCHEDULED') {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'assign to point')
  }
  const next = advance(pickup, 'CONFIRMED', now, { assignedPointId: pointId })
  return {
    state: next,
    event: createEvent('PickupAssignedToPoint', pickup.id, now, { from: pickup.status, to: next.status, pointId }),
  }
}

/** CONFIRMED → IN_PROGRESS. A point pickup takes the starting operator. */
export function startPickup(
  pickup: PickupRequest,
  operatorId: OperatorId,
  now: Date,
): Transition<PickupRequest, 'PickupStarted'> {
  assertPickup(pickup, 'IN_PROGRESS', 'start')
  assertAssignedOperator(pickup, operatorId, 'start')
  const next = advance(pickup, 'IN_PROGRESS', now, { assignedOperatorId: operatorId })
  return {
    state: next,
    event: createEvent('PickupStarted', pickup.id, now, { from: pickup.status, to: next.status, operatorId }),
  }
}

export interface AttemptReport {
  readonly operatorId: OperatorId
  readonly notes: string
  readonly evidence?: readonly string[]
}

/** IN_PROGRESS → COMPLETED with a successful attempt. */
export function completePickup(
  pickup: PickupRequest,
  report: AttemptReport & { readonly packagesCollected?: number },
  now: Date,
): Transition<PickupRequest, 'PickupCompleted'> {
  assertPickup(pickup, 'COMPLETED', 'complete')
  assertAssignedOperator(pickup, report.operatorId, 'complete')
  const packagesCollected = report.packagesCollected ?? pickup.estimatedPackages
  if (!Number.isInteger(packagesCollected) || packagesCollected < 1) {
    throw new ValidationError('Invalid completion: packagesCollected must be a positive integer', [
      'packagesCollected: must be a positive integer',
    ])
  }
  const attempt: PickupAttempt = {
    attemptNumber: pickup.attempts.length + 1,
    outcome: 'SUCCESS',
    operatorId: report.operatorId,
    notes: report.notes,
    evidence: report.evidence ?? [],
    attemptedAt: now,
  }
  const next = advance(pickup, 'COMPLETED', now, {
    attempts: [...pickup.attempts, attempt],
    completedAt: now,
    packagesCollected,
  })
  return {
    state: next,
    event: createEvent('PickupCompleted', pickup.id, now, {
      from: pickup.status,
      to: next.status,
      guideId: pickup.guideId,
      operatorId: report.operatorId,
      completedAt: now,
      packagesCollected,
      notes: report.notes,
    }),
  }
}

/**
 * IN_PROGRESS → RESCHEDULED, or FAILED when this was the last allowed
 * attempt. `autoReschedule` in the event is true when `reason` is in
 * `autoRescheduleReasons` and attempts remain.
 *
 * @throws {RetryExhaustedError} when every attempt is already used; nothing
 *         is appended.
 */
export function failPickup(
  pickup: PickupRequest,
  report: AttemptReport & { readonly reason: string },
  autoRescheduleReasons: readonly string[],
  now: Date,
): Transition<PickupRequest, 'PickupFailed'> {
  if (pickup.attempts.length >= pickup.maxAttempts) {
    throw new RetryExhaustedError('PickupRequest', pickup.id, pickup.maxAttempts)
  }
  if (pickup.status !== 'IN_PROGRESS') {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'fail')
  }
  assertAssignedOperator(pickup, report.operatorId, 'fail')
  const reason = report.reason.trim()
  if (reason === '') {
    throw new ValidationError('Invalid failure: reason is required', ['reason: is required'])
  }
  const attempt: PickupAttempt = {
    attemptNumber: pickup.attempts.length + 1,
    outcome: 'FAILED',
    operatorId: report.operatorId,
    notes: report.notes,
    failureReason: reason,
    evidence: report.evidence ?? [],
    attemptedAt: now,
  }
  const status: PickupStatus = attempt.attemptNumber >= pickup.maxAttempts ? 'FAILED' : 'RESCHEDULED'
  const next = advance(pickup, status, now, { attempts: [...pickup.attempts, attempt] })
  return {
    state: next,
    event: createEvent('PickupFailed', pickup.id, now, {
      from: pickup.status,
      to: status,
      guideId: pickup.guideId,
      operatorId: report.operatorId,
      failureReason: reason,
      attemptNumber: attempt.attemptNumber,
      autoReschedule: status === 'RESCHEDULED' && autoRescheduleReasons.includes(reason),
    }),
  }
}

export interface RescheduleRequest extends ScheduleRequest {
  readonly reason: string
  readonly automatic?: boolean
}

/**
 * CONFIRMED | RESCHEDULED → CONFIRMED on a new slot.
 *
 * @throws {RetryExhaustedError} when no attempts remain.
 */
export function reschedulePickup(
  pickup: PickupRequest,
  request: RescheduleRequest,
  now: Date,
): Transition<PickupRequest, 'PickupRescheduled'> {
  if (pickup.attempts.length >= pickup.maxAttempts) {
    throw new RetryExhaustedError('PickupRequest', pickup.id, pickup.maxAttempts)
  }
  if (pickup.status !== 'CONFIRMED' && pickup.status !== 'RESCHEDULED') {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'reschedule')
  }
  assertCollectable(pickup, 'reschedule')
  assertSlotFor(request.date, request.slot, request.operatorId)
  const next = advance(pickup, 'CONFIRMED', now, {
    scheduledDate: request.date,
    timeSlot: booking(request.slot),
    assignedOperatorId: request.operatorId,
  })
  return {
    state: next,
    event: createEvent('PickupRescheduled', pickup.id, now, {
      from: pickup.status,
      to: next.status,
      previousDate: pickup.scheduledDate ?? null,
      newDate: request.date,
      reason: request.reason,
      previousTimeSlotId: pickup.timeSlot?.slotId ?? null,
      newTimeSlotId: request.slot.id,
      operatorId: request.operatorId,
      automatic: request.automatic ?? false,
    }),
  }
}

/**
 * Any non-terminal state → CANCELLED. `releasedSlot` is the slot whose
 * reservation the caller released, if any.
 */
export function cancelPickup(
  pickup: PickupRequest,
  reason: string,
  cancelledBy: string,
  releasedSlot: TimeSlotId | null,
  now: Date,
): Transition<PickupRequest, 'PickupCancelled'> {
  assertPickup(pickup, 'CANCELLED', 'cancel')
  const next = advance(pickup, 'CANCELLED', now, { cancellation: { reason, cancelledBy, at: now } })
  return {
    state: next,
    event: createEvent('PickupCancelled', pickup.id, now, {
      from: pickup.status,
      to: next.status,
      guideId: pickup.guideId,
      reason,
      cancelledBy,
      releasedTimeSlotId: releasedSlot,
    }),
  }
}

export function setPickupPriority(
  pickup: PickupRequest,
  priority: PickupPriority,
  now: Date,
): Transition<PickupRequest, 'PickupPriorityChanged'> {
  if (isPickupTerminal(pickup.status)) {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'change priority of')
  }
  const next: PickupRequest = { ...pickup, priority, updatedAt: now, version: pickup.version + 1 }
  return {
    state: next,
    event: createEvent('PickupPriorityChanged', pickup.id, now, { from: pickup.priority, to: priority }),
  }
}

export interface PackageDetails {
  readonly estimatedPackages: number
  readonly totalWeightKg: number
}

/**
 * Replaces the expected package count and weight on a pickup that is still
 * open.
 *
 * @throws {ValidationError} unless the count is a positive integer and the
 *         weight is positive.
 */
export function setPickupPackageDetails(
  pickup: PickupRequest,
  details: PackageDetails,
  now: Date,
): Transition<PickupRequest, 'PickupPackageDetailsChanged'> {
  if (isPickupTerminal(pickup.status)) {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'change package details of')
  }
  const issues: string[] = []
  if (!Number.isInteger(details.estimatedPackages) || details.estimatedPackages < 1) {
    issues.push('estimatedPackages: must be a positive integer')
  }
  if (!Number.isFinite(details.totalWeightKg) || details.totalWeightKg <= 0) {
    issues.push('totalWeightKg: must be positive')
  }
  if (issues.length > 0) throw new ValidationError(`Invalid package details: ${issues.join('; ')}`, issues)

  const next: PickupRequest = {
    ...pickup,
    estimatedPackages: details.estimatedPackages,
    totalWeightKg: details.totalWeightKg,
    updatedAt: now,
    version: pickup.version + 1,
  }
  return {
    state: next,
    event: createEvent('PickupPackageDetailsChanged', pickup.id, now, {
      previousEstimatedPackages: pickup.estimatedPackages,
      estimatedPackages: details.estimatedPackages,
      previousTotalWeightKg: pickup.totalWeightKg ?? null,
      totalWeightKg: details.totalWeightKg,
    }),
  }
}

/** Replaces the courier instructions on a pickup that is still open. */
export function setPickupSpecialInstructions(
  pickup: PickupRequest,
  instructions: string,
  now: Date,
): Transition<PickupRequest, 'PickupInstructionsChanged'> {
  if (isPickupTerminal(pickup.status)) {
    throw new InvalidStateTransitionError('PickupRequest', pickup.status, 'change instructions of')
  }
  const specialInstructions = instructions.trim()
  const next: PickupRequest = { ...pickup, specialInstructions, updatedAt: now, version: pickup.version + 1 }
  return {
    state: next,
    event: createEvent('PickupInstructionsChanged', pickup.id, now, {
      previous: pickup.specialInstructions,
      specialInstructions,
    }),
  }
}
