import type { OperatorId, PickupId, PointId } from '../identifiers/index'
import { newPickupId } from '../identifiers/index'
import type { ClockSource } from '../shared/clock'
import type { DomainConfig } from '../shared/config'
import { CapacityExhaustedError, isDomainError } from '../shared/errors'
import type { Logger } from '../shared/logger'
import { errorToLog } from '../shared/logger'
import type { DateRange } from '../shared/types'
import { addDays, dayRange, hoursBetween, startOfDay, toDayKey } from '../shared/types'
import type { Transition } from '../events/index'
import type { EventPublisher } from '../events/publisher'
import type { CapacityProvider, PickupStore, RouteStore, ShipmentStore } from '../ports/index'
import { findOrThrow } from '../ports/index'
import { belongsOnRoute, isRouteActive, removePickupFromRoute } from '../routing/index'
import type { CapacityLedger, ReservationRequest, SlotUsage } from './capacity'
import type {
  PackageDetails,
  PickupPriority,
  PickupStatus,
  PickupRequest,
  PickupRequestInput,
  PickupSummary,
  PickupTimeSlot,
  TimePreference,
} from './index'
import {
  assignPickupToPoint,
  cancelPickup,
  completePickup,
  failPickup,
  getPickupSummary,
  matchesTimePreference,
  requestPickup,
  reschedulePickup,
  schedulePickup,
  setPickupPackageDetails,
  setPickupPriority,
  setPickupSpecialInstructions,
  startPickup,
} from './index'

export interface PickupSchedulerDeps {
  readonly pickups: PickupStore
  readonly shipments: ShipmentStore
  readonly routes: RouteStore
  readonly capacity: CapacityProvider
  readonly ledger: CapacityLedger
  readonly publisher: EventPublisher
  readonly clock: ClockSource
  readonly logger: Logger
  readonly config: Pick<DomainConfig, 'pickupMaxAttempts' | 'autoRescheduleReasons' | 'overdueGraceMinutes'>
  readonly newPickupId?: () => PickupId
}

export interface PickupOutcomeReport {
  readonly operatorId: OperatorId
  readonly notes?: string
  readonly evidence?: readonly string[]
}

export interface PickupMetrics {
  readonly totalPickups: number
  readonly completedPickups: number
  readonly failedPickups: number
  /** Fraction in [0, 1]; 0 when there are no pickups. */
  readonly successRate: number
  readonly failureRate: number
  /** Mean of completedAt − scheduledDate over completed pickups; 0 when none. */
  readonly averageCompletionHours: number
}

const ACTIVE_ON_DAY = new Set(['CONFIRMED', 'IN_PROGRESS'])

/** Statuses whose persisted slot still consumes capacity. */
const HOLDING_STATUSES: readonly PickupStatus[] = ['CONFIRMED', 'IN_PROGRESS', 'RESCHEDULED', 'COMPLETED', 'FAILED']

/**
 * Allocates pickups to time slots and operator days and drives each
 * PickupRequest through its lifecycle.
 *
 * Capacity changes are staged on the CapacityLedger right before the pickup
 * is saved and committed once the save resolves. While staged, both the old
 * and the new reservation count as used, so a rejected save never has to
 * take a seat back from someone else.
 */
export class PickupScheduler {
  constructor(private readonly deps: PickupSchedulerDeps) {}

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  async requestPickup(input: PickupRequestInput): Promise<PickupRequest> {
    const { shipments, publisher, pickups, clock, logger, config } = this.deps
    const id = (this.deps.newPickupId ?? newPickupId)()
    const requested = requestPickup(id, input, config.pickupMaxAttempts, clock.now())
    await findOrThrow(shipments.findById(requested.state.guideId), 'Shipment', requested.state.guideId)
    const pickup = await publisher.commit(requested, (state) => pickups.save(state))
    logger.info('Pickup requested', {
      pickupId: id,
      guideId: pickup.guideId,
      pickupType: pickup.type,
      priority: pickup.priority,
    })
    return pickup
  }

  /**
   * Books a SCHEDULED or RESCHEDULED pickup on `slot`. A RESCHEDULED pickup
   * still holding its previous reservation has it moved.
   *
   * @throws {CapacityExhaustedError} when the slot or the operator's day is full.
   * @throws {InvalidPickupTypeError} for POINT_DELIVERY pickups.
   */
  async schedule(pickupId: PickupId, date: Date, slot: PickupTimeSlot, operatorId: OperatorId): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    const scheduled = schedulePickup(pickup, { date, slot, operatorId }, this.deps.clock.now())
    const dayLimit = await this.dayLimit(operatorId, slot.startTime)
    const next = await this.commitWithCapacity(scheduled, { slot, dayLimit })
    this.deps.logger.info('Pickup scheduled', {
      pickupId,
      operatorId,
      timeSlotId: slot.id,
      scheduledDate: date.toISOString(),
    })
    return next
  }

  /**
   * Finds the first operator with quota left on the preferred day and a free
   * slot matching `preference`, then schedules on it. Resolves to undefined
   * when nothing is free.
   */
  async scheduleDirect(
    pickupId: PickupId,
    preferredDate: Date,
    preference: TimePreference = 'ANY',
  ): Promise<PickupRequest | undefined> {
    const slot = await this.findAvailableSlot(preferredDate, preference)
    if (slot === undefined) {
      this.deps.logger.warn('No pickup slot available', { pickupId, date: toDayKey(preferredDate), preference })
      return undefined
    }
    return this.schedule(pickupId, slot.startTime, slot, slot.operatorId)
  }

  async assignToPoint(pickupId: PickupId, pointId: PointId): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    const next = await this.commit(assignPickupToPoint(pickup, pointId, this.deps.clock.now()))
    this.deps.logger.info('Pickup assigned to point', { pickupId, pointId })
    return next
  }

  async start(pickupId: PickupId, operatorId: OperatorId): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    const next = await this.commit(startPickup(pickup, operatorId, this.deps.clock.now()))
    this.deps.logger.info('Pickup started', { pickupId, operatorId })
    return next
  }

  /** Records a successful attempt. The reservation stays consumed. */
  async complete(
    pickupId: PickupId,
    report: PickupOutcomeReport & { readonly packagesCollected?: number },
  ): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    const completed = completePickup(
      pickup,
      {
        operatorId: report.operatorId,
        notes: report.notes ?? '',
        ...(report.evidence !== undefined ? { evidence: report.evidence } : {}),
        ...(report.packagesCollected !== undefined ? { packagesCollected: report.packagesCollected } : {}),
      },
      this.deps.clock.now(),
    )
    const next = await this.commit(completed)
    this.deps.logger.info('Pickup completed', {
      pickupId,
      operatorId: report.operatorId,
      packagesCollected: completed.event.payload.packagesCollected,
    })
    return next
  }

  /**
   * Records a failed attempt. When the reason allows it, the pickup is moved
   * to the first free slot of the following day, preferring its current
   * operator; when no slot is free it stays RESCHEDULED.
   *
   * @throws {RetryExhaustedError} when every attempt is already used.
   */
  async fail(pickupId: PickupId, reason: string, report: PickupOutcomeReport): Promise<PickupRequest> {
    const { clock, logger, config } = this.deps
    const pickup = await this.getPickup(pickupId)
    const failed = failPickup(
      pickup,
      {
        operatorId: report.operatorId,
        reason,
        notes: report.notes ?? '',
        ...(report.evidence !== undefined ? { evidence: report.evidence } : {}),
      },
      config.autoRescheduleReasons,
      clock.now(),
    )
    const next = await this.commit(failed)
    const { attemptNumber, autoReschedule, failureReason } = failed.event.payload

    if (next.status === 'FAILED') {
      logger.warn('Pickup failed permanently', { pickupId, attemptNumber, reason: failureReason })
      return next
    }
    logger.warn('Pickup attempt failed', { pickupId, attemptNumber, reason: failureReason, autoReschedule })
    return autoReschedule ? this.autoReschedule(next, failureReason) : next
  }

  /**
   * Moves a CONFIRMED or RESCHEDULED pickup to `newSlot`. The old
   * reservation is freed once the move is saved. A pickup that no longer
   * fits an open route of its previous operator and day is taken off it.
   *
   * @throws {RetryExhaustedError} when no attempts remain.
   * @throws {CapacityExhaustedError} when the new slot or day is full.
   */
  async reschedule(
    pickupId: PickupId,
    newDate: Date,
    newSlot: PickupTimeSlot,
    reason: string,
    operatorId: OperatorId = newSlot.operatorId,
  ): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    return this.moveTo(pickup, newDate, newSlot, operatorId, reason, false)
  }

  /** Cancels the pickup and frees its reservation, if any. */
  async cancel(pickupId: PickupId, reason: string, cancelledBy: string): Promise<PickupRequest> {
    const { ledger, clock, logger } = this.deps
    const pickup = await this.getPickup(pickupId)
    const releasedSlot = ledger.holding(pickupId)?.slotId ?? null
    const cancelled = cancelPickup(pickup, reason, cancelledBy, releasedSlot, clock.now())
    const next = await this.commitWithCapacity(cancelled, undefined)
    logger.info('Pickup cancelled', { pickupId, reason, cancelledBy, releasedTimeSlotId: releasedSlot })
    return next
  }

  async setPriority(pickupId: PickupId, priority: PickupPriority): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    return this.commit(setPickupPriority(pickup, priority, this.deps.clock.now()))
  }

  async setPackageDetails(pickupId: PickupId, details: PackageDetails): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    const next = await this.commit(setPickupPackageDetails(pickup, details, this.deps.clock.now()))
    this.deps.logger.info('Pickup package details updated', {
      pickupId,
      estimatedPackages: next.estimatedPackages,
      totalWeightKg: next.totalWeightKg,
    })
    return next
  }

  async setSpecialInstructions(pickupId: PickupId, instructions: string): Promise<PickupRequest> {
    const pickup = await this.getPickup(pickupId)
    return this.commit(setPickupSpecialInstructions(pickup, instructions, this.deps.clock.now()))
  }

  /**
   * Rebuilds the ledger from the pickups persisted with a slot. Call once on
   * a fresh domain before it schedules anything; resolves to the number of
   * reservations restored.
   */
  async restoreReservations(): Promise<number> {
    const { pickups, ledger, logger } = this.deps
    const found = await Promise.all(HOLDING_STATUSES.map((status) => pickups.findByStatus(status)))
    let restored = 0
    for (const pickup of found.flat()) {
      if (pickup.timeSlot === undefined || pickup.assignedOperatorId === undefined) continue
      ledger.restore({
        pickupId: pickup.id,
        slotId: pickup.timeSlot.slotId,
        operatorId: pickup.assignedOperatorId,
        day: toDayKey(pickup.timeSlot.startTime),
      })
      restored++
    }
    logger.info('Capacity ledger restored', { reservations: restored })
    return restored
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getPickup(pickupId: PickupId): Promise<PickupRequest> {
    return findOrThrow(this.deps.pickups.findById(pickupId), 'PickupRequest', pickupId)
  }

  async getPickupSummary(pickupId: PickupId): Promise<PickupSummary> {
    const pickup = await this.getPickup(pickupId)
    return getPickupSummary(pickup, this.deps.clock.now(), this.deps.config.overdueGraceMinutes)
  }

  /** CONFIRMED and IN_PROGRESS pickups on the UTC day of `date`, earliest first. */
  async getDailySchedule(date: Date, operatorId?: OperatorId): Promise<readonly PickupRequest[]> {
    const onDay = await this.deps.pickups.findByDateRange(dayRange(date))
    return onDay
      .filter((p) => ACTIVE_ON_DAY.has(p.status))
      .filter((p) => operatorId === undefined || p.assignedOperatorId === operatorId)
      .sort((a, b) => (a.scheduledDate?.getTime() ?? 0) - (b.scheduledDate?.getTime() ?? 0))
  }

  /** Outcome metrics over pickups scheduled inside `range`. */
  async getPickupMetrics(range: DateRange, operatorId?: OperatorId): Promise<PickupMetrics> {
    const scheduled = await this.deps.pickups.findByDateRange(range)
    const inScope = scheduled.filter((p) => operatorId === undefined || p.assignedOperatorId === operatorId)
    const completed = inScope.filter((p) => p.status === 'COMPLETED')
    const failedPickups = inScope.filter((p) => p.status === 'FAILED').length
    const total = inScope.length

    let completionHours = 0
    for (const p of completed) {
      if (p.completedAt !== undefined && p.scheduledDate !== undefined) {
        completionHours += hoursBetween(p.scheduledDate, p.completedAt)
      }
    }

    return {
      totalPickups: total,
      completedPickups: completed.length,
      failedPickups,
      successRate: total > 0 ? completed.length / total : 0,
      failureRate: total > 0 ? failedPickups / total : 0,
      averageCompletionHours: completed.length > 0 ? completionHours / completed.length : 0,
    }
  }

  slotUsage(slot: PickupTimeSlot): SlotUsage {
    return this.deps.ledger.slotUsage(slot)
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async moveTo(
    pickup: PickupRequest,
    date: Date,
    slot: PickupTimeSlot,
    operatorId: OperatorId,
    reason: string,
    automatic: boolean,
  ): Promise<PickupRequest> {
    const rescheduled = reschedulePickup(pickup, { date, slot, operatorId, reason, automatic }, this.deps.clock.now())
    const dayLimit = await this.dayLimit(operatorId, slot.startTime)
    const next = await this.commitWithCapacity(rescheduled, { slot, dayLimit })
    this.deps.logger.info('Pickup rescheduled', {
      pickupId: pickup.id,
      previousTimeSlotId: rescheduled.event.payload.previousTimeSlotId,
      timeSlotId: slot.id,
      reason,
      automatic,
    })
    if (pickup.assignedOperatorId !== undefined) await this.leaveStaleRoutes(pickup.assignedOperatorId, next)
    return next
  }

  /**
   * Takes `pickup` off every open route of `operatorId` it no longer fits.
   * A route that cannot be saved keeps the stop; completing that route skips
   * stops that left its operator or day.
   */
  private async leaveStaleRoutes(operatorId: OperatorId, pickup: PickupRequest): Promise<void> {
    const { routes, publisher, clock, logger } = this.deps
    const candidates = await routes.findByOperator(operatorId)
    for (const route of candidates) {
      if (!isRouteActive(route) || !route.pickupIds.includes(pickup.id) || belongsOnRoute(route, pickup)) continue
      try {
        await publisher.commit(removePickupFromRoute(route, pickup.id, 'rescheduled', clock.now()), (state) =>
          routes.save(state),
        )
        logger.info('Pickup removed from route', { pickupId: pickup.id, routeId: route.id })
      } catch (error: unknown) {
        logger.error('Rescheduled pickup left on route', {
          pickupId: pickup.id,
          routeId: route.id,
          error: errorToLog(error),
        })
      }
    }
  }

  private async autoReschedule(pickup: PickupRequest, reason: string): Promise<PickupRequest> {
    const { clock, logger } = this.deps
    const nextDay = startOfDay(addDays(pickup.scheduledDate ?? clock.now(), 1))
    const slot = await this.findAvailableSlot(nextDay, 'ANY', pickup.assignedOperatorId)
    if (slot === undefined) {
      logger.warn('No slot for automatic reschedule; pickup left for manual handling', {
        pickupId: pickup.id,
        date: toDayKey(nextDay),
      })
      return pickup
    }
    try {
      return await this.moveTo(pickup, slot.startTime, slot, slot.operatorId, reason, true)
    } catch (error: unknown) {
      // The slot filled between lookup and reservation.
      if (!(error instanceof CapacityExhaustedError)) throw error
      logger.warn('Automatic reschedule lost its slot; pickup left for manual handling', {
        pickupId: pickup.id,
        error: errorToLog(error),
      })
      return pickup
    }
  }

  /**
   * First slot on the day of `date` that matches `preference` and still has
   * room, from an operator with quota left. `preferredOperator`, when listed
   * for the day, is tried before the others.
   */
  private async findAvailableSlot(
    date: Date,
    preference: TimePreference,
    preferredOperator?: OperatorId,
  ): Promise<PickupTimeSlot | undefined> {
    const { capacity, ledger } = this.deps
    const operators = await capacity.listOperators(date)
    const ordered =
      preferredOperator !== undefined && operators.includes(preferredOperator)
        ? [preferredOperator, ...operators.filter((o) => o !== preferredOperator)]
        : operators

    for (const operatorId of ordered) {
      const limit = await capacity.getOperatorDailyCapacity(operatorId, date)
      if (limit === null || ledger.operatorDayUsage(operatorId, date) >= limit) continue
      const slots = await capacity.getTimeSlots(date, operatorId)
      const slot = [...slots]
        .sort((a, b) => a.startTime.getTime() - b.startTime.getTime())
        .find((s) => s.operatorId === operatorId && matchesTimePreference(s, preference) && ledger.slotUsage(s).available)
      if (slot !== undefined) return slot
    }
    return undefined
  }

  private async dayLimit(operatorId: OperatorId, date: Date): Promise<number> {
    const limit = await this.deps.capacity.getOperatorDailyCapacity(operatorId, date)
    if (limit === null) {
      throw new CapacityExhaustedError('OPERATOR_DAY', `${operatorId}@${toDayKey(date)}`, 0, 'operator is not working')
    }
    return limit
  }

  private commit(transition: Transition<PickupRequest>): Promise<PickupRequest> {
    return this.deps.publisher.commit(transition, (state) => this.deps.pickups.save(state))
  }

  /**
   * Checks outbox room, stages the move to `request` (a release when it is
   * undefined), then saves. The staged change is committed once the save
   * resolves and dropped when it rejects.
   */
  private async commitWithCapacity(
    transition: Transition<PickupRequest>,
    request: ReservationRequest | undefined,
  ): Promise<PickupRequest> {
    const { publisher, pickups, ledger, logger } = this.deps
    const pickupId = transition.state.id
    publisher.ensureCapacity('pickup', pickupId)
    ledger.stage(pickupId, request, transition.state.version)
    try {
      await pickups.save(transition.state)
    } catch (error: unknown) {
      ledger.rollback(pickupId)
      logger.warn('Pickup save failed; staged capacity change dropped', {
        pickupId,
        code: isDomainError(error) ? error.code : undefined,
      })
      throw error
    }
    ledger.commit(pickupId)
    publisher.publish(transition.event)
    return transition.state
  }
}
