// ---------------------------------------------------------------------------
// Capacity ledger
// Sole owner of time-slot and operator-day usage. Every method is
// synchronous, so each check-and-mutate runs to completion before any other
// scheduler call in the process can observe the ledger.
// ---------------------------------------------------------------------------

import type { OperatorId, PickupId, TimeSlotId } from '../identifiers/index'
import { CapacityExhaustedError, ConcurrencyConflictError, InvalidStateTransitionError } from '../shared/errors'
import { toDayKey } from '../shared/types'
import type { PickupTimeSlot } from './index'

/** One pickup's claim on a slot and on its operator's day. */
export interface Reservation {
  readonly pickupId: PickupId
  readonly slotId: TimeSlotId
  readonly operatorId: OperatorId
  /** UTC day key of the slot start. */
  readonly day: string
}

export interface ReservationRequest {
  readonly slot: PickupTimeSlot
  /** Operator's quota for the slot's day. */
  readonly dayLimit: number
}

export interface SlotUsage {
  readonly slotId: TimeSlotId
  readonly maxPickups: number
  readonly currentPickups: number
  readonly available: boolean
}

export interface TransferResult {
  readonly reservation: Reservation
  readonly previous: Reservation | undefined
}

/**
 * A change waiting for the pickup write that carries it. Until it is
 * committed or rolled back, both `previous` and `applied` count as used.
 */
export interface StagedChange {
  readonly pickupId: PickupId
  readonly applied: Reservation | undefined
  readonly previous: Reservation | undefined
  /** Version of the pickup write the change belongs to. */
  readonly version: number
}

const operatorDayKey = (operatorId: OperatorId, day: string): string => `${operatorId}@${day}`

/**
 * Tracks usage as the set of pickups claiming each resource. A pickup claims
 * what it holds plus what a staged change would give it.
 *
 * @invariant A pickup holds at most one reservation and has at most one
 *            staged change.
 * @invariant Claims on a slot or operator-day never exceed the limit they
 *            were checked against.
 */
export class CapacityLedger {
  private readonly holdings = new Map<PickupId, Reservation>()
  private readonly staged = new Map<PickupId, StagedChange>()

  /**
   * @throws {CapacityExhaustedError} when the slot is closed or full, or the
   *         operator's day is at its limit.
   * @throws {InvalidStateTransitionError} when the pickup already holds a
   *         reservation; use `transfer` to move it.
   */
  reserve(pickupId: PickupId, request: ReservationRequest): Reservation {
    this.assertNotStaged(pickupId, 0)
    const held = this.holdings.get(pickupId)
    if (held !== undefined) {
      throw new InvalidStateTransitionError(
        'PickupRequest',
        `holding ${held.slotId}`,
        'reserve capacity for',
        'a reservation is already held',
      )
    }
    const reservation = this.check(pickupId, request)
    this.holdings.set(pickupId, reservation)
    return reservation
  }

  /** Frees whatever the pickup holds. Releasing a non-holder is a no-op. */
  release(pickupId: PickupId): Reservation | undefined {
    this.assertNotStaged(pickupId, 0)
    const held = this.holdings.get(pickupId)
    this.holdings.delete(pickupId)
    return held
  }

  /**
   * Moves the pickup's reservation to another slot. The pickup's own claim
   * does not count against the new slot or day, so moving within a full day
   * succeeds; a rejected move leaves the old reservation in place.
   */
  transfer(pickupId: PickupId, request: ReservationRequest): TransferResult {
    this.assertNotStaged(pickupId, 0)
    const previous = this.holdings.get(pickupId)
    const reservation = this.check(pickupId, request)
    this.holdings.set(pickupId, reservation)
    return { reservation, previous }
  }

  /**
   * Stages a move to `request`, or a release when `request` is undefined, for
   * the pickup write at `version`. Nothing is freed until `commit`.
   *
   * @throws {ConcurrencyConflictError} when another change for the pickup is
   *         still staged.
   * @throws {CapacityExhaustedError} when the target slot or day is full.
   */
  stage(pickupId: PickupId, request: ReservationRequest | undefined, version: number): StagedChange {
    this.assertNotStaged(pickupId, version)
    const applied = request !== undefined ? this.check(pickupId, request) : undefined
    const change: StagedChange = { pickupId, applied, previous: this.holdings.get(pickupId), version }
    this.staged.set(pickupId, change)
    return change
  }

  /** Makes the staged change the pickup's holding. */
  commit(pickupId: PickupId): StagedChange | undefined {
    const change = this.staged.get(pickupId)
    if (change === undefined) return undefined
    this.staged.delete(pickupId)
    if (change.applied !== undefined) this.holdings.set(pickupId, change.applied)
    else this.holdings.delete(pickupId)
    return change
  }

  /** Drops the staged change; the pickup keeps what it held before. */
  rollback(pickupId: PickupId): StagedChange | undefined {
    const change = this.staged.get(pickupId)
    this.staged.delete(pickupId)
    return change
  }

  /**
   * Re-creates a reservation already persisted on a pickup, without a limit
   * check. Used to rebuild the ledger from the pickup store.
   */
  restore(reservation: Reservation): void {
    this.holdings.set(reservation.pickupId, reservation)
  }

  holding(pickupId: PickupId): Reservation | undefined {
    return this.holdings.get(pickupId)
  }

  stagedChange(pickupId: PickupId): StagedChange | undefined {
    return this.staged.get(pickupId)
  }

  slotUsage(slot: PickupTimeSlot): SlotUsage {
    const currentPickups = this.claimants((r) => r.slotId === slot.id).size
    return {
      slotId: slot.id,
      maxPickups: slot.maxPickups,
      currentPickups,
      available: slot.isAvailable && currentPickups < slot.maxPickups,
    }
  }

  operatorDayUsage(operatorId: OperatorId, date: Date): number {
    const day = toDayKey(date)
    return this.claimants((r) => r.operatorId === operatorId && r.day === day).size
  }

  /** Total reservations held across all slots. */
  get size(): number {
    return this.holdings.size
  }

  private check(pickupId: PickupId, request: ReservationRequest): Reservation {
    const { slot, dayLimit } = request
    const day = toDayKey(slot.startTime)

    if (!slot.isAvailable) {
      throw new CapacityExhaustedError('TIME_SLOT', slot.id, slot.maxPickups, 'slot is closed')
    }
    if (this.claimants((r) => r.slotId === slot.id, pickupId).size >= slot.maxPickups) {
      throw new CapacityExhaustedError('TIME_SLOT', slot.id, slot.maxPickups)
    }
    const onDay = this.claimants((r) => r.operatorId === slot.operatorId && r.day === day, pickupId)
    if (onDay.size >= dayLimit) {
      throw new CapacityExhaustedError('OPERATOR_DAY', operatorDayKey(slot.operatorId, day), dayLimit)
    }
    return { pickupId, slotId: slot.id, operatorId: slot.operatorId, day }
  }

  private assertNotStaged(pickupId: PickupId, version: number): void {
    const change = this.staged.get(pickupId)
    if (change !== undefined) {
      throw new ConcurrencyConflictError('PickupRequest', pickupId, change.version + 1, version)
    }
  }

  /** Pickups whose holding or staged reservation matches, `except` left out. */
  private claimants(matches: (reservation: Reservation) => boolean, except?: PickupId): Set<PickupId> {
    const ids = new Set<PickupId>()
    for (const held of this.holdings.values()) {
      if (matches(held)) ids.add(held.pickupId)
    }
    for (const { applied } of this.staged.values()) {
      if (applied !== undefined && matches(applied)) ids.add(applied.pickupId)
    }
    if (except !== undefined) ids.delete(except)
    return ids
  }
}
