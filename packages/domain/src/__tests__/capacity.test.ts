import { describe, expect, it, vi } from 'vitest'
import {
  CapacityExhaustedError,
  CapacityLedger,
  ConcurrencyConflictError,
  InMemoryPickupStore,
  InvalidStateTransitionError,
  toPickupId,
} from '../index'
import type { PickupRequest, PickupTimeSlot } from '../index'
import type { TestDomain } from './helpers'
import { OPERATOR_A, T0, createGuide, deferred, makePickupInput, makeSlot, makeTestDomain } from './helpers'

const P1 = toPickupId('pickup-1')
const P2 = toPickupId('pickup-2')
const P3 = toPickupId('pickup-3')

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

describe('CapacityLedger', () => {
  const slotA = makeSlot('slot-a', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
  const slotB = makeSlot('slot-b', OPERATOR_A, '2026-03-02T11:00:00.000Z', { maxPickups: 2 })

  it('counts holders per slot and per operator day', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })
    ledger.reserve(P2, { slot: slotB, dayLimit: 5 })

    expect(ledger.slotUsage(slotA)).toEqual({ slotId: slotA.id, maxPickups: 1, currentPickups: 1, available: false })
    expect(ledger.slotUsage(slotB).currentPickups).toBe(1)
    expect(ledger.operatorDayUsage(OPERATOR_A, T0)).toBe(2)
    expect(ledger.holding(P1)).toEqual({ pickupId: P1, slotId: slotA.id, operatorId: OPERATOR_A, day: '2026-03-02' })
  })

  it('rejects a full slot', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })

    expect(() => ledger.reserve(P2, { slot: slotA, dayLimit: 5 })).toThrow('TIME_SLOT slot-a: capacity exhausted (limit 1)')
    expect(ledger.size).toBe(1)
  })

  it('rejects a full operator day', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotB, dayLimit: 1 })

    expect(() => ledger.reserve(P2, { slot: slotB, dayLimit: 1 })).toThrow(
      'OPERATOR_DAY operator-a@2026-03-02: capacity exhausted (limit 1)',
    )
    expect(ledger.slotUsage(slotB).currentPickups).toBe(1)
  })

  it('refuses a second reservation for the same pickup', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotB, dayLimit: 5 })

    expect(() => ledger.reserve(P1, { slot: slotB, dayLimit: 5 })).toThrow(InvalidStateTransitionError)
  })

  it('releases idempotently', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })

    expect(ledger.release(P1)?.slotId).toBe(slotA.id)
    expect(ledger.release(P1)).toBeUndefined()
    expect(ledger.slotUsage(slotA).currentPickups).toBe(0)
    expect(ledger.operatorDayUsage(OPERATOR_A, T0)).toBe(0)
  })

  it('transfers within a full operator day', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 1 })

    const { reservation, previous } = ledger.transfer(P1, { slot: slotB, dayLimit: 1 })

    expect(previous?.slotId).toBe(slotA.id)
    expect(reservation.slotId).toBe(slotB.id)
    expect(ledger.slotUsage(slotA).currentPickups).toBe(0)
    expect(ledger.operatorDayUsage(OPERATOR_A, T0)).toBe(1)
  })

  it('restores the old reservation when a transfer fails', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })
    ledger.reserve(P2, { slot: slotB, dayLimit: 5 })
    ledger.reserve(P3, { slot: slotB, dayLimit: 5 })

    expect(() => ledger.transfer(P1, { slot: slotB, dayLimit: 5 })).toThrow(CapacityExhaustedError)
    expect(ledger.holding(P1)?.slotId).toBe(slotA.id)
    expect(ledger.slotUsage(slotA).currentPickups).toBe(1)
    expect(ledger.size).toBe(3)
  })

  it('counts a staged move against both slots until it is committed', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })

    const change = ledger.stage(P1, { slot: slotB, dayLimit: 5 }, 3)

    expect(change.previous?.slotId).toBe(slotA.id)
    expect(change.applied?.slotId).toBe(slotB.id)
    expect(ledger.slotUsage(slotA).currentPickups).toBe(1)
    expect(ledger.slotUsage(slotB).currentPickups).toBe(1)
    expect(ledger.operatorDayUsage(OPERATOR_A, T0)).toBe(1)

    ledger.commit(P1)
    expect(ledger.holding(P1)?.slotId).toBe(slotB.id)
    expect(ledger.slotUsage(slotA).currentPickups).toBe(0)
    expect(ledger.stagedChange(P1)).toBeUndefined()
  })

  it('keeps the previous reservation when a staged move is rolled back', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })
    ledger.stage(P1, { slot: slotB, dayLimit: 5 }, 3)

    ledger.rollback(P1)

    expect(ledger.holding(P1)?.slotId).toBe(slotA.id)
    expect(ledger.slotUsage(slotB).currentPickups).toBe(0)
  })

  it('does not free a seat while its release is staged', () => {
    const ledger = new CapacityLedger()
    ledger.reserve(P1, { slot: slotA, dayLimit: 5 })
    ledger.stage(P1, undefined, 4)

    expect(() => ledger.reserve(P2, { slot: slotA, dayLimit: 5 })).toThrow(CapacityExhaustedError)

    ledger.commit(P1)
    expect(ledger.reserve(P2, { slot: slotA, dayLimit: 5 }).slotId).toBe(slotA.id)
  })

  it('refuses a second change while one is staged', () => {
    const ledger = new CapacityLedger()
    ledger.stage(P1, { slot: slotB, dayLimit: 5 }, 2)

    expect(() => ledger.stage(P1, { slot: slotB, dayLimit: 5 }, 2)).toThrow(
      'PickupRequest pickup-1 was modified concurrently (expected v3, found v2)',
    )
    expect(() => ledger.release(P1)).toThrow(ConcurrencyConflictError)
  })

  it('restores persisted reservations without a limit check', () => {
    const ledger = new CapacityLedger()
    ledger.restore({ pickupId: P1, slotId: slotA.id, operatorId: OPERATOR_A, day: '2026-03-02' })

    expect(ledger.slotUsage(slotA).available).toBe(false)
    expect(() => ledger.reserve(P2, { slot: slotA, dayLimit: 5 })).toThrow(CapacityExhaustedError)
  })
})

// ---------------------------------------------------------------------------
// Scheduler under concurrency
// ---------------------------------------------------------------------------

async function requestMany(domain: TestDomain, count: number): Promise<PickupRequest[]> {
  const pickups: PickupRequest[] = []
  for (let i = 0; i < count; i++) {
    const guide = await createGuide(domain)
    pickups.push(await domain.pickups.requestPickup(makePickupInput(guide.id)))
  }
  return pickups
}

function rejections(results: readonly PromiseSettledResult<unknown>[]): unknown[] {
  return results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []))
}

describe('PickupScheduler capacity', () => {
  it('never overbooks a slot under concurrent scheduling', async () => {
    const domain = makeTestDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 2 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const pickups = await requestMany(domain, 5)

    const results = await Promise.allSettled(
      pickups.map((p) => domain.pickups.schedule(p.id, slot.startTime, slot, OPERATOR_A)),
    )

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(2)
    const errors = rejections(results)
    expect(errors).toHaveLength(3)
    expect(errors.every((e) => e instanceof CapacityExhaustedError && e.resource === 'TIME_SLOT')).toBe(true)
    expect(domain.pickups.slotUsage(slot).currentPickups).toBe(2)

    const confirmed = (await Promise.all(pickups.map((p) => domain.pickups.getPickup(p.id)))).filter(
      (p) => p.status === 'CONFIRMED',
    )
    expect(confirmed).toHaveLength(2)
  })

  it('never exceeds the operator daily quota across slots', async () => {
    const domain = makeTestDomain()
    const morning = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z')
    const afternoon = makeSlot('slot-pm', OPERATOR_A, '2026-03-02T14:00:00.000Z')
    domain.capacity.setOperatorCapacity(OPERATOR_A, 3).addTimeSlots(morning, afternoon)
    const pickups = await requestMany(domain, 5)

    const results = await Promise.allSettled(
      pickups.map((p, i) => {
        const slot: PickupTimeSlot = i % 2 === 0 ? morning : afternoon
        return domain.pickups.schedule(p.id, slot.startTime, slot, OPERATOR_A)
      }),
    )

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(3)
    expect(rejections(results).every((e) => e instanceof CapacityExhaustedError && e.resource === 'OPERATOR_DAY')).toBe(
      true,
    )
    expect(domain.ledger.operatorDayUsage(OPERATOR_A, T0)).toBe(3)
  })

  it('keeps one reservation when the same pickup is rescheduled twice at once', async () => {
    const domain = makeTestDomain()
    const slotA = makeSlot('slot-a', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    const slotB = makeSlot('slot-b', OPERATOR_A, '2026-03-02T11:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slotA, slotB)
    const [pickup] = await requestMany(domain, 1)
    if (pickup === undefined) throw new Error('no pickup requested')
    await domain.pickups.schedule(pickup.id, slotA.startTime, slotA, OPERATOR_A)

    const results = await Promise.allSettled([
      domain.pickups.reschedule(pickup.id, slotB.startTime, slotB, 'customer asked'),
      domain.pickups.reschedule(pickup.id, slotB.startTime, slotB, 'customer asked'),
    ])

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1)
    expect(rejections(results)[0]).toBeInstanceOf(ConcurrencyConflictError)
    expect(domain.pickups.slotUsage(slotA).currentPickups).toBe(0)
    expect(domain.pickups.slotUsage(slotB).currentPickups).toBe(1)
    expect(domain.ledger.holding(pickup.id)?.slotId).toBe(slotB.id)
    expect(domain.bus.pending('pickup', pickup.id).map((e) => e.type)).toEqual([
      'PickupRequested',
      'PickupScheduled',
      'PickupRescheduled',
    ])
  })

  it('leaves both pickups in place when they try to swap full slots', async () => {
    const domain = makeTestDomain()
    const slotA = makeSlot('slot-a', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    const slotB = makeSlot('slot-b', OPERATOR_A, '2026-03-02T11:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slotA, slotB)
    const [first, second] = await requestMany(domain, 2)
    if (first === undefined || second === undefined) throw new Error('pickups not requested')
    await domain.pickups.schedule(first.id, slotA.startTime, slotA, OPERATOR_A)
    await domain.pickups.schedule(second.id, slotB.startTime, slotB, OPERATOR_A)

    const results = await Promise.allSettled([
      domain.pickups.reschedule(first.id, slotB.startTime, slotB, 'swap'),
      domain.pickups.reschedule(second.id, slotA.startTime, slotA, 'swap'),
    ])

    expect(rejections(results)).toHaveLength(2)
    expect(domain.ledger.holding(first.id)?.slotId).toBe(slotA.id)
    expect(domain.ledger.holding(second.id)?.slotId).toBe(slotB.id)
    expect((await domain.pickups.getPickup(first.id)).timeSlot?.slotId).toBe(slotA.id)
  })

  it('frees the slot for others after a cancel', async () => {
    const domain = makeTestDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const [first, second] = await requestMany(domain, 2)
    if (first === undefined || second === undefined) throw new Error('pickups not requested')
    await domain.pickups.schedule(first.id, slot.startTime, slot, OPERATOR_A)

    await expect(domain.pickups.schedule(second.id, slot.startTime, slot, OPERATOR_A)).rejects.toBeInstanceOf(
      CapacityExhaustedError,
    )
    await domain.pickups.cancel(first.id, 'customer request', 'customer-1')
    const scheduled = await domain.pickups.schedule(second.id, slot.startTime, slot, OPERATOR_A)

    expect(scheduled.status).toBe('CONFIRMED')
    expect(domain.pickups.slotUsage(slot).currentPickups).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// Compensation when the store rejects
// ---------------------------------------------------------------------------

class FlakyPickupStore extends InMemoryPickupStore {
  failNextSave = false
  private gate: Promise<void> | undefined

  /** The next save waits for `gate`, then rejects. */
  rejectNextSaveAfter(gate: Promise<void>): void {
    this.gate = gate
  }

  override async save(pickup: PickupRequest): Promise<void> {
    const gate = this.gate
    if (gate !== undefined) {
      this.gate = undefined
      await gate
      throw new Error('connection reset')
    }
    if (this.failNextSave) {
      this.failNextSave = false
      throw new Error('connection reset')
    }
    return super.save(pickup)
  }
}

describe('PickupScheduler save failures', () => {
  function flakyDomain(): { domain: TestDomain; pickups: FlakyPickupStore } {
    const pickups = new FlakyPickupStore()
    return { domain: makeTestDomain({}, { stores: { pickups } }), pickups }
  }

  it('rolls the reservation back when the save rejects', async () => {
    const { domain, pickups } = flakyDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const guide = await createGuide(domain)
    const requested = await domain.pickups.requestPickup(makePickupInput(guide.id))

    pickups.failNextSave = true
    await expect(domain.pickups.schedule(requested.id, slot.startTime, slot, OPERATOR_A)).rejects.toThrow(
      'connection reset',
    )

    expect(domain.ledger.size).toBe(0)
    expect(domain.ledger.stagedChange(requested.id)).toBeUndefined()
    expect((await domain.pickups.getPickup(requested.id)).status).toBe('SCHEDULED')
    expect(domain.bus.pending('pickup', requested.id).map((e) => e.type)).toEqual(['PickupRequested'])

    const retried = await domain.pickups.schedule(requested.id, slot.startTime, slot, OPERATOR_A)
    expect(retried.status).toBe('CONFIRMED')
    expect(domain.pickups.slotUsage(slot).currentPickups).toBe(1)
  })

  it('restores the released reservation when a cancel cannot be saved', async () => {
    const { domain, pickups } = flakyDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z')
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const guide = await createGuide(domain)
    const requested = await domain.pickups.requestPickup(makePickupInput(guide.id))
    await domain.pickups.schedule(requested.id, slot.startTime, slot, OPERATOR_A)

    pickups.failNextSave = true
    await expect(domain.pickups.cancel(requested.id, 'duplicate', 'agent-1')).rejects.toThrow('connection reset')

    expect(domain.ledger.holding(requested.id)?.slotId).toBe(slot.id)
    expect((await domain.pickups.getPickup(requested.id)).status).toBe('CONFIRMED')
  })

  it('keeps a cancelled seat taken until the cancel is saved', async () => {
    const { domain, pickups } = flakyDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const [first, second] = await requestMany(domain, 2)
    if (first === undefined || second === undefined) throw new Error('pickups not requested')
    await domain.pickups.schedule(first.id, slot.startTime, slot, OPERATOR_A)

    const gate = deferred()
    pickups.rejectNextSaveAfter(gate.promise)
    const cancelling = domain.pickups.cancel(first.id, 'duplicate', 'agent-1')
    await vi.waitFor(() => expect(domain.ledger.stagedChange(first.id)).toBeDefined())

    await expect(domain.pickups.schedule(second.id, slot.startTime, slot, OPERATOR_A)).rejects.toBeInstanceOf(
      CapacityExhaustedError,
    )
    gate.resolve()
    await expect(cancelling).rejects.toThrow('connection reset')

    expect(domain.pickups.slotUsage(slot)).toEqual({ slotId: slot.id, maxPickups: 1, currentPickups: 1, available: false })
    expect(domain.ledger.holding(first.id)?.slotId).toBe(slot.id)
    expect((await domain.pickups.getPickup(first.id)).status).toBe('CONFIRMED')
    expect((await domain.pickups.getPickup(second.id)).status).toBe('SCHEDULED')
  })

  it('holds both slots while a reschedule is being saved', async () => {
    const { domain, pickups } = flakyDomain()
    const slotA = makeSlot('slot-a', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    const slotB = makeSlot('slot-b', OPERATOR_A, '2026-03-02T11:00:00.000Z', { maxPickups: 1 })
    domain.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slotA, slotB)
    const [first, second] = await requestMany(domain, 2)
    if (first === undefined || second === undefined) throw new Error('pickups not requested')
    await domain.pickups.schedule(first.id, slotA.startTime, slotA, OPERATOR_A)

    const gate = deferred()
    pickups.rejectNextSaveAfter(gate.promise)
    const moving = domain.pickups.reschedule(first.id, slotB.startTime, slotB, 'customer asked')
    await vi.waitFor(() => expect(domain.ledger.stagedChange(first.id)?.applied?.slotId).toBe(slotB.id))

    const attempts = await Promise.allSettled([
      domain.pickups.schedule(second.id, slotA.startTime, slotA, OPERATOR_A),
      domain.pickups.schedule(second.id, slotB.startTime, slotB, OPERATOR_A),
    ])
    expect(rejections(attempts).every((e) => e instanceof CapacityExhaustedError)).toBe(true)
    expect(rejections(attempts)).toHaveLength(2)

    gate.resolve()
    await expect(moving).rejects.toThrow('connection reset')

    expect(domain.ledger.holding(first.id)?.slotId).toBe(slotA.id)
    expect(domain.pickups.slotUsage(slotA).currentPickups).toBe(1)
    expect(domain.pickups.slotUsage(slotB).currentPickups).toBe(0)
    const scheduled = await domain.pickups.schedule(second.id, slotB.startTime, slotB, OPERATOR_A)
    expect(scheduled.timeSlot?.slotId).toBe(slotB.id)
  })
})

// ---------------------------------------------------------------------------
// Restart
// ---------------------------------------------------------------------------

describe('PickupScheduler.restoreReservations', () => {
  it('rebuilds slot usage from the pickup store after a restart', async () => {
    const before = makeTestDomain()
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    before.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const [first, second] = await requestMany(before, 2)
    if (first === undefined || second === undefined) throw new Error('pickups not requested')
    await before.pickups.schedule(first.id, slot.startTime, slot, OPERATOR_A)

    const after = makeTestDomain({}, { stores: before.stores, capacity: before.capacity })
    expect(after.pickups.slotUsage(slot).currentPickups).toBe(0)

    expect(await after.pickups.restoreReservations()).toBe(1)
    expect(after.ledger.holding(first.id)).toEqual({
      pickupId: first.id,
      slotId: slot.id,
      operatorId: OPERATOR_A,
      day: '2026-03-02',
    })
    await expect(after.pickups.schedule(second.id, slot.startTime, slot, OPERATOR_A)).rejects.toBeInstanceOf(
      CapacityExhaustedError,
    )
  })

  it('skips pickups that hold no slot', async () => {
    const domain = makeTestDomain()
    const [requested] = await requestMany(domain, 1)
    if (requested === undefined) throw new Error('pickup not requested')

    expect(await domain.pickups.restoreReservations()).toBe(0)
    expect(domain.ledger.size).toBe(0)
  })

  it('shares an injected ledger between domains', async () => {
    const first = makeTestDomain()
    const second = makeTestDomain({}, { stores: first.stores, capacity: first.capacity, ledger: first.ledger })
    const slot = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z', { maxPickups: 1 })
    first.capacity.setOperatorCapacity(OPERATOR_A, 10).addTimeSlots(slot)
    const [a, b] = await requestMany(first, 2)
    if (a === undefined || b === undefined) throw new Error('pickups not requested')

    await first.pickups.schedule(a.id, slot.startTime, slot, OPERATOR_A)

    expect(second.ledger).toBe(first.ledger)
    await expect(second.pickups.schedule(b.id, slot.startTime, slot, OPERATOR_A)).rejects.toBeInstanceOf(
      CapacityExhaustedError,
    )
  })
})
