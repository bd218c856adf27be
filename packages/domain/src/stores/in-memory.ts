// ---------------------------------------------------------------------------
// In-memory adapters
// Process-local implementations of every port. Each call yields once before
// touching its map, so concurrent callers interleave the way they would
// against a real database; the version check and the write then run together.
// ---------------------------------------------------------------------------

import type {
  CustomerId,
  GuideId,
  IncidentId,
  OperatorId,
  OrderId,
  PickupId,
  RouteId,
} from '../identifiers/index'
import { ConcurrencyConflictError } from '../shared/errors'
import type { DateRange } from '../shared/types'
import { isSameDay, isWithinRange, toDayKey } from '../shared/types'
import type {
  CapacityProvider,
  DeliveryRetryStore,
  IncidentStore,
  OrderStore,
  PickupStore,
  RouteStore,
  ShipmentStore,
  VersionedStore,
} from '../ports/index'
import type { Order } from '../ordering/index'
import type { Shipment } from '../shipment/index'
import type { DeliveryRetry, Incident } from '../incident/index'
import type { PickupRequest, PickupStatus, PickupTimeSlot } from '../pickup/index'
import type { PickupRoute } from '../routing/index'

const tick = (): Promise<void> => Promise.resolve()

interface Versioned<Id> {
  readonly id: Id
  readonly version: number
}

function assertNextVersion(
  entity: string,
  key: string,
  stored: { readonly version: number } | undefined,
  incoming: number,
): void {
  const expected = stored === undefined ? 1 : stored.version + 1
  if (incoming !== expected) {
    throw new ConcurrencyConflictError(entity, key, expected, incoming)
  }
}

// ---------------------------------------------------------------------------
// Generic versioned store
// ---------------------------------------------------------------------------

export class InMemoryStore<T extends Versioned<Id>, Id extends string> implements VersionedStore<T, Id> {
  protected readonly rows = new Map<Id, T>()

  constructor(private readonly entity: string) {}

  async save(entity: T): Promise<void> {
    await tick()
    assertNextVersion(this.entity, entity.id, this.rows.get(entity.id), entity.version)
    this.rows.set(entity.id, entity)
  }

  async findById(id: Id): Promise<T | undefined> {
    await tick()
    return this.rows.get(id)
  }

  get size(): number {
    return this.rows.size
  }

  protected async where(predicate: (row: T) => boolean): Promise<T[]> {
    await tick()
    return [...this.rows.values()].filter(predicate)
  }
}

// ---------------------------------------------------------------------------
// Aggregate stores
// ---------------------------------------------------------------------------

export class InMemoryOrderStore extends InMemoryStore<Order, OrderId> implements OrderStore {
  constructor() {
    super('Order')
  }

  findByCustomer(customerId: CustomerId): Promise<readonly Order[]> {
    return this.where((o) => o.customerId === customerId)
  }
}

export class InMemoryShipmentStore extends InMemoryStore<Shipment, GuideId> implements ShipmentStore {
  constructor() {
    super('Shipment')
  }

  async findByOrder(orderId: OrderId): Promise<Shipment | undefined> {
    const [found] = await this.where((s) => s.orderId === orderId)
    return found
  }
}

export class InMemoryIncidentStore extends InMemoryStore<Incident, IncidentId> implements IncidentStore {
  constructor() {
    super('Incident')
  }

  async findByGuide(guideId: GuideId): Promise<readonly Incident[]> {
    const rows = await this.where((i) => i.guideId === guideId)
    return rows.sort((a, b) => a.reportedAt.getTime() - b.reportedAt.getTime())
  }
}

/** One retry per guide, keyed by guide id. */
export class InMemoryDeliveryRetryStore implements DeliveryRetryStore {
  private readonly rows = new Map<GuideId, DeliveryRetry>()

  async save(retry: DeliveryRetry): Promise<void> {
    await tick()
    assertNextVersion('DeliveryRetry', retry.guideId, this.rows.get(retry.guideId), retry.version)
    this.rows.set(retry.guideId, retry)
  }

  async findByGuide(guideId: GuideId): Promise<DeliveryRetry | undefined> {
    await tick()
    return this.rows.get(guideId)
  }
}

export class InMemoryPickupStore extends InMemoryStore<PickupRequest, PickupId> implements PickupStore {
  constructor() {
    super('PickupRequest')
  }

  findByOperator(operatorId: OperatorId, date?: Date): Promise<readonly PickupRequest[]> {
    return this.where(
      (p) =>
        p.assignedOperatorId === operatorId &&
        (date === undefined || (p.scheduledDate !== undefined && isSameDay(p.scheduledDate, date))),
    )
  }

  findByStatus(status: PickupStatus): Promise<readonly PickupRequest[]> {
    return this.where((p) => p.status === status)
  }

  findByDateRange(range: DateRange): Promise<readonly PickupRequest[]> {
    return this.where((p) => p.scheduledDate !== undefined && isWithinRange(p.scheduledDate, range))
  }
}

export class InMemoryRouteStore extends InMemoryStore<PickupRoute, RouteId> implements RouteStore {
  constructor() {
    super('PickupRoute')
  }

  findByOperator(operatorId: OperatorId): Promise<readonly PickupRoute[]> {
    return this.where((r) => r.operatorId === operatorId)
  }

  findByDate(date: Date): Promise<readonly PickupRoute[]> {
    return this.where((r) => isSameDay(r.date, date))
  }
}

// ---------------------------------------------------------------------------
// Capacity provider
// ---------------------------------------------------------------------------

/**
 * Operator quotas and published slots held in memory. An operator works every
 * day at its default quota unless a day-specific quota overrides it; a
 * day-specific quota of null marks a day off.
 */
export class InMemoryCapacityProvider implements CapacityProvider {
  private readonly operators = new Set<OperatorId>()
  private readonly defaults = new Map<OperatorId, number>()
  private readonly overrides = new Map<string, number | null>()
  private readonly slots: PickupTimeSlot[] = []

  setOperatorCapacity(operatorId: OperatorId, dailyCapacity: number, date?: Date): this {
    this.operators.add(operatorId)
    if (date === undefined) this.defaults.set(operatorId, dailyCapacity)
    else this.overrides.set(`${operatorId}@${toDayKey(date)}`, dailyCapacity)
    return this
  }

  setDayOff(operatorId: OperatorId, date: Date): this {
    this.overrides.set(`${operatorId}@${toDayKey(date)}`, null)
    return this
  }

  addTimeSlots(...slots: readonly PickupTimeSlot[]): this {
    this.slots.push(...slots)
    return this
  }

  async getOperatorDailyCapacity(operatorId: OperatorId, date: Date): Promise<number | null> {
    await tick()
    return this.capacityOn(operatorId, date)
  }

  async getTimeSlots(date: Date, operatorId?: OperatorId): Promise<readonly PickupTimeSlot[]> {
    await tick()
    return this.slots.filter(
      (s) => isSameDay(s.startTime, date) && (operatorId === undefined || s.operatorId === operatorId),
    )
  }

  async listOperators(date: Date): Promise<readonly OperatorId[]> {
    await tick()
    return [...this.operators].filter((operatorId) => this.capacityOn(operatorId, date) !== null)
  }

  private capacityOn(operatorId: OperatorId, date: Date): number | null {
    const key = `${operatorId}@${toDayKey(date)}`
    if (this.overrides.has(key)) return this.overrides.get(key) ?? null
    return this.defaults.get(operatorId) ?? null
  }
}
