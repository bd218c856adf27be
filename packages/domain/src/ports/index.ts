// ---------------------------------------------------------------------------
// Ports
// Everything the domain needs from the outside world. Services receive these
// through their constructors; `stores/in-memory` provides in-process adapters.
// The clock port lives in `shared/clock`.
// ---------------------------------------------------------------------------

import type { DomainEvent } from '../events/index'
import type {
  CustomerId,
  GuideId,
  IncidentId,
  OperatorId,
  OrderId,
  PickupId,
  RouteId,
} from '../identifiers/index'
import type { DateRange } from '../shared/types'
import { NotFoundError } from '../shared/errors'
import type { Order } from '../ordering/index'
import type { Shipment } from '../shipment/index'
import type { DeliveryRetry, Incident } from '../incident/index'
import type { PickupRequest, PickupStatus, PickupTimeSlot } from '../pickup/index'
import type { PickupRoute } from '../routing/index'

/**
 * Persistence contract shared by every aggregate store.
 *
 * `save` is an optimistic write: a new aggregate must carry `version` 1 and
 * not exist yet; an existing one must carry the stored version plus one.
 * Anything else rejects with ConcurrencyConflictError.
 */
export interface VersionedStore<T, Id> {
  save(entity: T): Promise<void>
  findById(id: Id): Promise<T | undefined>
}

export interface OrderStore extends VersionedStore<Order, OrderId> {
  findByCustomer(customerId: CustomerId): Promise<readonly Order[]>
}

export interface ShipmentStore extends VersionedStore<Shipment, GuideId> {
  findByOrder(orderId: OrderId): Promise<Shipment | undefined>
}

export interface IncidentStore extends VersionedStore<Incident, IncidentId> {
  findByGuide(guideId: GuideId): Promise<readonly Incident[]>
}

export interface DeliveryRetryStore {
  save(retry: DeliveryRetry): Promise<void>
  findByGuide(guideId: GuideId): Promise<DeliveryRetry | undefined>
}

export interface PickupStore extends VersionedStore<PickupRequest, PickupId> {
  findByOperator(operatorId: OperatorId, date?: Date): Promise<readonly PickupRequest[]>
  findByStatus(status: PickupStatus): Promise<readonly PickupRequest[]>
  /** Pickups whose scheduledDate falls inside the half-open `range`. */
  findByDateRange(range: DateRange): Promise<readonly PickupRequest[]>
}

export interface RouteStore extends VersionedStore<PickupRoute, RouteId> {
  findByOperator(operatorId: OperatorId): Promise<readonly PickupRoute[]>
  findByDate(date: Date): Promise<readonly PickupRoute[]>
}

/** Operator quotas and published time slots, owned by operations planning. */
export interface CapacityProvider {
  /** Maximum pickups for the operator on the UTC day of `date`; null when the operator does not work that day. */
  getOperatorDailyCapacity(operatorId: OperatorId, date: Date): Promise<number | null>
  getTimeSlots(date: Date, operatorId?: OperatorId): Promise<readonly PickupTimeSlot[]>
  listOperators(date: Date): Promise<readonly OperatorId[]>
}

/** Outbound notification of committed events. Delivery is best effort. */
export interface NotificationPort {
  notify(event: DomainEvent): Promise<void> | void
}

/** Awaits a lookup and throws NotFoundError when it yields nothing. */
export async function findOrThrow<T>(lookup: Promise<T | undefined>, entity: string, id: string): Promise<T> {
  const found = await lookup
  if (found === undefined) throw new NotFoundError(entity, id)
  return found
}
