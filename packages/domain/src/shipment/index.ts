// ---------------------------------------------------------------------------
// Shipment bounded context
// Owns the physical shipment once a guide (waybill) exists: its status and
// the append-only tracking log that travels with it.
// ---------------------------------------------------------------------------

import { randomInt, randomUUID } from 'node:crypto'
import type { CustomerId, GuideId, IncidentId, OrderId } from '../identifiers/index'
import { InvalidStateTransitionError } from '../shared/errors'
import type { Transition } from '../events/index'
import { createEvent } from '../events/index'
import type { Order } from '../ordering/index'

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of a Shipment.
 *
 * Allowed transitions:
 *   GENERATED → PICKED_UP → IN_TRANSIT → OUT_FOR_DELIVERY → DELIVERED
 *   IN_TRANSIT → IN_TRANSIT (waypoint, no status change)
 *   any non-terminal → CANCELLED
 *   any non-terminal → RETURNED, once a delivery attempt has been recorded
 */
export type ShipmentStatus =
  | 'GENERATED'
  | 'PICKED_UP'
  | 'IN_TRANSIT'
  | 'OUT_FOR_DELIVERY'
  | 'DELIVERED'
  | 'RETURNED'
  | 'CANCELLED'

export const SHIPMENT_STATUSES: readonly ShipmentStatus[] = [
  'GENERATED',
  'PICKED_UP',
  'IN_TRANSIT',
  'OUT_FOR_DELIVERY',
  'DELIVERED',
  'RETURNED',
  'CANCELLED',
] as const

export const SHIPMENT_TRANSITIONS: Readonly<Record<ShipmentStatus, readonly ShipmentStatus[]>> = {
  GENERATED: ['PICKED_UP', 'CANCELLED', 'RETURNED'],
  PICKED_UP: ['IN_TRANSIT', 'CANCELLED', 'RETURNED'],
  IN_TRANSIT: ['IN_TRANSIT', 'OUT_FOR_DELIVERY', 'CANCELLED', 'RETURNED'],
  OUT_FOR_DELIVERY: ['DELIVERED', 'CANCELLED', 'RETURNED'],
  DELIVERED: [],
  RETURNED: [],
  CANCELLED: [],
}

export type TrackingEventType =
  | 'ORDER_CREATED'
  | 'GUIDE_GENERATED'
  | 'PACKAGE_PICKED_UP'
  | 'IN_TRANSIT'
  | 'ARRIVED_AT_HUB'
  | 'OUT_FOR_DELIVERY'
  | 'DELIVERY_ATTEMPTED'
  | 'DELIVERY_ESTIMATE_UPDATED'
  | 'DELIVERED'
  | 'INCIDENT_REPORTED'
  | 'RETURNED_TO_SENDER'
  | 'CANCELLED'

/** One entry of the tracking log. Never rewritten once appended. */
export interface TrackingEvent {
  readonly id: string
  readonly type: TrackingEventType
  readonly description: string
  readonly location: string
  readonly timestamp: Date
  readonly operator: string
  readonly notes: string
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/**
 * A guide together with its tracking log.
 *
 * @invariant `tracking` timestamps are strictly increasing.
 * @invariant RETURNED is only reached with `deliveryAttempts` ≥ 1.
 */
export interface Shipment {
  readonly id: GuideId
  readonly orderId: OrderId
  readonly customerId: CustomerId
  readonly status: ShipmentStatus
  readonly logisticsOperator: string
  /** Code 39 payload, e.g. `*GU260000001*`. */
  readonly barcode: string
  readonly qrCode: string
  /** Six digits the customer reads to the courier at pickup. */
  readonly pickupCode: string
  readonly pickupAddress: string
  readonly deliveryAddress: string
  readonly estimatedPickupDate?: Date
  readonly estimatedDeliveryDate?: Date
  readonly tracking: readonly TrackingEvent[]
  readonly currentLocation: string
  readonly deliveryAttempts: number
  readonly recipientName?: string
  readonly deliveredAt?: Date
  readonly closingReason?: string
  readonly createdAt: Date
  readonly updatedAt: Date
  readonly version: number
}

export interface GenerateGuideInput {
  readonly logisticsOperator: string
  readonly estimatedPickupDate?: Date
  readonly estimatedDeliveryDate?: Date
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

export function canShipmentTransition(current: ShipmentStatus, next: ShipmentStatus): boolean {
  return SHIPMENT_TRANSITIONS[current].includes(next)
}

export function isShipmentTerminal(status: ShipmentStatus): boolean {
  return SHIPMENT_TRANSITIONS[status].length === 0
}

export function newPickupCode(): string {
  return String(randomInt(1_000_000)).padStart(6, '0')
}

function assertTransition(shipment: Shipment, next: ShipmentStatus, requested: string, reason?: string): void {
  if (!canShipmentTransition(shipment.status, next)) {
    throw new InvalidStateTransitionError('Shipment', shipment.status, requested, reason)
  }
}

interface TrackingEntry {
  readonly type: TrackingEventType
  readonly description: string
  readonly location: string
  readonly operator?: string
  readonly notes?: string
}

/**
 * Returns a copy of `shipment` with `entry` appended to its tracking log. The
 * entry is stamped `now`, or one millisecond after the previous entry when
 * the clock has not moved past it.
 */
function track(shipment: Shipment, entry: TrackingEntry, now: Date): Pick<Shipment, 'tracking' | 'currentLocation'> {
  const last = shipment.tracking[shipment.tracking.length - 1]
  const timestamp =
    last !== undefined && now.getTime() <= last.timestamp.getTime() ? new Date(last.timestamp.getTime() + 1) : now
  const event: TrackingEvent = {
    id: randomUUID(),
    type: entry.type,
    description: entry.description,
    location: entry.location,
    timestamp,
    operator: entry.operator ?? '',
    notes: entry.notes ?? '',
  }
  return {
    tracking: [...shipment.tracking, event],
    currentLocation: entry.location !== '' ? entry.location : shipment.currentLocation,
  }
}

function advance(
  shipment: Shipment,
  status: ShipmentStatus,
  entry: TrackingEntry,
  now: Date,
  patch: Partial<Shipment> = {},
): Shipment {
  return {
    ...shipment,
    ...patch,
    ...track(shipment, entry, now),
    status,
    updatedAt: now,
    version: shipment.version + 1,
  }
}

/**
 * Creates the shipment for a CONFIRMED order.
 *
 * @throws {InvalidStateTransitionError} when the order is not CONFIRMED.
 */
export function generateGuide(
  order: Order,
  id: GuideId,
  input: GenerateGuideInput,
  now: Date,
  pickupCode: string = newPickupCode(),
): Transition<Shipment, 'GuideGenerated'> {
  if (order.status !== 'CONFIRMED') {
    throw new InvalidStateTransitionError('Order', order.status, 'generate guide for', 'order must be CONFIRMED')
  }
  const empty: Shipment = {
    id,
    orderId: order.id,
    customerId: order.customerId,
    status: 'GENERATED',
    logisticsOperator: input.logisticsOperator,
    barcode: `*${id}*`,
    qrCode: `QR_${id}`,
    pickupCode,
    pickupAddress: `${order.originAddress}, ${order.originCity}`,
    deliveryAddress: `${order.recipient.address}, ${order.recipient.city}`,
    ...(input.estimatedPickupDate !== undefined ? { estimatedPickupDate: input.estimatedPickupDate } : {}),
    ...(input.estimatedDeliveryDate !== undefined ? { estimatedDeliveryDate: input.estimatedDeliveryDate } : {}),
    tracking: [],
    currentLocation: '',
    deliveryAttempts: 0,
    createdAt: now,
    updatedAt: now,
    version: 1,
  }
  const shipment: Shipment = {
    ...empty,
    ...track(
      empty,
      { type: 'GUIDE_GENERATED', description: `Guide ${id} generated`, location: order.originCity },
      now,
    ),
  }
  return {
    state: shipment,
    event: createEvent('GuideGenerated', id, now, {
      orderId: order.id,
      customerId: order.customerId,
      status: shipment.status,
      logisticsOperator: shipment.logisticsOperator,
      barcode: shipment.barcode,
      pickupAddress: shipment.pickupAddress,
      deliveryAddress: shipment.deliveryAddress,
    }),
  }
}

/** GENERATED → PICKED_UP. */
export function pickUpShipment(
  shipment: Shipment,
  location: string,
  operator: string,
  now: Date,
): Transition<Shipment, 'PackagePickedUp'> {
  assertTransition(shipment, 'PICKED_UP', 'pick up')
  const next = advance(
    shipment,
    'PICKED_UP',
    { type: 'PACKAGE_PICKED_UP', description: 'Package picked up', location, operator },
    now,
  )
  return {
    state: next,
    event: createEvent('PackagePickedUp', shipment.id, now, {
      from: shipment.status,
      to: next.status,
      location,
      operator,
    }),
  }
}

/**
 * PICKED_UP → IN_TRANSIT. Called again while IN_TRANSIT it only appends a
 * waypoint to the tracking log and emits `TransitWaypointRecorded`.
 */
export function recordTransit(
  shipment: Shipment,
  location: string,
  description: string,
  now: Date,
): Transition<Shipment, 'PackageInTransit' | 'TransitWaypointRecorded'> {
  assertTransition(shipment, 'IN_TRANSIT', 'transit')
  const next = advance(shipment, 'IN_TRANSIT', { type: 'IN_TRANSIT', description, location }, now)
  if (shipment.status === 'IN_TRANSIT') {
    return {
      state: next,
      event: createEvent('TransitWaypointRecorded', shipment.id, now, {
        status: next.status,
        location,
        description,
      }),
    }
  }
  return {
    state: next,
    event: createEvent('PackageInTransit', shipment.id, now, {
      from: shipment.status,
      to: next.status,
      location,
      description,
    }),
  }
}

/** IN_TRANSIT → OUT_FOR_DELIVERY. */
export function sendOutForDelivery(
  shipment: Shipment,
  location: string,
  now: Date,
): Transition<Shipment, 'PackageOutForDelivery'> {
  assertTransition(shipment, 'OUT_FOR_DELIVERY', 'send out for delivery')
  const next = advance(
    shipment,
    'OUT_FOR_DELIVERY',
    { type: 'OUT_FOR_DELIVERY', description: 'Package out for delivery', location },
    now,
  )
  return {
    state: next,
    event: createEvent('PackageOutForDelivery', shipment.id, now, { from: shipment.status, to: next.status, location }),
  }
}

/** OUT_FOR_DELIVERY → DELIVERED. */
export function deliverShipment(
  shipment: Shipment,
  recipientName: string,
  location: string,
  evidence: string | undefined,
  now: Date,
): Transition<Shipment, 'PackageDelivered'> {
  assertTransition(shipment, 'DELIVERED', 'deliver')
  const next = advance(
    shipment,
    'DELIVERED',
    {
      type: 'DELIVERED',
      description: `Delivered to ${recipientName}`,
      location,
      ...(evidence !== undefined ? { notes: evidence } : {}),
    },
    now,
    { recipientName, deliveredAt: now },
  )
  return {
    state: next,
    event: createEvent('PackageDelivered', shipment.id, now, {
      from: shipment.status,
      to: next.status,
      recipientName,
      location,
      evidence: evidence ?? null,
      deliveryAttempt: shipment.deliveryAttempts + 1,
    }),
  }
}

/**
 * Records an unsuccessful delivery attempt. The shipment stays
 * OUT_FOR_DELIVERY; `deliveryAttempts` grows by one.
 */
export function recordFailedDeliveryAttempt(
  shipment: Shipment,
  attemptNumber: number,
  reason: string,
  location: string,
  now: Date,
): Transition<Shipment, 'DeliveryAttemptFailed'> {
  if (shipment.status !== 'OUT_FOR_DELIVERY') {
    throw new InvalidStateTransitionError('Shipment', shipment.status, 'record delivery attempt for')
  }
  const next = advance(
    shipment,
    shipment.status,
    { type: 'DELIVERY_ATTEMPTED', description: `Delivery attempt ${attemptNumber} failed: ${reason}`, location },
    now,
    { deliveryAttempts: shipment.deliveryAttempts + 1 },
  )
  return {
    state: next,
    event: createEvent('DeliveryAttemptFailed', shipment.id, now, {
      status: next.status,
      attemptNumber,
      reason,
      location,
    }),
  }
}

/**
 * Records a new delivery estimate on a shipment still in flight, with a
 * tracking entry at the current location.
 */
export function updateEstimatedDelivery(
  shipment: Shipment,
  estimate: Date,
  now: Date,
): Transition<Shipment, 'EstimatedDeliveryUpdated'> {
  if (isShipmentTerminal(shipment.status)) {
    throw new InvalidStateTransitionError('Shipment', shipment.status, 'update estimated delivery of')
  }
  const next = advance(
    shipment,
    shipment.status,
    {
      type: 'DELIVERY_ESTIMATE_UPDATED',
      description: `Estimated delivery updated to ${estimate.toISOString()}`,
      location: shipment.currentLocation,
    },
    now,
    { estimatedDeliveryDate: estimate },
  )
  return {
    state: next,
    event: createEvent('EstimatedDeliveryUpdated', shipment.id, now, {
      status: next.status,
      previousEstimate: shipment.estimatedDeliveryDate ?? null,
      estimatedDeliveryDate: estimate,
    }),
  }
}

/** Notes an incident on the tracking log of a shipment still in flight. */
export function noteIncident(
  shipment: Shipment,
  incidentId: IncidentId,
  description: string,
  location: string,
  now: Date,
): Transition<Shipment, 'ShipmentIncidentNoted'> {
  if (isShipmentTerminal(shipment.status)) {
    throw new InvalidStateTransitionError('Shipment', shipment.status, 'report incident on')
  }
  const next = advance(shipment, shipment.status, { type: 'INCIDENT_REPORTED', description, location }, now)
  return {
    state: next,
    event: createEvent('ShipmentIncidentNoted', shipment.id, now, {
      status: next.status,
      incidentId,
      description,
      location,
    }),
  }
}

/** Any non-terminal state → CANCELLED. */
export function cancelShipment(
  shipment: Shipment,
  reason: string,
  cancelledBy: string,
  now: Date,
): Transition<Shipment, 'ShipmentCancelled'> {
  assertTransition(shipment, 'CANCELLED', 'cancel')
  const next = advance(
    shipment,
    'CANCELLED',
    { type: 'CANCELLED', description: `Cancelled: ${reason}`, location: shipment.currentLocation, operator: cancelledBy },
    now,
    { closingReason: reason },
  )
  return {
    state: next,
    event: createEvent('ShipmentCancelled', shipment.id, now, {
      from: shipment.status,
      to: next.status,
      reason,
      cancelledBy,
    }),
  }
}

/**
 * Any non-terminal state → RETURNED. Distinct from cancellation: this is the
 * logistics-driven end of a shipment that could not be delivered.
 */
export function returnToOrigin(shipment: Shipment, reason: string, now: Date): Transition<Shipment, 'ShipmentReturnedToOrigin'> {
  assertTransition(shipment, 'RETURNED', 'return')
  if (shipment.deliveryAttempts < 1) {
    throw new InvalidStateTransitionError('Shipment', shipment.status, 'return', 'no delivery attempt recorded')
  }
  const next = advance(
    shipment,
    'RETURNED',
    { type: 'RETURNED_TO_SENDER', description: `Returned to sender: ${reason}`, location: shipment.currentLocation },
    now,
    { closingReason: reason },
  )
  return {
    state: next,
    event: createEvent('ShipmentReturnedToOrigin', shipment.id, now, {
      from: shipment.status,
      to: next.status,
      reason,
      deliveryAttempts: shipment.deliveryAttempts,
    }),
  }
}

// ---------------------------------------------------------------------------
// Tracking queries
// ---------------------------------------------------------------------------

export function latestTrackingEvent(shipment: Shipment): TrackingEvent | undefined {
  return shipment.tracking[shipment.tracking.length - 1]
}

export function trackingEventsOfType(shipment: Shipment, type: TrackingEventType): readonly TrackingEvent[] {
  return shipment.tracking.filter((e) => e.type === type)
}

export function isDelivered(shipment: Shipment): boolean {
  return shipment.tracking.some((e) => e.type === 'DELIVERED')
}

export function hasIncidents(shipment: Shipment): boolean {
  return shipment.tracking.some((e) => e.type === 'INCIDENT_REPORTED')
}
