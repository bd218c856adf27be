// ---------------------------------------------------------------------------
// Domain events
// One immutable record per committed state transition. The `type` field
// discriminates the union; `payload` carries before/after state and the
// causal inputs of the transition.
// ---------------------------------------------------------------------------

import { randomUUID } from 'node:crypto'
import type { Money } from '../shared/types'
import type {
  CustomerId,
  GuideId,
  IncidentId,
  OperatorId,
  OrderId,
  PickupId,
  PointId,
  TimeSlotId,
} from '../identifiers/index'
import type { OrderStatus, ServiceType } from '../ordering/index'
import type { ShipmentStatus } from '../shipment/index'
import type {
  DeliveryOutcome,
  IncidentSeverity,
  IncidentStatus,
  IncidentType,
  RetryStatus,
} from '../incident/index'
import type { PickupPriority, PickupStatus, PickupType } from '../pickup/index'
import type { RouteStatus } from '../routing/index'

export type AggregateType = 'order' | 'shipment' | 'incident' | 'delivery-retry' | 'pickup' | 'route'

/** Before/after pair carried by every status-changing event. */
export interface StatusChange<S extends string> {
  readonly from: S
  readonly to: S
}

// ---------------------------------------------------------------------------
// Payloads, keyed by event type
// ---------------------------------------------------------------------------

export interface EventPayloads {
  // order
  OrderCreated: {
    readonly customerId: CustomerId
    readonly status: OrderStatus
    readonly serviceType: ServiceType
    readonly originCity: string
    readonly destinationCity: string
    readonly declaredValue: Money
  }
  OrderQuoted: StatusChange<OrderStatus> & {
    readonly quotedPrice: Money
    readonly estimatedDeliveryDays: number
    readonly logisticsOperator: string | null
  }
  OrderConfirmed: StatusChange<OrderStatus> & {
    readonly confirmedPrice: Money | null
    readonly paymentMethod: string | null
  }
  OrderCancelled: StatusChange<OrderStatus> & {
    readonly reason: string
    readonly cancelledBy: string
  }
  OrderMarkedWithGuide: StatusChange<OrderStatus> & {
    readonly guideId: GuideId
  }

  // shipment
  GuideGenerated: {
    readonly orderId: OrderId
    readonly customerId: CustomerId
    readonly status: ShipmentStatus
    readonly logisticsOperator: string
    readonly barcode: string
    readonly pickupAddress: string
    readonly deliveryAddress: string
  }
  PackagePickedUp: StatusChange<ShipmentStatus> & {
    readonly location: string
    readonly operator: string
  }
  PackageInTransit: StatusChange<ShipmentStatus> & {
    readonly location: string
    readonly description: string
  }
  TransitWaypointRecorded: {
    readonly status: ShipmentStatus
    readonly location: string
    readonly description: string
  }
  PackageOutForDelivery: StatusChange<ShipmentStatus> & {
    readonly location: string
  }
  PackageDelivered: StatusChange<ShipmentStatus> & {
    readonly recipientName: string
    readonly location: string
    readonly evidence: string | null
    readonly deliveryAttempt: number
  }
  DeliveryAttemptFailed: {
    readonly status: ShipmentStatus
    readonly attemptNumber: number
    readonly reason: string
    readonly location: string
  }
  ShipmentIncidentNoted: {
    readonly status: ShipmentStatus
    readonly incidentId: IncidentId
    readonly description: string
    readonly location: string
  }
  ShipmentCancelled: StatusChange<ShipmentStatus> & {
    readonly reason: string
    readonly cancelledBy: string
  }
  ShipmentReturnedToOrigin: StatusChange<ShipmentStatus> & {
    readonly reason: string
    readonly deliveryAttempts: number
  }
  EstimatedDeliveryUpdated: {
    readonly status: ShipmentStatus
    readonly previousEstimate: Date | null
    readonly estimatedDeliveryDate: Date
  }

  // incident
  IncidentReported: {
    readonly guideId: GuideId
    readonly status: IncidentStatus
    readonly incidentType: IncidentType
    readonly severity: IncidentSeverity
    readonly title: string
    readonly description: string
    readonly location: string
    readonly reportedBy: string
  }
  IncidentAcknowledged: StatusChange<IncidentStatus> & {
    readonly assignedTo: string
  }
  IncidentEscalated: StatusChange<IncidentStatus> & {
    readonly reason: string
    readonly previousSeverity: IncidentSeverity
    readonly severity: IncidentSeverity
  }
  IncidentResolved: StatusChange<IncidentStatus> & {
    readonly resolutionNotes: string
    readonly resolutionTimeHours: number
  }
  IncidentClosed: StatusChange<IncidentStatus>
  IncidentEvidenceAdded: {
    readonly evidenceId: string
    readonly fileType: string
    readonly fileName: string
  }

  // delivery retry
  DeliveryAttemptRecorded: StatusChange<RetryStatus> & {
    readonly guideId: GuideId
    readonly attemptNumber: number
    readonly outcome: DeliveryOutcome
    readonly failureReason: string | null
    readonly autoReschedule: boolean
    readonly nextAttemptAt: Date | null
    readonly attemptsRemaining: number
  }
  DeliveryRetryAbandoned: StatusChange<RetryStatus> & {
    readonly guideId: GuideId
    readonly reason: string
  }

  // pickup
  PickupRequested: {
    readonly guideId: GuideId
    readonly customerId: CustomerId
    readonly status: PickupStatus
    readonly pickupType: PickupType
    readonly pickupAddress: string
    readonly preferredDate: Date | null
    readonly priority: PickupPriority
  }
  PickupScheduled: StatusChange<PickupStatus> & {
    readonly scheduledDate: Date
    readonly operatorId: OperatorId
    readonly timeSlotId: TimeSlotId
    readonly timeSlotStart: Date
    readonly timeSlotEnd: Date
    readonly releasedTimeSlotId: TimeSlotId | null
  }
  PickupAssignedToPoint: StatusChange<PickupStatus> & {
    readonly pointId: PointId
  }
  PickupStarted: StatusChange<PickupStatus> & {
    readonly operatorId: OperatorId
  }
  PickupCompleted: StatusChange<PickupStatus> & {
    readonly guideId: GuideId
    readonly operatorId: OperatorId
    readonly completedAt: Date
    readonly packagesCollected: number
    readonly notes: string
  }
  PickupFailed: StatusChange<PickupStatus> & {
    readonly guideId: GuideId
    readonly operatorId: OperatorId
    readonly failureReason: string
    readonly attemptNumber: number
    readonly autoReschedule: boolean
  }
  PickupRescheduled: StatusChange<PickupStatus> & {
    readonly previousDate: Date | null
    readonly newDate: Date
    readonly reason: string
    readonly previousTimeSlotId: TimeSlotId | null
    readonly newTimeSlotId: TimeSlotId
    readonly operatorId: OperatorId
    readonly automatic: boolean
  }
  PickupCancelled: StatusChange<PickupStatus> & {
    readonly guideId: GuideId
    readonly reason: string
    readonly cancelledBy: string
    readonly releasedTimeSlotId: TimeSlotId | null
  }
  PickupPriorityChanged: StatusChange<PickupPriority>
  PickupPackageDetailsChanged: {
    readonly previousEstimatedPackages: number
    readonly estimatedPackages: number
    readonly previousTotalWeightKg: number | null
    readonly totalWeightKg: number
  }
  PickupInstructionsChanged: {
    readonly previous: string
    readonly specialInstructions: string
  }

  // route
  RouteCreated: {
    readonly operatorId: OperatorId
    readonly status: RouteStatus
    readonly date: string
    readonly pickupIds: readonly PickupId[]
  }
  RoutePickupAdded: {
    readonly pickupId: PickupId
    readonly pickupCount: number
  }
  RoutePickupRemoved: {
    readonly pickupId: PickupId
    readonly reason: string
    readonly pickupCount: number
  }
  RouteOptimized: {
    readonly operatorId: OperatorId
    readonly previousOrder: readonly PickupId[]
    readonly pickupIds: readonly PickupId[]
    readonly totalDistanceKm: number | null
    readonly estimatedDurationHours: number
  }
  RouteStarted: StatusChange<RouteStatus> & {
    readonly startedAt: Date
    readonly firstPickupId: PickupId | null
  }
  RouteCompleted: StatusChange<RouteStatus> & {
    readonly completedAt: Date
    readonly successfulPickups: number
    readonly failedPickups: number
    readonly cancelledPickups: number
    readonly departedPickupIds: readonly PickupId[]
  }
  RouteCancelled: StatusChange<RouteStatus> & {
    readonly reason: string
  }
}

export type DomainEventType = keyof EventPayloads

/** The aggregate each event type belongs to. */
export const EVENT_AGGREGATE = {
  OrderCreated: 'order',
  OrderQuoted: 'order',
  OrderConfirmed: 'order',
  OrderCancelled: 'order',
  OrderMarkedWithGuide: 'order',
  GuideGenerated: 'shipment',
  PackagePickedUp: 'shipment',
  PackageInTransit: 'shipment',
  TransitWaypointRecorded: 'shipment',
  PackageOutForDelivery: 'shipment',
  PackageDelivered: 'shipment',
  DeliveryAttemptFailed: 'shipment',
  ShipmentIncidentNoted: 'shipment',
  ShipmentCancelled: 'shipment',
  ShipmentReturnedToOrigin: 'shipment',
  EstimatedDeliveryUpdated: 'shipment',
  IncidentReported: 'incident',
  IncidentAcknowledged: 'incident',
  IncidentEscalated: 'incident',
  IncidentResolved: 'incident',
  IncidentClosed: 'incident',
  IncidentEvidenceAdded: 'incident',
  DeliveryAttemptRecorded: 'delivery-retry',
  DeliveryRetryAbandoned: 'delivery-retry',
  PickupRequested: 'pickup',
  PickupScheduled: 'pickup',
  PickupAssignedToPoint: 'pickup',
  PickupStarted: 'pickup',
  PickupCompleted: 'pickup',
  PickupFailed: 'pickup',
  PickupRescheduled: 'pickup',
  PickupCancelled: 'pickup',
  PickupPriorityChanged: 'pickup',
  PickupPackageDetailsChanged: 'pickup',
  PickupInstructionsChanged: 'pickup',
  RouteCreated: 'route',
  RoutePickupAdded: 'route',
  RoutePickupRemoved: 'route',
  RouteOptimized: 'route',
  RouteStarted: 'route',
  RouteCompleted: 'route',
  RouteCancelled: 'route',
} as const satisfies Record<DomainEventType, AggregateType>

export type AggregateOf<T extends DomainEventType> = (typeof EVENT_AGGREGATE)[T]

/**
 * A single committed state transition.
 *
 * @invariant `aggregateType` always equals `EVENT_AGGREGATE[type]`.
 */
export interface DomainEventOf<T extends DomainEventType> {
  readonly eventId: string
  readonly type: T
  readonly aggregateType: AggregateOf<T>
  readonly aggregateId: string
  readonly occurredAt: Date
  /** Process-wide creation order; `drainAll` sorts by it. */
  readonly sequence: number
  readonly payload: EventPayloads[T]
}

export type DomainEvent = { [T in DomainEventType]: DomainEventOf<T> }[DomainEventType]

let lastSequence = 0

export function createEvent<T extends DomainEventType>(
  type: T,
  aggregateId: string,
  occurredAt: Date,
  payload: EventPayloads[T],
): DomainEventOf<T> {
  return {
    eventId: randomUUID(),
    type,
    aggregateType: EVENT_AGGREGATE[type],
    aggregateId,
    occurredAt,
    sequence: ++lastSequence,
    payload,
  }
}

/** Narrows an event to one type. */
export function isEventOfType<T extends DomainEventType>(event: DomainEvent, type: T): event is Extract<DomainEvent, { readonly type: T }> {
  return event.type === type
}

/**
 * Result of a pure transition: the next state of the aggregate and the single
 * event describing it.
 */
export interface Transition<S, T extends DomainEventType = DomainEventType> {
  readonly state: S
  readonly event: { [K in T]: DomainEventOf<K> }[T]
}
