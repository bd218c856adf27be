import { describe, expect, it } from 'vitest'
import {
  INCIDENT_STATUSES,
  InvalidStateTransitionError,
  ORDER_STATUSES,
  PICKUP_STATUSES,
  ROUTE_STATUSES,
  SHIPMENT_STATUSES,
  confirmOrder,
  createMoney,
  createOrder,
  createRoute,
  generateGuide,
  quoteOrder,
  reportIncident,
  requestPickup,
  toGuideId,
  toIncidentId,
  toOrderId,
  toPickupId,
  toPointId,
  toRouteId,
} from '../index'
import type {
  IncidentStatus,
  OrderStatus,
  PickupRequest,
  PickupStatus,
  RouteStatus,
  ShipmentStatus,
} from '../index'
import type { TestDomain } from './helpers'
import { OPERATOR_A, T0, makeOrderInput, makePickupInput, makeSlot, makeTestDomain } from './helpers'

// Every service operation is run against every status it must refuse. The
// entity is seeded straight into its store at version 1, so a refusal must
// leave the stored version at 1 and the outbox empty.

interface Operation<S extends string> {
  readonly name: string
  readonly allowed: readonly S[]
  readonly run: (domain: TestDomain) => Promise<unknown>
}

interface Refusal<S extends string> {
  readonly name: string
  readonly status: S
  readonly run: (domain: TestDomain) => Promise<unknown>
}

function refusals<S extends string>(statuses: readonly S[], operations: readonly Operation<S>[]): Refusal<S>[] {
  return operations.flatMap(({ name, allowed, run }) =>
    statuses.filter((status) => !allowed.includes(status)).map((status) => ({ name, status, run })),
  )
}

async function expectRefused(
  domain: TestDomain,
  run: (domain: TestDomain) => Promise<unknown>,
  stored: () => Promise<{ readonly version: number } | undefined>,
): Promise<void> {
  await expect(run(domain)).rejects.toBeInstanceOf(InvalidStateTransitionError)
  expect((await stored())?.version).toBe(1)
  expect(domain.bus.drainAll()).toEqual([])
}

const ORDER_ID = toOrderId('order-1')
const GUIDE_ID = toGuideId('GU260000001')
const INCIDENT_ID = toIncidentId('incident-1')
const PICKUP_ID = toPickupId('pickup-1')
const ROUTE_ID = toRouteId('route-1')
const SLOT = makeSlot('slot-am', OPERATOR_A, '2026-03-02T09:00:00.000Z')

const pendingOrder = createOrder(ORDER_ID, makeOrderInput(), T0).state
const confirmedOrder = confirmOrder(
  quoteOrder(pendingOrder, { price: createMoney(25000), deliveryDays: 3 }, T0).state,
  undefined,
  T0,
).state
const guide = generateGuide(confirmedOrder, GUIDE_ID, { logisticsOperator: 'test-carrier' }, T0).state
const incident = reportIncident(
  INCIDENT_ID,
  GUIDE_ID,
  { type: 'PACKAGE_DAMAGED', title: 'Box dented', reportedBy: 'courier-1' },
  T0,
).state
const pickup: PickupRequest = {
  ...requestPickup(PICKUP_ID, makePickupInput(GUIDE_ID), 3, T0).state,
  assignedOperatorId: OPERATOR_A,
  scheduledDate: SLOT.startTime,
}
const route = createRoute(ROUTE_ID, OPERATOR_A, T0, [{ ...pickup, status: 'CONFIRMED' }], undefined, T0).state

// ---------------------------------------------------------------------------
// Order
// ---------------------------------------------------------------------------

const ORDER_OPERATIONS: readonly Operation<OrderStatus>[] = [
  { name: 'quote', allowed: ['PENDING'], run: (d) => d.orders.quote(ORDER_ID, createMoney(25000), 3) },
  { name: 'confirm', allowed: ['QUOTED'], run: (d) => d.orders.confirm(ORDER_ID) },
  {
    name: 'cancel',
    allowed: ['PENDING', 'QUOTED', 'CONFIRMED'],
    run: (d) => d.orders.cancel(ORDER_ID, 'customer request', 'agent-1'),
  },
  { name: 'markWithGuide', allowed: ['CONFIRMED'], run: (d) => d.orders.markWithGuide(ORDER_ID, GUIDE_ID) },
]

describe('order operations outside their source states', () => {
  it.each(refusals(ORDER_STATUSES, ORDER_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.orders.save({ ...pendingOrder, status, version: 1 })

    await expectRefused(domain, run, () => domain.stores.orders.findById(ORDER_ID))
  })
})

// ---------------------------------------------------------------------------
// Shipment
// ---------------------------------------------------------------------------

const OPEN_SHIPMENT: readonly ShipmentStatus[] = ['GENERATED', 'PICKED_UP', 'IN_TRANSIT', 'OUT_FOR_DELIVERY']

const SHIPMENT_OPERATIONS: readonly Operation<ShipmentStatus>[] = [
  { name: 'pickup', allowed: ['GENERATED'], run: (d) => d.shipments.pickup(GUIDE_ID, 'Bogota hub', 'courier-1') },
  { name: 'transit', allowed: ['PICKED_UP', 'IN_TRANSIT'], run: (d) => d.shipments.transit(GUIDE_ID, 'Bogota hub') },
  { name: 'outForDelivery', allowed: ['IN_TRANSIT'], run: (d) => d.shipments.outForDelivery(GUIDE_ID) },
  {
    name: 'deliver',
    allowed: ['OUT_FOR_DELIVERY'],
    run: (d) => d.shipments.deliver(GUIDE_ID, 'Ana Test', 'Medellin'),
  },
  {
    name: 'recordFailedDeliveryAttempt',
    allowed: ['OUT_FOR_DELIVERY'],
    run: (d) => d.shipments.recordFailedDeliveryAttempt(GUIDE_ID, 2, 'gate locked', 'Medellin'),
  },
  {
    name: 'exhaustDeliveryAttempts',
    allowed: ['OUT_FOR_DELIVERY'],
    run: (d) => d.shipments.exhaustDeliveryAttempts(GUIDE_ID, 2, 'gate locked', 'Medellin'),
  },
  { name: 'cancel', allowed: OPEN_SHIPMENT, run: (d) => d.shipments.cancel(GUIDE_ID, 'customer request', 'agent-1') },
  { name: 'returnToOrigin', allowed: OPEN_SHIPMENT, run: (d) => d.shipments.returnToOrigin(GUIDE_ID, 'refused') },
  {
    name: 'noteIncident',
    allowed: OPEN_SHIPMENT,
    run: (d) => d.shipments.noteIncident(GUIDE_ID, INCIDENT_ID, 'Box dented', 'Bogota'),
  },
  {
    name: 'updateEstimatedDelivery',
    allowed: OPEN_SHIPMENT,
    run: (d) => d.shipments.updateEstimatedDelivery(GUIDE_ID, new Date('2026-03-05T17:00:00.000Z')),
  },
]

describe('shipment operations outside their source states', () => {
  it.each(refusals(SHIPMENT_STATUSES, SHIPMENT_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.shipments.save({ ...guide, status, deliveryAttempts: 1, version: 1 })

    await expectRefused(domain, run, () => domain.stores.shipments.findById(GUIDE_ID))
  })
})

// ---------------------------------------------------------------------------
// Incident
// ---------------------------------------------------------------------------

const INCIDENT_OPERATIONS: readonly Operation<IncidentStatus>[] = [
  { name: 'acknowledge', allowed: ['REPORTED'], run: (d) => d.incidents.acknowledge(INCIDENT_ID, 'agent-1') },
  {
    name: 'escalate',
    allowed: ['REPORTED', 'IN_REVIEW'],
    run: (d) => d.incidents.escalate(INCIDENT_ID, 'customer complaint'),
  },
  { name: 'resolve', allowed: ['IN_REVIEW', 'ESCALATED'], run: (d) => d.incidents.resolve(INCIDENT_ID, 'Box replaced') },
  { name: 'close', allowed: ['RESOLVED'], run: (d) => d.incidents.close(INCIDENT_ID) },
  {
    name: 'addEvidence',
    allowed: ['REPORTED', 'IN_REVIEW', 'ESCALATED', 'RESOLVED'],
    run: (d) =>
      d.incidents.addEvidence(INCIDENT_ID, {
        fileType: 'image/jpeg',
        fileUrl: 'https://files.example.com/photo-1.jpg',
        fileName: 'photo-1.jpg',
      }),
  },
]

describe('incident operations outside their source states', () => {
  it.each(refusals(INCIDENT_STATUSES, INCIDENT_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.incidents.save({ ...incident, status, version: 1 })

    await expectRefused(domain, run, () => domain.stores.incidents.findById(INCIDENT_ID))
  })
})

// ---------------------------------------------------------------------------
// Pickup
// ---------------------------------------------------------------------------

const OPEN_PICKUP: readonly PickupStatus[] = ['SCHEDULED', 'CONFIRMED', 'IN_PROGRESS', 'RESCHEDULED']

const PICKUP_OPERATIONS: readonly Operation<PickupStatus>[] = [
  {
    name: 'schedule',
    allowed: ['SCHEDULED', 'RESCHEDULED'],
    run: (d) => d.pickups.schedule(PICKUP_ID, SLOT.startTime, SLOT, OPERATOR_A),
  },
  { name: 'start', allowed: ['CONFIRMED'], run: (d) => d.pickups.start(PICKUP_ID, OPERATOR_A) },
  { name: 'complete', allowed: ['IN_PROGRESS'], run: (d) => d.pickups.complete(PICKUP_ID, { operatorId: OPERATOR_A }) },
  {
    name: 'fail',
    allowed: ['IN_PROGRESS'],
    run: (d) => d.pickups.fail(PICKUP_ID, 'gate_locked', { operatorId: OPERATOR_A }),
  },
  {
    name: 'reschedule',
    allowed: ['CONFIRMED', 'RESCHEDULED'],
    run: (d) => d.pickups.reschedule(PICKUP_ID, SLOT.startTime, SLOT, 'customer asked'),
  },
  { name: 'cancel', allowed: OPEN_PICKUP, run: (d) => d.pickups.cancel(PICKUP_ID, 'duplicate', 'agent-1') },
  { name: 'setPriority', allowed: OPEN_PICKUP, run: (d) => d.pickups.setPriority(PICKUP_ID, 'HIGH') },
  {
    name: 'setPackageDetails',
    allowed: OPEN_PICKUP,
    run: (d) => d.pickups.setPackageDetails(PICKUP_ID, { estimatedPackages: 2, totalWeightKg: 4 }),
  },
  {
    name: 'setSpecialInstructions',
    allowed: OPEN_PICKUP,
    run: (d) => d.pickups.setSpecialInstructions(PICKUP_ID, 'Ring twice'),
  },
]

const POINT_OPERATIONS: readonly Operation<PickupStatus>[] = [
  {
    name: 'assignToPoint',
    allowed: ['SCHEDULED', 'RESCHEDULED'],
    run: (d) => d.pickups.assignToPoint(PICKUP_ID, toPointId('point-1')),
  },
]

describe('pickup operations outside their source states', () => {
  it.each(refusals(PICKUP_STATUSES, PICKUP_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.pickups.save({ ...pickup, status, version: 1 })

    await expectRefused(domain, run, () => domain.stores.pickups.findById(PICKUP_ID))
    expect(domain.ledger.size).toBe(0)
  })

  it.each(refusals(PICKUP_STATUSES, POINT_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.pickups.save({ ...pickup, type: 'POINT_DELIVERY', status, version: 1 })

    await expectRefused(domain, run, () => domain.stores.pickups.findById(PICKUP_ID))
  })
})

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------

const ROUTE_OPERATIONS: readonly Operation<RouteStatus>[] = [
  { name: 'addPickup', allowed: ['PLANNED'], run: (d) => d.routes.addPickup(ROUTE_ID, PICKUP_ID) },
  {
    name: 'removePickup',
    allowed: ['PLANNED', 'IN_PROGRESS'],
    run: (d) => d.routes.removePickup(ROUTE_ID, PICKUP_ID, 'customer asked'),
  },
  { name: 'optimize', allowed: ['PLANNED'], run: (d) => d.routes.optimizeRoute(ROUTE_ID) },
  { name: 'start', allowed: ['PLANNED'], run: (d) => d.routes.startRoute(ROUTE_ID) },
  { name: 'complete', allowed: ['IN_PROGRESS'], run: (d) => d.routes.completeRoute(ROUTE_ID) },
  { name: 'cancel', allowed: ['PLANNED', 'IN_PROGRESS'], run: (d) => d.routes.cancelRoute(ROUTE_ID, 'vehicle broke down') },
]

describe('route operations outside their source states', () => {
  it.each(refusals(ROUTE_STATUSES, ROUTE_OPERATIONS))('$name refuses $status', async ({ status, run }) => {
    const domain = makeTestDomain()
    await domain.stores.pickups.save({ ...pickup, status: 'CONFIRMED', version: 1 })
    await domain.stores.routes.save({ ...route, status, version: 1 })

    await expectRefused(domain, run, () => domain.stores.routes.findById(ROUTE_ID))
  })
})
