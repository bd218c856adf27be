import type { CreateOrderInput } from '../ordering/index'
import type { PickupRequestInput, PickupTimeSlot } from '../pickup/index'
import type { Shipment } from '../shipment/index'
import type { DomainConfig } from '../shared/config'
import { defineConfig } from '../shared/config'
import type { ManualClock } from '../shared/clock'
import { createManualClock } from '../shared/clock'
import { silentLogger } from '../shared/logger'
import { addHours, createMoney } from '../shared/types'
import type { OperatorId } from '../identifiers/index'
import { toOperatorId, toTimeSlotId } from '../identifiers/index'
import type { InMemoryDomain, InMemoryDomainOptions } from '../domain'
import { createInMemoryDomain } from '../domain'
import { InMemoryShipmentStore } from '../stores/in-memory'

/** Monday 2026-03-02, 08:00 UTC. */
export const T0 = new Date('2026-03-02T08:00:00.000Z')

export const OPERATOR_A: OperatorId = toOperatorId('operator-a')
export const OPERATOR_B: OperatorId = toOperatorId('operator-b')

export interface TestDomain extends InMemoryDomain {
  readonly clock: ManualClock
}

export function makeTestDomain(
  overrides: Partial<DomainConfig> = {},
  options: Omit<InMemoryDomainOptions, 'clock' | 'logger' | 'config'> = {},
): TestDomain {
  const clock = createManualClock(T0)
  const domain = createInMemoryDomain({ ...options, clock, logger: silentLogger, config: defineConfig(overrides) })
  return { ...domain, clock }
}

/** Rejects the next save after `failNextSave` is set. */
export class FlakyShipmentStore extends InMemoryShipmentStore {
  failNextSave = false

  override async save(shipment: Shipment): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false
      throw new Error('connection reset')
    }
    return super.save(shipment)
  }
}

/** A promise the test settles by hand. */
export function deferred(): { readonly promise: Promise<void>; readonly resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((settle) => {
    resolve = () => settle()
  })
  return { promise, resolve }
}

export function makeOrderInput(overrides: Partial<CreateOrderInput> = {}): CreateOrderInput {
  return {
    customerId: 'customer-1',
    recipient: {
      name: 'Ana Test',
      phone: '3000000000',
      email: 'ana@example.com',
      address: 'Calle 1 # 2-3',
      city: 'Medellin',
    },
    packageDimensions: { lengthCm: 30, widthCm: 20, heightCm: 10, weightKg: 2 },
    declaredValue: 100000,
    originAddress: 'Carrera 7 # 8-9',
    originCity: 'Bogota',
    ...overrides,
  }
}

export function makePickupInput(guideId: string, overrides: Partial<PickupRequestInput> = {}): PickupRequestInput {
  return {
    guideId,
    customerId: 'customer-1',
    customerTier: 'MEDIUM',
    pickupAddress: 'Carrera 7 # 8-9, Bogota',
    contactName: 'Luis Test',
    contactPhone: '3100000000',
    ...overrides,
  }
}

/** A two-hour slot starting at `start`. */
export function makeSlot(
  id: string,
  operatorId: OperatorId,
  start: string,
  overrides: Partial<PickupTimeSlot> = {},
): PickupTimeSlot {
  const startTime = new Date(start)
  return {
    id: toTimeSlotId(id),
    operatorId,
    startTime,
    endTime: addHours(startTime, 2),
    isAvailable: true,
    maxPickups: 10,
    ...overrides,
  }
}

/** Runs an order through to a GENERATED shipment. */
export async function createGuide(domain: InMemoryDomain): Promise<Shipment> {
  const order = await domain.orders.createOrder(makeOrderInput())
  await domain.orders.quote(order.id, createMoney(25000), 3)
  await domain.orders.confirm(order.id, 'card')
  return domain.shipments.generateGuide(order.id, { logisticsOperator: 'test-carrier' })
}

/** Runs an order through to an OUT_FOR_DELIVERY shipment. */
export async function dispatchShipment(domain: InMemoryDomain): Promise<Shipment> {
  const guide = await createGuide(domain)
  await domain.shipments.pickup(guide.id, 'Bogota hub', 'courier-1')
  await domain.shipments.transit(guide.id, 'Bogota hub')
  return domain.shipments.outForDelivery(guide.id)
}
