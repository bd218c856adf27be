// ---------------------------------------------------------------------------
// Ordering bounded context
// Owns the commercial record of a shipment request: who sends what to whom,
// the quote, and the customer's confirmation. Hands over to the shipment
// context once a guide is generated.
// ---------------------------------------------------------------------------

import { z } from 'zod'
import type { CustomerId, GuideId, OrderId } from '../identifiers/index'
import { toCustomerId } from '../identifiers/index'
import type { Money, PackageDimensions } from '../shared/types'
import { billableWeightKg, createMoney, DEFAULT_CURRENCY } from '../shared/types'
import { InvalidStateTransitionError, ValidationError } from '../shared/errors'
import { parseOrThrow } from '../shared/validation'
import type { Transition } from '../events/index'
import { createEvent } from '../events/index'

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of an Order.
 *
 * Allowed transitions:
 *   PENDING → QUOTED → CONFIRMED → WITH_GUIDE
 *   PENDING | QUOTED | CONFIRMED → CANCELLED
 */
export type OrderStatus = 'PENDING' | 'QUOTED' | 'CONFIRMED' | 'WITH_GUIDE' | 'CANCELLED'

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'PENDING',
  'QUOTED',
  'CONFIRMED',
  'WITH_GUIDE',
  'CANCELLED',
] as const

export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  PENDING: ['QUOTED', 'CANCELLED'],
  QUOTED: ['CONFIRMED', 'CANCELLED'],
  CONFIRMED: ['WITH_GUIDE', 'CANCELLED'],
  WITH_GUIDE: [],
  CANCELLED: [],
}

export type ServiceType = 'NATIONAL' | 'INTERNATIONAL'

export interface Recipient {
  readonly name: string
  readonly phone: string
  readonly email: string
  readonly address: string
  readonly city: string
  readonly country: string
  readonly postalCode: string
}

export interface Cancellation {
  readonly reason: string
  readonly cancelledBy: string
  readonly at: Date
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/**
 * The Order aggregate root.
 *
 * @invariant `quotedPrice` and `estimatedDeliveryDays` are set from QUOTED on.
 * @invariant An order in WITH_GUIDE can never be cancelled; the shipment
 *            context owns it from then on.
 */
export interface Order {
  readonly id: OrderId
  readonly customerId: CustomerId
  readonly recipient: Recipient
  readonly packageDimensions: PackageDimensions
  readonly declaredValue: Money
  readonly serviceType: ServiceType
  readonly status: OrderStatus
  readonly originAddress: string
  readonly originCity: string
  readonly notes: string
  readonly quotedPrice?: Money
  readonly estimatedDeliveryDays?: number
  readonly logisticsOperator?: string
  readonly paymentMethod?: string
  readonly confirmedAt?: Date
  readonly guideId?: GuideId
  readonly cancellation?: Cancellation
  readonly createdAt: Date
  readonly updatedAt: Date
  readonly version: number
}

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

const required = z.string().trim().min(1, 'is required')

const RecipientSchema = z.object({
  name: required,
  phone: required,
  email: z.string().trim().email('must be a valid email'),
  address: required,
  city: required,
  country: z.string().trim().min(1).default('Colombia'),
  postalCode: z.string().trim().default(''),
})

const DimensionsSchema = z.object({
  lengthCm: z.number().positive(),
  widthCm: z.number().positive(),
  heightCm: z.number().positive(),
  weightKg: z.number().positive(),
})

export const CreateOrderInputSchema = z.object({
  customerId: required,
  recipient: RecipientSchema,
  packageDimensions: DimensionsSchema,
  declaredValue: z.number().min(0, 'must not be negative'),
  currency: z.string().length(3).default(DEFAULT_CURRENCY),
  serviceType: z.enum(['NATIONAL', 'INTERNATIONAL']).default('NATIONAL'),
  originAddress: required,
  originCity: required,
  notes: z.string().default(''),
})

export type CreateOrderInput = z.input<typeof CreateOrderInputSchema>

export interface OrderQuote {
  readonly price: Money
  readonly deliveryDays: number
  readonly logisticsOperator?: string
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

/** Returns true when an order can legally move from `current` to `next`. */
export function canOrderTransition(current: OrderStatus, next: OrderStatus): boolean {
  return ORDER_TRANSITIONS[current].includes(next)
}

export function isInternational(order: Order): boolean {
  return order.serviceType === 'INTERNATIONAL'
}

export function orderBillableWeightKg(order: Order): number {
  return billableWeightKg(order.packageDimensions)
}

function assertTransition(order: Order, next: OrderStatus, requested: string, reason?: string): void {
  if (!canOrderTransition(order.status, next)) {
    throw new InvalidStateTransitionError('Order', order.status, requested, reason)
  }
}

function advance(order: Order, status: OrderStatus, now: Date, patch: Partial<Order> = {}): Order {
  return { ...order, ...patch, status, updatedAt: now, version: order.version + 1 }
}

/**
 * Validates `input` and creates a PENDING order.
 *
 * @throws {ValidationError} listing every invalid field.
 */
export function createOrder(id: OrderId, input: CreateOrderInput, now: Date): Transition<Order, 'OrderCreated'> {
  const parsed = parseOrThrow(CreateOrderInputSchema, input, 'order')
  const order: Order = {
    id,
    customerId: toCustomerId(parsed.customerId),
    recipient: parsed.recipient,
    packageDimensions: parsed.packageDimensions,
    declaredValue: createMoney(parsed.declaredValue, parsed.currency),
    serviceType: parsed.serviceType,
    status: 'PENDING',
    originAddress: parsed.originAddress,
    originCity: parsed.originCity,
    notes: parsed.notes,
    createdAt: now,
    updatedAt: now,
    version: 1,
  }
  return {
    state: order,
    event: createEvent('OrderCreated', id, now, {
      customerId: order.customerId,
      status: order.status,
      serviceType: order.serviceType,
      originCity: order.originCity,
      destinationCity: order.recipient.city,
      declaredValue: order.declaredValue,
    }),
  }
}

/**
 * PENDING → QUOTED.
 *
 * @throws {ValidationError} when the price is negative or the delivery days
 *         are not a positive integer.
 */
export function quoteOrder(order: Order, quote: OrderQuote, now: Date): Transition<Order, 'OrderQuoted'> {
  assertTransition(order, 'QUOTED', 'quote')
  const issues: string[] = []
  if (!Number.isFinite(quote.price.amount) || quote.price.amount < 0) issues.push('price: must not be negative')
  if (!Number.isInteger(quote.deliveryDays) || quote.deliveryDays < 1) {
    issues.push('deliveryDays: must be a positive integer')
  }
  if (issues.length > 0) throw new ValidationError(`Invalid quote: ${issues.join('; ')}`, issues)

  const next = advance(order, 'QUOTED', now, {
    quotedPrice: quote.price,
    estimatedDeliveryDays: quote.deliveryDays,
    ...(quote.logisticsOperator !== undefined ? { logisticsOperator: quote.logisticsOperator } : {}),
  })
  return {
    state: next,
    event: createEvent('OrderQuoted', order.id, now, {
      from: order.status,
      to: next.status,
      quotedPrice: quote.price,
      estimatedDeliveryDays: quote.deliveryDays,
      logisticsOperator: quote.logisticsOperator ?? null,
    }),
  }
}

/** QUOTED → CONFIRMED. */
export function confirmOrder(order: Order, paymentMethod: string | undefined, now: Date): Transition<Order, 'OrderConfirmed'> {
  assertTransition(order, 'CONFIRMED', 'confirm')
  const next = advance(order, 'CONFIRMED', now, {
    confirmedAt: now,
    ...(paymentMethod !== undefined ? { paymentMethod } : {}),
  })
  return {
    state: next,
    event: createEvent('OrderConfirmed', order.id, now, {
      from: order.status,
      to: next.status,
      confirmedPrice: order.quotedPrice ?? null,
      paymentMethod: paymentMethod ?? null,
    }),
  }
}

/**
 * Any non-terminal state except WITH_GUIDE → CANCELLED.
 */
export function cancelOrder(
  order: Order,
  reason: string,
  cancelledBy: string,
  now: Date,
): Transition<Order, 'OrderCancelled'> {
  if (order.status === 'WITH_GUIDE') {
    throw new InvalidStateTransitionError(
      'Order',
      order.status,
      'cancel',
      'cannot cancel a shipment already handed to logistics',
    )
  }
  assertTransition(order, 'CANCELLED', 'cancel')
  const next = advance(order, 'CANCELLED', now, { cancellation: { reason, cancelledBy, at: now } })
  return {
    state: next,
    event: createEvent('OrderCancelled', order.id, now, {
      from: order.status,
      to: next.status,
      reason,
      cancelledBy,
    }),
  }
}

/** CONFIRMED → WITH_GUIDE. */
export function markOrderWithGuide(order: Order, guideId: GuideId, now: Date): Transition<Order, 'OrderMarkedWithGuide'> {
  assertTransition(order, 'WITH_GUIDE', 'mark with guide')
  const next = advance(order, 'WITH_GUIDE', now, { guideId })
  return {
    state: next,
    event: createEvent('OrderMarkedWithGuide', order.id, now, {
      from: order.status,
      to: next.status,
      guideId,
    }),
  }
}
