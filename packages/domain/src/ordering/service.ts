import type { CustomerId, GuideId, OrderId } from '../identifiers/index'
import { newOrderId } from '../identifiers/index'
import type { Money } from '../shared/types'
import type { ClockSource } from '../shared/clock'
import type { Logger } from '../shared/logger'
import type { Transition } from '../events/index'
import type { EventPublisher } from '../events/publisher'
import type { OrderStore } from '../ports/index'
import { findOrThrow } from '../ports/index'
import type { CreateOrderInput, Order } from './index'
import { cancelOrder, confirmOrder, createOrder, markOrderWithGuide, quoteOrder } from './index'

export interface OrderLifecycleDeps {
  readonly orders: OrderStore
  readonly publisher: EventPublisher
  readonly clock: ClockSource
  readonly logger: Logger
  readonly newId?: () => OrderId
}

/** Drives an order from creation to hand-over (or cancellation). */
export class OrderLifecycle {
  constructor(private readonly deps: OrderLifecycleDeps) {}

  async createOrder(input: CreateOrderInput): Promise<Order> {
    const id = (this.deps.newId ?? newOrderId)()
    const order = await this.commit(createOrder(id, input, this.deps.clock.now()))
    this.deps.logger.info('Order created', { orderId: order.id, customerId: order.customerId })
    return order
  }

  async quote(orderId: OrderId, price: Money, deliveryDays: number, logisticsOperator?: string): Promise<Order> {
    const order = await this.getOrder(orderId)
    const quote = { price, deliveryDays, ...(logisticsOperator !== undefined ? { logisticsOperator } : {}) }
    const next = await this.commit(quoteOrder(order, quote, this.deps.clock.now()))
    this.deps.logger.info('Order quoted', { orderId, amount: price.amount, currency: price.currency, deliveryDays })
    return next
  }

  async confirm(orderId: OrderId, paymentMethod?: string): Promise<Order> {
    const order = await this.getOrder(orderId)
    const next = await this.commit(confirmOrder(order, paymentMethod, this.deps.clock.now()))
    this.deps.logger.info('Order confirmed', { orderId })
    return next
  }

  async cancel(orderId: OrderId, reason: string, cancelledBy: string): Promise<Order> {
    const order = await this.getOrder(orderId)
    const next = await this.commit(cancelOrder(order, reason, cancelledBy, this.deps.clock.now()))
    this.deps.logger.info('Order cancelled', { orderId, reason, cancelledBy })
    return next
  }

  async markWithGuide(orderId: OrderId, guideId: GuideId): Promise<Order> {
    const order = await this.getOrder(orderId)
    return this.commit(markOrderWithGuide(order, guideId, this.deps.clock.now()))
  }

  getOrder(orderId: OrderId): Promise<Order> {
    return findOrThrow(this.deps.orders.findById(orderId), 'Order', orderId)
  }

  listCustomerOrders(customerId: CustomerId): Promise<readonly Order[]> {
    return this.deps.orders.findByCustomer(customerId)
  }

  private commit(transition: Transition<Order>): Promise<Order> {
    return this.deps.publisher.commit(transition, (state) => this.deps.orders.save(state))
  }
}
