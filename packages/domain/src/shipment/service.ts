import type { GuideId, IncidentId, OrderId } from '../identifiers/index'
import { newGuideId } from '../identifiers/index'
import type { ClockSource } from '../shared/clock'
import type { Logger } from '../shared/logger'
import { errorToLog } from '../shared/logger'
import { ConcurrencyConflictError, InvalidStateTransitionError } from '../shared/errors'
import type { Transition } from '../events/index'
import type { EventPublisher } from '../events/publisher'
import type { OrderStore, ShipmentStore } from '../ports/index'
import { findOrThrow } from '../ports/index'
import type { Order } from '../ordering/index'
import { markOrderWithGuide } from '../ordering/index'
import type { GenerateGuideInput, Shipment } from './index'
import {
  cancelShipment,
  deliverShipment,
  generateGuide,
  noteIncident,
  pickUpShipment,
  recordFailedDeliveryAttempt,
  recordTransit,
  returnToOrigin,
  sendOutForDelivery,
  updateEstimatedDelivery,
} from './index'

/** Guide numbers drawn before giving up on finding a free one. */
const GUIDE_ID_ATTEMPTS = 5

export interface ShipmentLifecycleDeps {
  readonly shipments: ShipmentStore
  readonly orders: OrderStore
  readonly publisher: EventPublisher
  readonly clock: ClockSource
  readonly logger: Logger
  readonly newGuideId?: (at: Date) => GuideId
}

/** Drives a shipment from guide generation to delivery, return or cancellation. */
export class ShipmentLifecycle {
  constructor(private readonly deps: ShipmentLifecycleDeps) {}

  /**
   * Generates the guide for a CONFIRMED order and marks the order WITH_GUIDE.
   * Emits `GuideGenerated` on the shipment and `OrderMarkedWithGuide` on the
   * order. When the shipment cannot be saved the order is written back as it
   * was, at the next version.
   *
   * @throws {ConcurrencyConflictError} when no free guide number was drawn.
   */
  async generateGuide(orderId: OrderId, input: GenerateGuideInput): Promise<Shipment> {
    const { orders, shipments, publisher, clock, logger } = this.deps
    const order = await findOrThrow(orders.findById(orderId), 'Order', orderId)
    const existing = await shipments.findByOrder(orderId)
    if (existing !== undefined) {
      throw new InvalidStateTransitionError('Order', order.status, 'generate guide for', `guide ${existing.id} already exists`)
    }

    const now = clock.now()
    const guideId = await this.freeGuideId(now)
    const created = generateGuide(order, guideId, input, now)
    const marked = markOrderWithGuide(order, guideId, now)

    publisher.ensureCapacity('shipment', guideId)
    publisher.ensureCapacity('order', orderId)
    // The order write is the guard: a concurrent call for the same order
    // fails its version check here, before any shipment exists.
    await orders.save(marked.state)
    try {
      await shipments.save(created.state)
    } catch (error: unknown) {
      await this.restoreOrder(order, marked.state, guideId, error)
      throw error
    }
    publisher.publish(created.event, marked.event)

    logger.info('Guide generated', { guideId, orderId, logisticsOperator: input.logisticsOperator })
    return created.state
  }

  async pickup(guideId: GuideId, location: string, operator: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(pickUpShipment(shipment, location, operator, this.deps.clock.now()))
    this.deps.logger.info('Package picked up', { guideId, location, operator })
    return next
  }

  /** First call from PICKED_UP changes status; later calls only record waypoints. */
  async transit(guideId: GuideId, location: string, description = 'Package in transit'): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    return this.commit(recordTransit(shipment, location, description, this.deps.clock.now()))
  }

  async outForDelivery(guideId: GuideId, location?: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(
      sendOutForDelivery(shipment, location ?? shipment.currentLocation, this.deps.clock.now()),
    )
    this.deps.logger.info('Package out for delivery', { guideId })
    return next
  }

  async deliver(guideId: GuideId, recipientName: string, location: string, evidence?: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(deliverShipment(shipment, recipientName, location, evidence, this.deps.clock.now()))
    this.deps.logger.info('Package delivered', { guideId, recipientName })
    return next
  }

  async recordFailedDeliveryAttempt(
    guideId: GuideId,
    attemptNumber: number,
    reason: string,
    location: string,
  ): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(
      recordFailedDeliveryAttempt(shipment, attemptNumber, reason, location, this.deps.clock.now()),
    )
    this.deps.logger.warn('Delivery attempt failed', { guideId, attemptNumber, reason })
    return next
  }

  /**
   * Records a failed final attempt and returns the shipment to origin in one
   * write. Emits `DeliveryAttemptFailed` then `ShipmentReturnedToOrigin`.
   */
  async exhaustDeliveryAttempts(
    guideId: GuideId,
    attemptNumber: number,
    reason: string,
    location: string,
  ): Promise<Shipment> {
    const { shipments, publisher, clock, logger } = this.deps
    const shipment = await this.getShipment(guideId)
    const now = clock.now()
    const failed = recordFailedDeliveryAttempt(shipment, attemptNumber, reason, location, now)
    const returned = returnToOrigin(failed.state, `delivery attempts exhausted: ${reason}`, now)
    const next: Shipment = { ...returned.state, version: shipment.version + 1 }

    publisher.ensureCapacity('shipment', guideId, 2)
    await shipments.save(next)
    publisher.publish(failed.event, returned.event)
    logger.warn('Shipment returned to origin', { guideId, reason, deliveryAttempts: next.deliveryAttempts })
    return next
  }

  /** A new estimate equal to the current one is not recorded. */
  async updateEstimatedDelivery(guideId: GuideId, estimate: Date): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    if (shipment.estimatedDeliveryDate?.getTime() === estimate.getTime()) return shipment
    const next = await this.commit(updateEstimatedDelivery(shipment, estimate, this.deps.clock.now()))
    this.deps.logger.info('Estimated delivery updated', { guideId, estimatedDeliveryDate: estimate.toISOString() })
    return next
  }

  async noteIncident(guideId: GuideId, incidentId: IncidentId, description: string, location: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    return this.commit(noteIncident(shipment, incidentId, description, location, this.deps.clock.now()))
  }

  async cancel(guideId: GuideId, reason: string, cancelledBy: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(cancelShipment(shipment, reason, cancelledBy, this.deps.clock.now()))
    this.deps.logger.info('Shipment cancelled', { guideId, reason, cancelledBy })
    return next
  }

  async returnToOrigin(guideId: GuideId, reason: string): Promise<Shipment> {
    const shipment = await this.getShipment(guideId)
    const next = await this.commit(returnToOrigin(shipment, reason, this.deps.clock.now()))
    this.deps.logger.warn('Shipment returned to origin', { guideId, reason, deliveryAttempts: next.deliveryAttempts })
    return next
  }

  getShipment(guideId: GuideId): Promise<Shipment> {
    return findOrThrow(this.deps.shipments.findById(guideId), 'Shipment', guideId)
  }

  findByOrder(orderId: OrderId): Promise<Shipment | undefined> {
    return this.deps.shipments.findByOrder(orderId)
  }

  private async freeGuideId(at: Date): Promise<GuideId> {
    const generate = this.deps.newGuideId ?? newGuideId
    for (let attempt = 1; ; attempt++) {
      const candidate = generate(at)
      const taken = await this.deps.shipments.findById(candidate)
      if (taken === undefined) return candidate
      if (attempt >= GUIDE_ID_ATTEMPTS) {
        throw new ConcurrencyConflictError('Shipment', candidate, taken.version + 1, 1)
      }
      this.deps.logger.debug('Guide number already taken', { guideId: candidate, attempt })
    }
  }

  private async restoreOrder(previous: Order, written: Order, guideId: GuideId, cause: unknown): Promise<void> {
    const { orders, clock, logger } = this.deps
    const restored: Order = { ...previous, updatedAt: clock.now(), version: written.version + 1 }
    try {
      await orders.save(restored)
      logger.warn('Shipment save failed; order restored', {
        orderId: previous.id,
        guideId,
        error: errorToLog(cause),
      })
    } catch (restoreError: unknown) {
      logger.error('Shipment save failed and the order could not be restored', {
        orderId: previous.id,
        guideId,
        error: errorToLog(cause),
        restoreError: errorToLog(restoreError),
      })
    }
  }

  private commit(transition: Transition<Shipment>): Promise<Shipment> {
    return this.deps.publisher.commit(transition, (state) => this.deps.shipments.save(state))
  }
}
