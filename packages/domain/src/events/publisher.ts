import type { Logger } from '../shared/logger'
import { errorToLog } from '../shared/logger'
import type { NotificationPort } from '../ports/index'
import type { AggregateType, DomainEvent, Transition } from './index'
import type { DomainEventBus } from './outbox'

/** Notification port that drops every event. */
export const noopNotifier: NotificationPort = {
  notify: () => undefined,
}

/**
 * Records committed events on the bus and offers each one to the
 * notification port. Notification is never awaited; a failing notifier is
 * logged and the operation that produced the event still succeeds.
 */
export class EventPublisher {
  constructor(
    private readonly bus: DomainEventBus,
    private readonly notifier: NotificationPort,
    private readonly logger: Logger,
  ) {}

  /** Throws OutboxOverflowError when the aggregate cannot take `incoming` more events. */
  ensureCapacity(aggregateType: AggregateType, aggregateId: string, incoming = 1): void {
    this.bus.ensureCapacity(aggregateType, aggregateId, incoming)
  }

  /**
   * Checks outbox room, persists the new state, then publishes the event.
   * Nothing is recorded when `save` rejects.
   */
  async commit<S>(transition: Transition<S>, save: (state: S) => Promise<void>): Promise<S> {
    const { state, event } = transition
    this.ensureCapacity(event.aggregateType, event.aggregateId)
    await save(state)
    this.publish(event)
    return state
  }

  publish(...events: readonly DomainEvent[]): void {
    for (const event of events) {
      this.bus.record(event)
      this.logger.debug(`${event.type} recorded`, {
        aggregateType: event.aggregateType,
        aggregateId: event.aggregateId,
        eventId: event.eventId,
      })
      this.notify(event)
    }
  }

  private notify(event: DomainEvent): void {
    void Promise.resolve()
      .then(() => this.notifier.notify(event))
      .catch((error: unknown) => {
        this.logger.error('Event notification failed', {
          eventType: event.type,
          aggregateId: event.aggregateId,
          error: errorToLog(error),
        })
      })
  }
}
