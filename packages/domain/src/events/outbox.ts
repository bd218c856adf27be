import { OutboxOverflowError } from '../shared/errors'
import type { AggregateType, DomainEvent } from './index'

/**
 * Undrained events of one aggregate instance. Bounded: `ensureCapacity` is
 * called before an operation mutates anything, so an overflow never leaves a
 * state change without its event.
 */
export class AggregateOutbox {
  private pending: DomainEvent[] = []

  constructor(
    readonly key: string,
    private readonly limit: number,
  ) {}

  get size(): number {
    return this.pending.length
  }

  ensureCapacity(incoming = 1): void {
    if (this.pending.length + incoming > this.limit) {
      throw new OutboxOverflowError(this.key, this.limit)
    }
  }

  record(event: DomainEvent): void {
    this.ensureCapacity()
    this.pending.push(event)
  }

  peek(): readonly DomainEvent[] {
    return [...this.pending]
  }

  /** Returns the pending events and clears them in one step. */
  drain(): readonly DomainEvent[] {
    const drained = this.pending
    this.pending = []
    return drained
  }
}

const outboxKey = (aggregateType: AggregateType, aggregateId: string): string => `${aggregateType}:${aggregateId}`

/** Routes events to the outbox of their aggregate. */
export class DomainEventBus {
  private readonly outboxes = new Map<string, AggregateOutbox>()

  constructor(private readonly maxPendingPerAggregate: number) {}

  forAggregate(aggregateType: AggregateType, aggregateId: string): AggregateOutbox {
    const key = outboxKey(aggregateType, aggregateId)
    let outbox = this.outboxes.get(key)
    if (outbox === undefined) {
      outbox = new AggregateOutbox(key, this.maxPendingPerAggregate)
      this.outboxes.set(key, outbox)
    }
    return outbox
  }

  ensureCapacity(aggregateType: AggregateType, aggregateId: string, incoming = 1): void {
    this.forAggregate(aggregateType, aggregateId).ensureCapacity(incoming)
  }

  record(event: DomainEvent): void {
    this.forAggregate(event.aggregateType, event.aggregateId).record(event)
  }

  pending(aggregateType: AggregateType, aggregateId: string): readonly DomainEvent[] {
    return this.outboxes.get(outboxKey(aggregateType, aggregateId))?.peek() ?? []
  }

  drain(aggregateType: AggregateType, aggregateId: string): readonly DomainEvent[] {
    const key = outboxKey(aggregateType, aggregateId)
    const outbox = this.outboxes.get(key)
    if (outbox === undefined) return []
    this.outboxes.delete(key)
    return outbox.drain()
  }

  /** Drains every outbox, oldest event first. */
  drainAll(): readonly DomainEvent[] {
    const all: DomainEvent[] = []
    for (const outbox of this.outboxes.values()) all.push(...outbox.drain())
    this.outboxes.clear()
    return all.sort((a, b) => a.sequence - b.sequence)
  }

  get size(): number {
    let total = 0
    for (const outbox of this.outboxes.values()) total += outbox.size
    return total
  }
}
