// ---------------------------------------------------------------------------
// Domain error taxonomy
// Every operation rejects with one of these before mutating anything, so a
// caller can branch on `code` and retry, surface or compensate.
// ---------------------------------------------------------------------------

export type DomainErrorCode =
  | 'INVALID_STATE_TRANSITION'
  | 'VALIDATION_ERROR'
  | 'CAPACITY_EXHAUSTED'
  | 'RETRY_EXHAUSTED'
  | 'INVALID_PICKUP_TYPE'
  | 'NOT_FOUND'
  | 'CONCURRENCY_CONFLICT'
  | 'OUTBOX_OVERFLOW'

/**
 * Base class of every error raised by the domain package.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode

  constructor(message: string) {
    super(message)
    Object.setPrototypeOf(this, new.target.prototype)
    this.name = new.target.name
  }

  /** Capacity conflicts and stale writes can succeed on another try; nothing else can. */
  isRetryable(): boolean {
    return this.code === 'CAPACITY_EXHAUSTED' || this.code === 'CONCURRENCY_CONFLICT'
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError
}

/**
 * An operation was called while the entity is not in one of its precondition states.
 */
export class InvalidStateTransitionError extends DomainError {
  readonly code = 'INVALID_STATE_TRANSITION' as const

  constructor(
    readonly entity: string,
    readonly currentState: string,
    readonly requested: string,
    reason?: string,
  ) {
    super(
      `Cannot ${requested} ${entity} in state ${currentState}` + (reason !== undefined ? `: ${reason}` : ''),
    )
  }
}

/**
 * Malformed caller input. `issues` holds one `path: message` entry per problem.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR' as const

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message)
  }
}

export type CapacityResource = 'TIME_SLOT' | 'OPERATOR_DAY'

/**
 * A time slot or an operator's daily quota is full (or the slot is closed).
 */
export class CapacityExhaustedError extends DomainError {
  readonly code = 'CAPACITY_EXHAUSTED' as const

  constructor(
    readonly resource: CapacityResource,
    readonly resourceId: string,
    readonly limit: number,
    reason = 'capacity exhausted',
  ) {
    super(`${resource} ${resourceId}: ${reason} (limit ${limit})`)
  }
}

/**
 * A delivery retry or pickup request has already consumed `maxAttempts`.
 */
export class RetryExhaustedError extends DomainError {
  readonly code = 'RETRY_EXHAUSTED' as const

  constructor(
    readonly entity: string,
    readonly entityId: string,
    readonly maxAttempts: number,
  ) {
    super(`${entity} ${entityId} has used all ${maxAttempts} attempts`)
  }
}

/**
 * A point-only or direct-only operation was invoked on the wrong pickup type.
 */
export class InvalidPickupTypeError extends DomainError {
  readonly code = 'INVALID_PICKUP_TYPE' as const

  constructor(
    readonly pickupId: string,
    readonly actual: string,
    readonly operation: string,
  ) {
    super(`Pickup ${pickupId} of type ${actual} does not support ${operation}`)
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND' as const

  constructor(
    readonly entity: string,
    readonly entityId: string,
  ) {
    super(`${entity} ${entityId} not found`)
  }
}

/**
 * A save was attempted against a stale version of the aggregate.
 */
export class ConcurrencyConflictError extends DomainError {
  readonly code = 'CONCURRENCY_CONFLICT' as const

  constructor(
    readonly entity: string,
    readonly entityId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(`${entity} ${entityId} was modified concurrently (expected v${expectedVersion}, found v${actualVersion})`)
  }
}

export class OutboxOverflowError extends DomainError {
  readonly code = 'OUTBOX_OVERFLOW' as const

  constructor(
    readonly aggregateKey: string,
    readonly limit: number,
  ) {
    super(`Outbox for ${aggregateKey} already holds ${limit} undrained events`)
  }
}
