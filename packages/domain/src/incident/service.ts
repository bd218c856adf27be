import type { GuideId, IncidentId, RetryId } from '../identifiers/index'
import { newIncidentId, newRetryId } from '../identifiers/index'
import type { ClockSource } from '../shared/clock'
import type { DomainConfig } from '../shared/config'
import type { Logger } from '../shared/logger'
import { errorToLog } from '../shared/logger'
import { InvalidStateTransitionError, ValidationError } from '../shared/errors'
import type { Transition } from '../events/index'
import type { EventPublisher } from '../events/publisher'
import type { DeliveryRetryStore, IncidentStore } from '../ports/index'
import { findOrThrow } from '../ports/index'
import type { Shipment } from '../shipment/index'
import { isShipmentTerminal } from '../shipment/index'
import type { ShipmentLifecycle } from '../shipment/service'
import type {
  DeliveryAttemptInput,
  DeliveryRetry,
  EvidenceInput,
  Incident,
  ReportIncidentInput,
} from './index'
import {
  abandonDeliveryRetry,
  acknowledgeIncident,
  addIncidentEvidence,
  closeIncident,
  escalateIncident,
  isIncidentActive,
  openDeliveryRetry,
  recordDeliveryAttempt,
  reportIncident,
  resolveIncident,
  resolutionTimeHours,
} from './index'

export interface IncidentManagerDeps {
  readonly incidents: IncidentStore
  readonly retries: DeliveryRetryStore
  readonly shipments: ShipmentLifecycle
  readonly publisher: EventPublisher
  readonly clock: ClockSource
  readonly logger: Logger
  readonly config: Pick<DomainConfig, 'deliveryMaxAttempts' | 'autoRescheduleReasons' | 'deliveryWindowStartHour'>
  readonly newIncidentId?: () => IncidentId
  readonly newRetryId?: () => RetryId
}

export interface DeliveryAttemptRequest extends DeliveryAttemptInput {
  /** Required when the outcome is SUCCESS. */
  readonly recipientName?: string
  readonly evidence?: string
}

export interface DeliveryAttemptResult {
  /** Null when a first-attempt success delivered without opening a retry. */
  readonly retry: DeliveryRetry | null
  readonly shipment: Shipment
  readonly autoReschedule: boolean
  /** Proposed start of the next attempt, or null when none is proposed. */
  readonly nextAttemptAt: Date | null
}

/**
 * Records incidents against shipments and runs the bounded delivery-retry
 * policy, driving the shipment to DELIVERED or RETURNED as attempts resolve.
 */
export class IncidentManager {
  constructor(private readonly deps: IncidentManagerDeps) {}

  // -------------------------------------------------------------------------
  // Incidents
  // -------------------------------------------------------------------------

  async reportIncident(guideId: GuideId, input: ReportIncidentInput): Promise<Incident> {
    const { shipments, incidents, publisher, clock, logger } = this.deps
    const shipment = await shipments.getShipment(guideId)
    const id = (this.deps.newIncidentId ?? newIncidentId)()
    const incident = await publisher.commit(reportIncident(id, guideId, input, clock.now()), (state) =>
      incidents.save(state),
    )
    if (!isShipmentTerminal(shipment.status)) {
      await shipments.noteIncident(guideId, id, incident.title, incident.location)
    }
    logger.warn('Incident reported', { incidentId: id, guideId, type: incident.type, severity: incident.severity })
    return incident
  }

  async acknowledge(incidentId: IncidentId, assignee: string): Promise<Incident> {
    const incident = await this.getIncident(incidentId)
    return this.commit(acknowledgeIncident(incident, assignee, this.deps.clock.now()))
  }

  async escalate(incidentId: IncidentId, reason: string): Promise<Incident> {
    const incident = await this.getIncident(incidentId)
    const next = await this.commit(escalateIncident(incident, reason, this.deps.clock.now()))
    this.deps.logger.warn('Incident escalated', { incidentId, reason, severity: next.severity })
    return next
  }

  async resolve(incidentId: IncidentId, resolutionNotes: string): Promise<Incident> {
    const incident = await this.getIncident(incidentId)
    const next = await this.commit(resolveIncident(incident, resolutionNotes, this.deps.clock.now()))
    this.deps.logger.info('Incident resolved', { incidentId, resolutionTimeHours: resolutionTimeHours(next) })
    return next
  }

  async close(incidentId: IncidentId): Promise<Incident> {
    const incident = await this.getIncident(incidentId)
    return this.commit(closeIncident(incident, this.deps.clock.now()))
  }

  async addEvidence(incidentId: IncidentId, evidence: EvidenceInput): Promise<Incident> {
    const incident = await this.getIncident(incidentId)
    return this.commit(addIncidentEvidence(incident, evidence, this.deps.clock.now()))
  }

  getIncident(incidentId: IncidentId): Promise<Incident> {
    return findOrThrow(this.deps.incidents.findById(incidentId), 'Incident', incidentId)
  }

  listIncidents(guideId: GuideId): Promise<readonly Incident[]> {
    return this.deps.incidents.findByGuide(guideId)
  }

  /** True while any incident on the guide is REPORTED, IN_REVIEW or ESCALATED. */
  async hasActiveIncidents(guideId: GuideId): Promise<boolean> {
    const incidents = await this.deps.incidents.findByGuide(guideId)
    return incidents.some(isIncidentActive)
  }

  // -------------------------------------------------------------------------
  // Delivery retry policy
  // -------------------------------------------------------------------------

  /**
   * Records one delivery attempt for a shipment that is OUT_FOR_DELIVERY and
   * applies its consequence to the shipment: delivery on success, a failed
   * attempt entry otherwise, and a return to origin once attempts run out.
   * The retry is opened by the first failure; a first-attempt success
   * delivers without one.
   *
   * The retry is written first and acts as the guard against concurrent
   * attempts. When the shipment write then fails, the retry is written back
   * as it was and the error propagates.
   *
   * @throws {RetryExhaustedError} when the retry is closed or out of attempts.
   */
  async attempt(guideId: GuideId, request: DeliveryAttemptRequest): Promise<DeliveryAttemptResult> {
    const { retries, shipments, publisher, clock, logger, config } = this.deps
    const now = clock.now()
    const existing = await retries.findByGuide(guideId)
    const retry =
      existing ??
      (request.outcome === 'SUCCESS'
        ? undefined
        : openDeliveryRetry((this.deps.newRetryId ?? newRetryId)(), guideId, config.deliveryMaxAttempts, now))
    const recorded = retry !== undefined ? recordDeliveryAttempt(retry, request, config, now) : undefined

    const recipientName = request.recipientName?.trim() ?? ''
    if (request.outcome === 'SUCCESS' && recipientName === '') {
      throw new ValidationError('Invalid delivery attempt: recipientName is required', ['recipientName: is required'])
    }
    const shipment = await shipments.getShipment(guideId)
    if (shipment.status !== 'OUT_FOR_DELIVERY') {
      throw new InvalidStateTransitionError('Shipment', shipment.status, 'attempt delivery of')
    }
    const location = request.location !== undefined && request.location !== '' ? request.location : shipment.currentLocation

    if (retry === undefined || recorded === undefined) {
      const delivered = await shipments.deliver(guideId, recipientName, location, request.evidence)
      return { retry: null, shipment: delivered, autoReschedule: false, nextAttemptAt: null }
    }

    const { attemptNumber, outcome, failureReason, autoReschedule, nextAttemptAt } = recorded.event.payload
    publisher.ensureCapacity(recorded.event.aggregateType, recorded.event.aggregateId)
    await retries.save(recorded.state)

    let updated: Shipment
    try {
      if (outcome === 'SUCCESS') {
        updated = await shipments.deliver(guideId, recipientName, location, request.evidence)
      } else {
        const reason = failureReason ?? outcome.toLowerCase()
        updated =
          recorded.state.status === 'RETURNED'
            ? await shipments.exhaustDeliveryAttempts(guideId, attemptNumber, reason, location)
            : await shipments.recordFailedDeliveryAttempt(guideId, attemptNumber, reason, location)
      }
    } catch (error: unknown) {
      await this.restoreRetry(retry, recorded.state, error)
      throw error
    }
    publisher.publish(recorded.event)

    if (recorded.state.status === 'OPEN') {
      if (nextAttemptAt !== null) {
        logger.info('Next delivery attempt proposed', { guideId, nextAttemptAt: nextAttemptAt.toISOString() })
      } else {
        logger.warn('Delivery failed; manual rescheduling required', { guideId, reason: failureReason })
      }
    }
    return { retry: recorded.state, shipment: updated, autoReschedule, nextAttemptAt }
  }

  async abandon(guideId: GuideId, reason: string): Promise<DeliveryRetry> {
    const { retries, publisher, clock, logger } = this.deps
    const retry = await this.getDeliveryRetry(guideId)
    const next = await publisher.commit(abandonDeliveryRetry(retry, reason, clock.now()), (state) => retries.save(state))
    logger.info('Delivery retry abandoned', { guideId, reason })
    return next
  }

  getDeliveryRetry(guideId: GuideId): Promise<DeliveryRetry> {
    return findOrThrow(this.deps.retries.findByGuide(guideId), 'DeliveryRetry', guideId)
  }

  /** Writes `previous` back over `written`, logging when even that fails. */
  private async restoreRetry(previous: DeliveryRetry, written: DeliveryRetry, cause: unknown): Promise<void> {
    const { retries, clock, logger } = this.deps
    const restored: DeliveryRetry = { ...previous, updatedAt: clock.now(), version: written.version + 1 }
    try {
      await retries.save(restored)
      logger.warn('Shipment update failed; delivery attempt withdrawn', {
        guideId: written.guideId,
        attemptNumber: written.attempts.length,
        error: errorToLog(cause),
      })
    } catch (restoreError: unknown) {
      logger.error('Shipment update failed and the delivery attempt could not be withdrawn', {
        guideId: written.guideId,
        attemptNumber: written.attempts.length,
        error: errorToLog(cause),
        restoreError: errorToLog(restoreError),
      })
    }
  }

  private commit(transition: Transition<Incident>): Promise<Incident> {
    return this.deps.publisher.commit(transition, (state) => this.deps.incidents.save(state))
  }
}
