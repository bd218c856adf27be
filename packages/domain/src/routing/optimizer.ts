import type { OperatorId, PickupId, RouteId } from '../identifiers/index'
import type { ClockSource } from '../shared/clock'
import type { DomainConfig } from '../shared/config'
import type { Logger } from '../shared/logger'
import type { GeoPoint } from '../shared/types'
import type { Transition } from '../events/index'
import type { EventPublisher } from '../events/publisher'
import type { PickupStore, RouteStore } from '../ports/index'
import { findOrThrow } from '../ports/index'
import type { PickupRequest } from '../pickup/index'
import type { PickupRoute, RouteSummary } from './index'
import {
  addPickupToRoute,
  cancelRoute,
  completeRoute,
  createRoute,
  getRouteSummary,
  optimizeRoute,
  removePickupFromRoute,
  startRoute,
} from './index'

export interface RouteOptimizerDeps {
  readonly routes: RouteStore
  readonly pickups: PickupStore
  readonly publisher: EventPublisher
  readonly clock: ClockSource
  readonly logger: Logger
  readonly config: Pick<DomainConfig, 'routeAverageSpeedKmh' | 'routeServiceMinutesPerStop'>
}

/** Plans, orders and runs an operator's pickup route for one day. */
export class RouteOptimizer {
  constructor(private readonly deps: RouteOptimizerDeps) {}

  async createRoute(
    routeId: RouteId,
    operatorId: OperatorId,
    date: Date,
    pickupIds: readonly PickupId[],
    depot?: GeoPoint,
  ): Promise<PickupRoute> {
    const { routes, publisher, clock, logger } = this.deps
    const pickups = await this.loadPickups(pickupIds)
    const route = await publisher.commit(createRoute(routeId, operatorId, date, pickups, depot, clock.now()), (state) =>
      routes.save(state),
    )
    logger.info('Route created', { routeId, operatorId, pickupCount: pickupIds.length })
    return route
  }

  async addPickup(routeId: RouteId, pickupId: PickupId): Promise<PickupRoute> {
    const route = await this.getRoute(routeId)
    const pickup = await findOrThrow(this.deps.pickups.findById(pickupId), 'PickupRequest', pickupId)
    return this.commit(addPickupToRoute(route, pickup, this.deps.clock.now()))
  }

  async removePickup(routeId: RouteId, pickupId: PickupId, reason: string): Promise<PickupRoute> {
    const route = await this.getRoute(routeId)
    const next = await this.commit(removePickupFromRoute(route, pickupId, reason, this.deps.clock.now()))
    this.deps.logger.info('Pickup removed from route', { routeId, pickupId, reason })
    return next
  }

  async optimizeRoute(routeId: RouteId): Promise<PickupRoute> {
    const { clock, logger, config } = this.deps
    const route = await this.getRoute(routeId)
    const pickups = await this.loadPickups(route.pickupIds)
    const optimized = optimizeRoute(
      route,
      pickups,
      { averageSpeedKmh: config.routeAverageSpeedKmh, serviceMinutesPerStop: config.routeServiceMinutesPerStop },
      clock.now(),
    )
    const next = await this.commit(optimized)
    logger.info('Route optimized', {
      routeId,
      totalDistanceKm: optimized.event.payload.totalDistanceKm,
      estimatedDurationHours: optimized.event.payload.estimatedDurationHours,
    })
    return next
  }

  async startRoute(routeId: RouteId): Promise<PickupRoute> {
    const route = await this.getRoute(routeId)
    const next = await this.commit(startRoute(route, this.deps.clock.now()))
    this.deps.logger.info('Route started', { routeId, operatorId: route.operatorId })
    return next
  }

  /** @throws {InvalidStateTransitionError} while any stop is still open; the route is left unchanged. */
  async completeRoute(routeId: RouteId): Promise<PickupRoute> {
    const route = await this.getRoute(routeId)
    const pickups = await this.loadPickups(route.pickupIds)
    const completed = completeRoute(route, pickups, this.deps.clock.now())
    const next = await this.commit(completed)
    this.deps.logger.info('Route completed', {
      routeId,
      successfulPickups: completed.event.payload.successfulPickups,
      failedPickups: completed.event.payload.failedPickups,
      departedPickups: completed.event.payload.departedPickupIds.length,
    })
    return next
  }

  async cancelRoute(routeId: RouteId, reason: string): Promise<PickupRoute> {
    const route = await this.getRoute(routeId)
    const next = await this.commit(cancelRoute(route, reason, this.deps.clock.now()))
    this.deps.logger.info('Route cancelled', { routeId, reason })
    return next
  }

  getRoute(routeId: RouteId): Promise<PickupRoute> {
    return findOrThrow(this.deps.routes.findById(routeId), 'PickupRoute', routeId)
  }

  async getRouteSummary(routeId: RouteId): Promise<RouteSummary> {
    const route = await this.getRoute(routeId)
    return getRouteSummary(route, await this.loadPickups(route.pickupIds))
  }

  listOperatorRoutes(operatorId: OperatorId): Promise<readonly PickupRoute[]> {
    return this.deps.routes.findByOperator(operatorId)
  }

  private loadPickups(pickupIds: readonly PickupId[]): Promise<PickupRequest[]> {
    return Promise.all(
      pickupIds.map((id) => findOrThrow(this.deps.pickups.findById(id), 'PickupRequest', id)),
    )
  }

  private commit(transition: Transition<PickupRoute>): Promise<PickupRoute> {
    return this.deps.publisher.commit(transition, (state) => this.deps.routes.save(state))
  }
}
