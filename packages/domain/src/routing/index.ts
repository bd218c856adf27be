// ---------------------------------------------------------------------------
// Routing bounded context
// An operator's ordered list of pickups for one UTC day.
// ---------------------------------------------------------------------------

import type { OperatorId, PickupId, RouteId } from '../identifiers/index'
import { InvalidStateTransitionError, ValidationError } from '../shared/errors'
import type { GeoPoint } from '../shared/types'
import { distanceKm, isSameDay, startOfDay, toDayKey } from '../shared/types'
import type { Transition } from '../events/index'
import { createEvent } from '../events/index'
import type { PickupRequest, PickupStatus } from '../pickup/index'
import { PRIORITY_RANK } from '../pickup/index'

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type RouteStatus = 'PLANNED' | 'IN_PROGRESS' | 'COMPLETED' | 'CANCELLED'

export const ROUTE_STATUSES: readonly RouteStatus[] = ['PLANNED', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED'] as const

export const ROUTE_TRANSITIONS: Readonly<Record<RouteStatus, readonly RouteStatus[]>> = {
  PLANNED: ['IN_PROGRESS', 'CANCELLED'],
  IN_PROGRESS: ['COMPLETED', 'CANCELLED'],
  COMPLETED: [],
  CANCELLED: [],
}

/** Pickup statuses after which a stop needs no more work. */
export const SETTLED_PICKUP_STATUSES: readonly PickupStatus[] = ['COMPLETED', 'FAILED', 'CANCELLED'] as const

export interface RouteEstimate {
  readonly averageSpeedKmh: number
  readonly serviceMinutesPerStop: number
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/**
 * @invariant Every pickup on the route is assigned to `operatorId` and
 *            scheduled on the UTC day of `date`.
 * @invariant `pickupIds` holds no duplicates.
 */
export interface PickupRoute {
  readonly id: RouteId
  readonly operatorId: OperatorId
  /** Start of the route's UTC day. */
  readonly date: Date
  readonly pickupIds: readonly PickupId[]
  readonly status: RouteStatus
  readonly depot?: GeoPoint
  readonly totalDistanceKm?: number
  readonly estimatedDurationHours?: number
  readonly startedAt?: Date
  readonly completedAt?: Date
  readonly cancellationReason?: string
  readonly createdAt: Date
  readonly updatedAt: Date
  readonly version: number
}

export function canRouteTransition(current: RouteStatus, next: RouteStatus): boolean {
  return ROUTE_TRANSITIONS[current].includes(next)
}

function assertRoute(route: PickupRoute, next: RouteStatus, requested: string, reason?: string): void {
  if (!canRouteTransition(route.status, next)) {
    throw new InvalidStateTransitionError('PickupRoute', route.status, requested, reason)
  }
}

function membershipIssues(operatorId: OperatorId, date: Date, pickup: PickupRequest): string[] {
  const issues: string[] = []
  if (pickup.assignedOperatorId !== operatorId) {
    issues.push(`${pickup.id}: must be assigned to operator ${operatorId}`)
  }
  if (pickup.scheduledDate === undefined || !isSameDay(pickup.scheduledDate, date)) {
    issues.push(`${pickup.id}: must be scheduled on ${toDayKey(date)}`)
  }
  return issues
}

/** True when the pickup is still assigned to the route's operator and day. */
export function belongsOnRoute(route: PickupRoute, pickup: PickupRequest): boolean {
  return membershipIssues(route.operatorId, route.date, pickup).length === 0
}

/** PLANNED and IN_PROGRESS routes can still change their stops. */
export function isRouteActive(route: PickupRoute): boolean {
  return route.status === 'PLANNED' || route.status === 'IN_PROGRESS'
}

function isSettled(pickup: PickupRequest): boolean {
  return SETTLED_PICKUP_STATUSES.includes(pickup.status)
}

function countByStatus(pickups: readonly PickupRequest[], status: PickupStatus): number {
  return pickups.filter((p) => p.status === status).length
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

/** @throws {ValidationError} listing every pickup that does not belong on the route. */
export function createRoute(
  id: RouteId,
  operatorId: OperatorId,
  date: Date,
  pickups: readonly PickupRequest[],
  depot: GeoPoint | undefined,
  now: Date,
): Transition<PickupRoute, 'RouteCreated'> {
  const issues = pickups.flatMap((p) => membershipIssues(operatorId, date, p))
  const ids = pickups.map((p) => p.id)
  const duplicates = ids.filter((pid, i) => ids.indexOf(pid) !== i)
  for (const pid of new Set(duplicates)) issues.push(`${pid}: listed more than once`)
  if (issues.length > 0) throw new ValidationError(`Invalid route: ${issues.join('; ')}`, issues)

  const route: PickupRoute = {
    id,
    operatorId,
    date: startOfDay(date),
    pickupIds: ids,
    status: 'PLANNED',
    ...(depot !== undefined ? { depot } : {}),
    createdAt: now,
    updatedAt: now,
    version: 1,
  }
  return {
    state: route,
    event: createEvent('RouteCreated', id, now, {
      operatorId,
      status: route.status,
      date: toDayKey(route.date),
      pickupIds: route.pickupIds,
    }),
  }
}

export function addPickupToRoute(
  route: PickupRoute,
  pickup: PickupRequest,
  now: Date,
): Transition<PickupRoute, 'RoutePickupAdded'> {
  if (route.status !== 'PLANNED') {
    throw new InvalidStateTransitionError('PickupRoute', route.status, 'add pickup to')
  }
  const issues = membershipIssues(route.operatorId, route.date, pickup)
  if (route.pickupIds.includes(pickup.id)) issues.push(`${pickup.id}: already on the route`)
  if (issues.length > 0) throw new ValidationError(`Invalid route stop: ${issues.join('; ')}`, issues)

  const next: PickupRoute = {
    ...route,
    pickupIds: [...route.pickupIds, pickup.id],
    updatedAt: now,
    version: route.version + 1,
  }
  return {
    state: next,
    event: createEvent('RoutePickupAdded', route.id, now, { pickupId: pickup.id, pickupCount: next.pickupIds.length }),
  }
}

/** PLANNED | IN_PROGRESS: drops one stop, keeping the order of the others. */
export function removePickupFromRoute(
  route: PickupRoute,
  pickupId: PickupId,
  reason: string,
  now: Date,
): Transition<PickupRoute, 'RoutePickupRemoved'> {
  if (!isRouteActive(route)) {
    throw new InvalidStateTransitionError('PickupRoute', route.status, 'remove pickup from')
  }
  if (!route.pickupIds.includes(pickupId)) {
    throw new ValidationError(`Invalid route stop: ${pickupId}: not on the route`, [`${pickupId}: not on the route`])
  }
  const next: PickupRoute = {
    ...route,
    pickupIds: route.pickupIds.filter((pid) => pid !== pickupId),
    updatedAt: now,
    version: route.version + 1,
  }
  return {
    state: next,
    event: createEvent('RoutePickupRemoved', route.id, now, { pickupId, reason, pickupCount: next.pickupIds.length }),
  }
}

/**
 * Orders stops by priority, then by great-circle distance from the depot.
 * Within a priority, stops without coordinates keep their relative order
 * after the located ones; with no depot the order within a priority is kept.
 * The sort is stable.
 */
export function orderStops(pickups: readonly PickupRequest[], depot: GeoPoint | undefined): PickupRequest[] {
  const distance = (p: PickupRequest): number =>
    depot !== undefined && p.location !== undefined ? distanceKm(depot, p.location) : Number.POSITIVE_INFINITY
  return pickups
    .map((pickup, index) => ({ pickup, index, rank: PRIORITY_RANK[pickup.priority], km: distance(pickup) }))
    .sort((a, b) => a.rank - b.rank || (a.km === b.km ? 0 : a.km < b.km ? -1 : 1) || a.index - b.index)
    .map((entry) => entry.pickup)
}

/** Depot to first stop to last stop, over the stops that have coordinates. Null without a depot. */
export function pathDistanceKm(stops: readonly PickupRequest[], depot: GeoPoint | undefined): number | null {
  if (depot === undefined) return null
  let total = 0
  let from = depot
  for (const stop of stops) {
    if (stop.location === undefined) continue
    total += distanceKm(from, stop.location)
    from = stop.location
  }
  return total
}

/**
 * PLANNED only. `pickups` are the route's stops in any order; the result
 * covers exactly `route.pickupIds`.
 */
export function optimizeRoute(
  route: PickupRoute,
  pickups: readonly PickupRequest[],
  estimate: RouteEstimate,
  now: Date,
): Transition<PickupRoute, 'RouteOptimized'> {
  if (route.status !== 'PLANNED') {
    throw new InvalidStateTransitionError('PickupRoute', route.status, 'optimize')
  }
  const stops = route.pickupIds.map((pid) => {
    const found = pickups.find((p) => p.id === pid)
    if (found === undefined) {
      throw new ValidationError(`Invalid route optimization: pickup ${pid} was not supplied`, [`${pid}: missing`])
    }
    return found
  })

  const ordered = orderStops(stops, route.depot)
  const totalDistanceKm = pathDistanceKm(ordered, route.depot)
  const travelHours = totalDistanceKm !== null ? totalDistanceKm / estimate.averageSpeedKmh : 0
  const estimatedDurationHours = travelHours + (ordered.length * estimate.serviceMinutesPerStop) / 60
  const pickupIds = ordered.map((p) => p.id)

  const next: PickupRoute = {
    ...route,
    pickupIds,
    ...(totalDistanceKm !== null ? { totalDistanceKm } : {}),
    estimatedDurationHours,
    updatedAt: now,
    version: route.version + 1,
  }
  return {
    state: next,
    event: createEvent('RouteOptimized', route.id, now, {
      operatorId: route.operatorId,
      previousOrder: route.pickupIds,
      pickupIds,
      totalDistanceKm,
      estimatedDurationHours,
    }),
  }
}

export function startRoute(route: PickupRoute, now: Date): Transition<PickupRoute, 'RouteStarted'> {
  assertRoute(route, 'IN_PROGRESS', 'start')
  const next: PickupRoute = { ...route, status: 'IN_PROGRESS', startedAt: now, updatedAt: now, version: route.version + 1 }
  return {
    state: next,
    event: createEvent('RouteStarted', route.id, now, {
      from: route.status,
      to: next.status,
      startedAt: now,
      firstPickupId: route.pickupIds[0] ?? null,
    }),
  }
}

/**
 * IN_PROGRESS → COMPLETED once every stop is COMPLETED, FAILED or CANCELLED.
 * Stops that were moved to another operator or day no longer hold the route
 * open; the event lists them as departed.
 *
 * @throws {InvalidStateTransitionError} naming the unsettled stops otherwise.
 */
export function completeRoute(
  route: PickupRoute,
  pickups: readonly PickupRequest[],
  now: Date,
): Transition<PickupRoute, 'RouteCompleted'> {
  assertRoute(route, 'COMPLETED', 'complete')
  const onRoute = pickups.filter((p) => route.pickupIds.includes(p.id))
  const stops = onRoute.filter((p) => belongsOnRoute(route, p))
  const departed = onRoute.filter((p) => !belongsOnRoute(route, p)).map((p) => p.id)
  const pending = route.pickupIds.filter(
    (pid) => !departed.includes(pid) && !stops.some((p) => p.id === pid && isSettled(p)),
  )
  if (pending.length > 0) {
    throw new InvalidStateTransitionError('PickupRoute', route.status, 'complete', `pending pickups: ${pending.join(', ')}`)
  }
  const next: PickupRoute = { ...route, status: 'COMPLETED', completedAt: now, updatedAt: now, version: route.version + 1 }
  return {
    state: next,
    event: createEvent('RouteCompleted', route.id, now, {
      from: route.status,
      to: next.status,
      completedAt: now,
      successfulPickups: countByStatus(stops, 'COMPLETED'),
      failedPickups: countByStatus(stops, 'FAILED'),
      cancelledPickups: countByStatus(stops, 'CANCELLED'),
      departedPickupIds: departed,
    }),
  }
}

export function cancelRoute(route: PickupRoute, reason: string, now: Date): Transition<PickupRoute, 'RouteCancelled'> {
  assertRoute(route, 'CANCELLED', 'cancel')
  const next: PickupRoute = {
    ...route,
    status: 'CANCELLED',
    cancellationReason: reason,
    updatedAt: now,
    version: route.version + 1,
  }
  return {
    state: next,
    event: createEvent('RouteCancelled', route.id, now, { from: route.status, to: next.status, reason }),
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export interface RouteSummary {
  readonly routeId: RouteId
  readonly operatorId: OperatorId
  readonly date: string
  readonly status: RouteStatus
  readonly totalPickups: number
  readonly completedPickups: number
  readonly failedPickups: number
  readonly cancelledPickups: number
  readonly pendingPickups: number
  /** Stops since moved to another operator or day. */
  readonly departedPickups: number
  /** completed / total, 0 for an empty route. */
  readonly successRate: number
  readonly startedAt: Date | null
  readonly completedAt: Date | null
  readonly totalDistanceKm: number | null
  readonly estimatedDurationHours: number | null
}

export function getRouteSummary(route: PickupRoute, pickups: readonly PickupRequest[]): RouteSummary {
  const onRoute = pickups.filter((p) => route.pickupIds.includes(p.id))
  const stops = onRoute.filter((p) => belongsOnRoute(route, p))
  const departed = onRoute.length - stops.length
  const total = route.pickupIds.length
  const completed = countByStatus(stops, 'COMPLETED')
  return {
    routeId: route.id,
    operatorId: route.operatorId,
    date: toDayKey(route.date),
    status: route.status,
    totalPickups: total,
    completedPickups: completed,
    failedPickups: countByStatus(stops, 'FAILED'),
    cancelledPickups: countByStatus(stops, 'CANCELLED'),
    pendingPickups: total - departed - stops.filter(isSettled).length,
    departedPickups: departed,
    successRate: total > 0 ? completed / total : 0,
    startedAt: route.startedAt ?? null,
    completedAt: route.completedAt ?? null,
    totalDistanceKm: route.totalDistanceKm ?? null,
    estimatedDurationHours: route.estimatedDurationHours ?? null,
  }
}
