// ---------------------------------------------------------------------------
// Composition
// Wires the services of every context around one event bus, one publisher
// and one capacity ledger.
// ---------------------------------------------------------------------------

import type { ClockSource } from './shared/clock'
import { systemClock } from './shared/clock'
import type { DomainConfig } from './shared/config'
import { DEFAULT_CONFIG } from './shared/config'
import type { GuideId } from './identifiers/index'
import type { Logger } from './shared/logger'
import { createConsoleLogger } from './shared/logger'
import { DomainEventBus } from './events/outbox'
import { EventPublisher, noopNotifier } from './events/publisher'
import type {
  CapacityProvider,
  DeliveryRetryStore,
  IncidentStore,
  NotificationPort,
  OrderStore,
  PickupStore,
  RouteStore,
  ShipmentStore,
} from './ports/index'
import { OrderLifecycle } from './ordering/service'
import { ShipmentLifecycle } from './shipment/service'
import { IncidentManager } from './incident/service'
import { CapacityLedger } from './pickup/capacity'
import { PickupScheduler } from './pickup/scheduler'
import { RouteOptimizer } from './routing/optimizer'
import {
  InMemoryCapacityProvider,
  InMemoryDeliveryRetryStore,
  InMemoryIncidentStore,
  InMemoryOrderStore,
  InMemoryPickupStore,
  InMemoryRouteStore,
  InMemoryShipmentStore,
} from './stores/in-memory'

export interface DomainStores {
  readonly orders: OrderStore
  readonly shipments: ShipmentStore
  readonly incidents: IncidentStore
  readonly retries: DeliveryRetryStore
  readonly pickups: PickupStore
  readonly routes: RouteStore
}

export interface DomainDeps {
  readonly stores: DomainStores
  readonly capacity: CapacityProvider
  readonly notifier?: NotificationPort
  readonly clock?: ClockSource
  /** Defaults to a console logger at `config.logLevel`. */
  readonly logger?: Logger
  readonly config?: DomainConfig
  /**
   * Shared with other domains of the same process. A fresh ledger starts
   * empty; call `pickups.restoreReservations()` before scheduling on it.
   */
  readonly ledger?: CapacityLedger
  readonly newGuideId?: (at: Date) => GuideId
}

export interface Domain {
  readonly config: DomainConfig
  readonly bus: DomainEventBus
  readonly publisher: EventPublisher
  readonly ledger: CapacityLedger
  readonly orders: OrderLifecycle
  readonly shipments: ShipmentLifecycle
  readonly incidents: IncidentManager
  readonly pickups: PickupScheduler
  readonly routes: RouteOptimizer
}

export function createDomain(deps: DomainDeps): Domain {
  const config = deps.config ?? DEFAULT_CONFIG
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? createConsoleLogger(config.logLevel, 'shipflow')
  const { stores, capacity } = deps

  const bus = new DomainEventBus(config.maxPendingEventsPerAggregate)
  const publisher = new EventPublisher(bus, deps.notifier ?? noopNotifier, logger)
  const ledger = deps.ledger ?? new CapacityLedger()
  const shipments = new ShipmentLifecycle({
    shipments: stores.shipments,
    orders: stores.orders,
    publisher,
    clock,
    logger,
    ...(deps.newGuideId !== undefined ? { newGuideId: deps.newGuideId } : {}),
  })

  return {
    config,
    bus,
    publisher,
    ledger,
    orders: new OrderLifecycle({ orders: stores.orders, publisher, clock, logger }),
    shipments,
    incidents: new IncidentManager({
      incidents: stores.incidents,
      retries: stores.retries,
      shipments,
      publisher,
      clock,
      logger,
      config,
    }),
    pickups: new PickupScheduler({
      pickups: stores.pickups,
      shipments: stores.shipments,
      routes: stores.routes,
      capacity,
      ledger,
      publisher,
      clock,
      logger,
      config,
    }),
    routes: new RouteOptimizer({ routes: stores.routes, pickups: stores.pickups, publisher, clock, logger, config }),
  }
}

export interface InMemoryDomain extends Domain {
  readonly capacity: InMemoryCapacityProvider
  readonly stores: DomainStores
}

export interface InMemoryDomainOptions extends Omit<DomainDeps, 'stores' | 'capacity'> {
  /** Replaces individual in-memory stores. */
  readonly stores?: Partial<DomainStores>
  readonly capacity?: InMemoryCapacityProvider
}

/** A fully wired domain over in-memory stores. */
export function createInMemoryDomain(options: InMemoryDomainOptions = {}): InMemoryDomain {
  const { stores: overrides, capacity = new InMemoryCapacityProvider(), ...deps } = options
  const stores: DomainStores = {
    orders: overrides?.orders ?? new InMemoryOrderStore(),
    shipments: overrides?.shipments ?? new InMemoryShipmentStore(),
    incidents: overrides?.incidents ?? new InMemoryIncidentStore(),
    retries: overrides?.retries ?? new InMemoryDeliveryRetryStore(),
    pickups: overrides?.pickups ?? new InMemoryPickupStore(),
    routes: overrides?.routes ?? new InMemoryRouteStore(),
  }
  const domain = createDomain({ ...deps, capacity, stores })
  return { ...domain, capacity, stores }
}
