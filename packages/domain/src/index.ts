// ---------------------------------------------------------------------------
// Public surface of the domain package
// ---------------------------------------------------------------------------

// Shared kernel
export * from './shared/types'
export * from './shared/errors'
export * from './shared/clock'
export * from './shared/logger'
export * from './shared/validation'
export * from './shared/config'
export * from './identifiers/index'

// Events and ports
export * from './events/index'
export * from './events/outbox'
export * from './events/publisher'
export * from './ports/index'

// Bounded contexts
export * from './ordering/index'
export * from './ordering/service'
export * from './shipment/index'
export * from './shipment/service'
export * from './incident/index'
export * from './incident/service'
export * from './pickup/index'
export * from './pickup/capacity'
export * from './pickup/scheduler'
export * from './routing/index'
export * from './routing/optimizer'

// Adapters and composition
export * from './stores/in-memory'
export * from './domain'
