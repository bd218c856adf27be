import { describe, it, expect } from 'vitest'
import {
  toOrderId,
  toPickupId,
  toRouteId,
  toTimeSlotId,
  ValidationError,
  ORDER_STATUSES,
  ORDER_TRANSITIONS,
  SHIPMENT_STATUSES,
  SHIPMENT_TRANSITIONS,
  INCIDENT_STATUSES,
  INCIDENT_TRANSITIONS,
  PICKUP_STATUSES,
  PICKUP_TRANSITIONS,
  ROUTE_STATUSES,
  ROUTE_TRANSITIONS,
  DEFAULT_CONFIG,
  createInMemoryDomain,
  silentLogger,
} from './index'

// ---------------------------------------------------------------------------
// Branded ID helpers
// ---------------------------------------------------------------------------
describe('branded id factories', () => {
  it('wraps a string as OrderId', () => {
    expect(toOrderId('o-1')).toBe('o-1')
  })

  it('trims a TimeSlotId', () => {
    expect(toTimeSlotId(' slot-1 ')).toBe('slot-1')
  })

  it('rejects a blank id', () => {
    expect(() => toPickupId('   ')).toThrow(ValidationError)
    expect(() => toRouteId('')).toThrow(ValidationError)
  })
})

// ---------------------------------------------------------------------------
// Transition tables
// ---------------------------------------------------------------------------
function describeTable<S extends string>(
  name: string,
  statuses: readonly S[],
  table: Readonly<Record<S, readonly S[]>>,
): void {
  describe(name, () => {
    it('has one row per status', () => {
      expect(Object.keys(table).sort()).toEqual([...statuses].sort())
    })

    it('only targets known statuses', () => {
      for (const status of statuses) {
        for (const target of table[status]) {
          expect(statuses).toContain(target)
        }
      }
    })

    it('lists no status twice', () => {
      expect(new Set(statuses).size).toBe(statuses.length)
    })
  })
}

describeTable('ORDER_TRANSITIONS', ORDER_STATUSES, ORDER_TRANSITIONS)
describeTable('SHIPMENT_TRANSITIONS', SHIPMENT_STATUSES, SHIPMENT_TRANSITIONS)
describeTable('INCIDENT_TRANSITIONS', INCIDENT_STATUSES, INCIDENT_TRANSITIONS)
describeTable('PICKUP_TRANSITIONS', PICKUP_STATUSES, PICKUP_TRANSITIONS)
describeTable('ROUTE_TRANSITIONS', ROUTE_STATUSES, ROUTE_TRANSITIONS)

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------
describe('createInMemoryDomain', () => {
  it('falls back to the default configuration', () => {
    const domain = createInMemoryDomain({ logger: silentLogger })
    expect(domain.config).toBe(DEFAULT_CONFIG)
  })

  it('starts with an empty outbox', () => {
    const domain = createInMemoryDomain({ logger: silentLogger })
    expect(domain.bus.drainAll()).toEqual([])
  })
})
