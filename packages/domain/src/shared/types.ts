// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

import { ValidationError } from './errors'

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. OrderId for GuideId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Money value object
// ---------------------------------------------------------------------------

/**
 * Immutable monetary value.
 *
 * @invariant `amount` must be ≥ 0.
 * @invariant `currency` must be a valid ISO 4217 code (e.g. "COP").
 */
export interface Money {
  readonly amount: number
  /** ISO 4217 currency code, e.g. "COP" */
  readonly currency: string
}

export const DEFAULT_CURRENCY = 'COP'

/**
 * Factory that enforces the Money invariant: amount must not be negative.
 *
 * @throws {ValidationError} if `amount` is negative or not finite.
 */
export function createMoney(amount: number, currency: string = DEFAULT_CURRENCY): Money {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError(`Money amount cannot be negative: ${amount}`, [`amount: must be >= 0`])
  }
  return { amount, currency }
}

// ---------------------------------------------------------------------------
// Package dimensions value object
// ---------------------------------------------------------------------------

/**
 * Physical size and weight of a parcel.
 *
 * @invariant every measure must be > 0.
 */
export interface PackageDimensions {
  readonly lengthCm: number
  readonly widthCm: number
  readonly heightCm: number
  readonly weightKg: number
}

/** Divisor used by carriers to turn cubic centimetres into kilograms. */
const VOLUMETRIC_DIVISOR = 5000

export function volumetricWeightKg(dims: PackageDimensions): number {
  return (dims.lengthCm * dims.widthCm * dims.heightCm) / VOLUMETRIC_DIVISOR
}

/** The higher of actual and volumetric weight. */
export function billableWeightKg(dims: PackageDimensions): number {
  return Math.max(dims.weightKg, volumetricWeightKg(dims))
}

// ---------------------------------------------------------------------------
// Geo point value object
// ---------------------------------------------------------------------------

export interface GeoPoint {
  readonly lat: number
  readonly lng: number
}

const EARTH_RADIUS_KM = 6371

/** Great-circle (haversine) distance between two points, in kilometres. */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  const toRad = (deg: number): number => (deg * Math.PI) / 180
  const dLat = toRad(b.lat - a.lat)
  const dLng = toRad(b.lng - a.lng)
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)))
}

// ---------------------------------------------------------------------------
// DateRange value object
// ---------------------------------------------------------------------------

/**
 * A half-open time interval [start, end).
 *
 * @invariant `end` must be strictly after `start`.
 */
export interface DateRange {
  readonly start: Date
  readonly end: Date
}

/** Returns true when two DateRange windows overlap. */
export function dateRangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.start < b.end && b.start < a.end
}

/** Returns true when `at` falls inside the half-open range. */
export function isWithinRange(at: Date, range: DateRange): boolean {
  return at >= range.start && at < range.end
}

// ---------------------------------------------------------------------------
// Calendar helpers (all calendar arithmetic is UTC)
// ---------------------------------------------------------------------------

const HOUR_MS = 3_600_000
const DAY_MS = 24 * HOUR_MS

/** `YYYY-MM-DD` key of the UTC day containing `at`. */
export function toDayKey(at: Date): string {
  return at.toISOString().slice(0, 10)
}

export function isSameDay(a: Date, b: Date): boolean {
  return toDayKey(a) === toDayKey(b)
}

export function startOfDay(at: Date): Date {
  return new Date(Math.floor(at.getTime() / DAY_MS) * DAY_MS)
}

export function dayRange(at: Date): DateRange {
  const start = startOfDay(at)
  return { start, end: new Date(start.getTime() + DAY_MS) }
}

export function addHours(at: Date, hours: number): Date {
  return new Date(at.getTime() + hours * HOUR_MS)
}

export function addMinutes(at: Date, minutes: number): Date {
  return new Date(at.getTime() + minutes * 60_000)
}

export function addDays(at: Date, days: number): Date {
  return new Date(at.getTime() + days * DAY_MS)
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / HOUR_MS
}
