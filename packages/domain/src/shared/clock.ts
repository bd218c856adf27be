// ---------------------------------------------------------------------------
// Clock source: every "now" in the domain comes through here so that
// overdue checks and attempt timestamps are deterministic under test.
// ---------------------------------------------------------------------------

export interface ClockSource {
  now(): Date
}

export const systemClock: ClockSource = {
  now: () => new Date(),
}

/** A clock that only moves when told to. */
export interface ManualClock extends ClockSource {
  set(at: Date): void
  advanceMinutes(minutes: number): void
}

export function createManualClock(start: Date): ManualClock {
  let current = start.getTime()
  return {
    now: () => new Date(current),
    set: (at) => {
      current = at.getTime()
    },
    advanceMinutes: (minutes) => {
      current += minutes * 60_000
    },
  }
}
