import type { CalendarDate } from '../utils/calendarDate.js'
import { todayInTimeZone } from '../utils/timezone.js'

/**
 * Source of "now". Injected everywhere the engine needs the current time so
 * tests and manual re-runs can pin it.
 */
export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}

/** Clock pinned to one instant (E2E re-runs, `effectiveNow` overrides). */
export function fixedClock(at: Date): Clock {
  return { now: () => new Date(at.getTime()) }
}

export function today(clock: Clock, timeZone: string): CalendarDate {
  return todayInTimeZone(clock.now(), timeZone)
}
