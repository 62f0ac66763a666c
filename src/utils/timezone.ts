/**
 * Timezone Utilities
 *
 * Due dates are stored as plain calendar dates. A subscription's timezone is
 * frozen when it is created, and "today" and reminder send instants are derived
 * from it here. Nothing else in the engine reads a wall clock directly.
 */

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz'
import { type CalendarDate, assertCalendarDate } from './calendarDate.js'
import { DataInvariantViolationError } from './errors.js'

/**
 * Calendar date of `now` as seen from `timeZone`
 */
export function todayInTimeZone(now: Date, timeZone: string): CalendarDate {
  assertTimeZone(timeZone)
  return formatInTimeZone(now, timeZone, 'yyyy-MM-dd')
}

/**
 * Instant at which the wall clock in `timeZone` reads `date` at `hour`:00
 */
export function zonedInstant(date: CalendarDate, hour: number, timeZone: string): Date {
  assertCalendarDate(date, 'date')
  assertTimeZone(timeZone)
  const hh = String(hour).padStart(2, '0')
  return fromZonedTime(`${date}T${hh}:00:00`, timeZone)
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  } catch {
    return false
  }
}

export function assertTimeZone(timeZone: string): string {
  if (!isValidTimeZone(timeZone)) {
    throw new DataInvariantViolationError('timezone', `unknown IANA time zone "${timeZone}"`)
  }
  return timeZone
}
