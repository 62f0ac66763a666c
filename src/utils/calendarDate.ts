/**
 * Calendar date helpers
 *
 * Due dates are calendar dates with no time-of-day component, carried as
 * ISO `YYYY-MM-DD` strings. ISO strings compare correctly with `<` / `>`.
 */

import {
  addDays as addDaysToDate,
  differenceInCalendarDays,
  format,
  getDaysInMonth,
  isValid,
  parse,
} from 'date-fns'
import { DataInvariantViolationError } from './errors.js'

export type CalendarDate = string

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/
const ISO_DATE_FORMAT = 'yyyy-MM-dd'

export interface DateParts {
  year: number
  month: number // 1-12
  day: number
}

export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(2000, 0, 1))
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value
}

export function assertCalendarDate(value: string, field: string): CalendarDate {
  if (!isCalendarDate(value)) {
    throw new DataInvariantViolationError(field, `expected a YYYY-MM-DD date, got "${value}"`)
  }
  return value
}

/** Local-midnight Date for date-fns arithmetic. */
export function toLocalDate(date: CalendarDate): Date {
  const { year, month, day } = toParts(date)
  return new Date(year, month - 1, day)
}

export function fromLocalDate(date: Date): CalendarDate {
  return format(date, ISO_DATE_FORMAT)
}

export function toParts(date: CalendarDate): DateParts {
  const [year, month, day] = assertCalendarDate(date, 'date').split('-').map(Number)
  return { year, month, day }
}

export function fromParts({ year, month, day }: DateParts): CalendarDate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`
}

export function daysInMonth(year: number, month: number): number {
  return getDaysInMonth(new Date(year, month - 1, 1))
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromLocalDate(addDaysToDate(toLocalDate(date), days))
}

export function subtractDays(date: CalendarDate, days: number): CalendarDate {
  return addDays(date, -days)
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return differenceInCalendarDays(toLocalDate(to), toLocalDate(from))
}

/** 0 = Sunday .. 6 = Saturday */
export function dayOfWeek(date: CalendarDate): number {
  return toLocalDate(date).getDay()
}

export function maxDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a > b ? a : b
}
