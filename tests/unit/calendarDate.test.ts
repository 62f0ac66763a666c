import { describe, it, expect } from 'vitest'
import {
  addDays,
  assertCalendarDate,
  dayOfWeek,
  daysBetween,
  daysInMonth,
  isCalendarDate,
  subtractDays,
} from '../../src/utils/calendarDate.js'
import { DataInvariantViolationError } from '../../src/utils/errors.js'
import { isValidTimeZone, todayInTimeZone, zonedInstant } from '../../src/utils/timezone.js'

describe('calendar dates', () => {
  it('accepts only real YYYY-MM-DD dates', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true)
    expect(isCalendarDate('2025-02-29')).toBe(false)
    expect(isCalendarDate('2025-3-1')).toBe(false)
    expect(isCalendarDate('2025-03-01T00:00:00Z')).toBe(false)
  })

  it('names the field when rejecting', () => {
    expect(() => assertCalendarDate('tomorrow', 'endDate')).toThrow(DataInvariantViolationError)
    expect(() => assertCalendarDate('tomorrow', 'endDate')).toThrow('endDate: expected a YYYY-MM-DD date, got "tomorrow"')
  })

  it('does day arithmetic across month and year ends', () => {
    expect(addDays('2024-12-30', 3)).toBe('2025-01-02')
    expect(subtractDays('2025-03-01', 1)).toBe('2025-02-28')
    expect(daysBetween('2025-03-12', '2025-03-15')).toBe(3)
    expect(daysBetween('2025-03-15', '2025-03-12')).toBe(-3)
  })

  it('is unaffected by daylight-saving switches', () => {
    expect(addDays('2025-03-08', 2)).toBe('2025-03-10')
    expect(daysBetween('2025-10-25', '2025-10-27')).toBe(2)
  })

  it('knows month lengths and weekdays', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2025, 2)).toBe(28)
    expect(dayOfWeek('2025-03-16')).toBe(0) // Sunday
  })
})

describe('timezones', () => {
  const instant = new Date('2025-03-12T23:30:00.000Z')

  it('derives today per zone', () => {
    expect(todayInTimeZone(instant, 'UTC')).toBe('2025-03-12')
    expect(todayInTimeZone(instant, 'Asia/Tokyo')).toBe('2025-03-13')
    expect(todayInTimeZone(instant, 'America/Los_Angeles')).toBe('2025-03-12')
  })

  it('builds the send instant from the local wall clock', () => {
    expect(zonedInstant('2025-03-13', 9, 'Asia/Tokyo')).toEqual(new Date('2025-03-13T00:00:00.000Z'))
    expect(zonedInstant('2025-07-01', 9, 'Europe/London')).toEqual(new Date('2025-07-01T08:00:00.000Z'))
  })

  it('validates IANA names', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true)
    expect(isValidTimeZone('Mars/Olympus')).toBe(false)
    expect(() => todayInTimeZone(instant, 'Mars/Olympus')).toThrow(DataInvariantViolationError)
  })
})
