/**
 * Cycle Calculator
 *
 * Pure calendar-date arithmetic for billing cadences. No I/O, no clock.
 * Callers pass dates already expressed in the subscription's timezone.
 */

import {
  type CalendarDate,
  addDays,
  assertCalendarDate,
  dayOfWeek,
  daysInMonth,
  fromParts,
  maxDate,
  toParts,
} from '../../utils/calendarDate.js'
import { ConfigurationError, DataInvariantViolationError } from '../../utils/errors.js'
import { BILLING_CYCLES, type BillingCycle, type Cadence, type Subscription } from './types.js'

const MONTHS_PER_CYCLE = {
  monthly: 1,
  quarterly: 3,
  semiannual: 6,
  yearly: 12,
} as const

type MonthBasedCycle = keyof typeof MONTHS_PER_CYCLE

// Weekly over ~100 years; anything longer is bad data, not a real lapse.
const MAX_ROLL_ITERATIONS = 5300

function isBillingCycle(value: string): value is BillingCycle {
  return BILLING_CYCLES.some(cycle => cycle === value)
}

function isMonthBased(cycle: BillingCycle): cycle is MonthBasedCycle {
  return cycle in MONTHS_PER_CYCLE
}

/**
 * Build a cadence from stored columns.
 * Unknown cycles are a configuration problem; a custom cycle without a usable
 * interval is bad data.
 */
export function cadenceOf(cycle: string, customIntervalDays: number | null): Cadence {
  if (!isBillingCycle(cycle)) {
    throw new ConfigurationError(`Unsupported billing cycle "${cycle}"`)
  }
  if (cycle !== 'custom') return { cycle }

  if (customIntervalDays === null || !Number.isInteger(customIntervalDays) || customIntervalDays < 1) {
    throw new DataInvariantViolationError(
      'customIntervalDays',
      `custom cycle needs a positive whole number of days, got ${customIntervalDays}`
    )
  }
  return { cycle, intervalDays: customIntervalDays }
}

function assertBillingDay(cycle: BillingCycle, billingDay: number | null): void {
  if (billingDay === null || cycle === 'custom') return
  const [min, max] = cycle === 'weekly' ? [0, 6] : [1, 31]
  if (!Number.isInteger(billingDay) || billingDay < min || billingDay > max) {
    throw new DataInvariantViolationError(
      'billingDay',
      `must be an integer in ${min}..${max} for ${cycle} cycles, got ${billingDay}`
    )
  }
}

function addMonthsClamped(anchor: CalendarDate, months: number, targetDay: number): CalendarDate {
  const { year, month } = toParts(anchor)
  const zeroBased = month - 1 + months
  const nextYear = year + Math.floor(zeroBased / 12)
  const nextMonth = (zeroBased % 12) + 1
  const day = Math.min(targetDay, daysInMonth(nextYear, nextMonth))
  return fromParts({ year: nextYear, month: nextMonth, day })
}

/**
 * Next due date strictly after `anchor`.
 *
 * Month-based cycles land on `billingDay` (or the anchor's own day when unset),
 * clamped to the target month's length, so Jan 31 -> Feb 29 -> Mar 31 when the
 * billing day is 31. Weekly cycles land on the `billingDay` weekday when set.
 */
export function nextDueDate(anchor: CalendarDate, cadence: Cadence, billingDay: number | null = null): CalendarDate {
  assertCalendarDate(anchor, 'anchorDate')
  assertBillingDay(cadence.cycle, billingDay)

  switch (cadence.cycle) {
    case 'monthly':
    case 'quarterly':
    case 'semiannual':
    case 'yearly':
      return addMonthsClamped(anchor, MONTHS_PER_CYCLE[cadence.cycle], billingDay ?? toParts(anchor).day)

    case 'weekly': {
      if (billingDay === null) return addDays(anchor, 7)
      const delta = (billingDay - dayOfWeek(anchor) + 7) % 7
      return addDays(anchor, delta === 0 ? 7 : delta)
    }

    case 'custom':
      return addDays(anchor, cadence.intervalDays)
  }
}

export interface RollForwardResult {
  dueDate: CalendarDate
  /** Due dates passed over on the way, oldest first (includes the anchor). */
  superseded: CalendarDate[]
}

/**
 * Apply `nextDueDate` until the result is on or after `onOrAfter`.
 * Returns the anchor unchanged when it already qualifies.
 */
export function rollForward(
  anchor: CalendarDate,
  cadence: Cadence,
  billingDay: number | null,
  onOrAfter: CalendarDate
): RollForwardResult {
  assertCalendarDate(onOrAfter, 'onOrAfter')
  const superseded: CalendarDate[] = []
  let dueDate = anchor

  while (dueDate < onOrAfter) {
    if (superseded.length >= MAX_ROLL_ITERATIONS) {
      throw new DataInvariantViolationError(
        'nextBillingDate',
        `${anchor} is too far behind ${onOrAfter} to roll forward`
      )
    }
    superseded.push(dueDate)
    dueDate = nextDueDate(dueDate, cadence, billingDay)
  }

  return { dueDate, superseded }
}

/**
 * First due date on or after both `startDate` and `today`, aligned to the
 * billing day. Used when a subscription is created.
 */
export function firstDueDate(
  startDate: CalendarDate,
  cadence: Cadence,
  billingDay: number | null,
  today: CalendarDate
): CalendarDate {
  assertCalendarDate(startDate, 'startDate')
  assertBillingDay(cadence.cycle, billingDay)

  const monthBased = isMonthBased(cadence.cycle)
  // Same rule as effectiveBillingDay: without a billing day the start day is kept
  const carriedDay = billingDay ?? (monthBased ? toParts(startDate).day : null)

  let aligned = startDate
  if (monthBased && billingDay !== null) {
    const { year, month } = toParts(startDate)
    aligned = fromParts({ year, month, day: Math.min(billingDay, daysInMonth(year, month)) })
    if (aligned < startDate) aligned = nextDueDate(aligned, cadence, billingDay)
  } else if (cadence.cycle === 'weekly' && billingDay !== null) {
    aligned = addDays(startDate, (billingDay - dayOfWeek(startDate) + 7) % 7)
  }

  return rollForward(aligned, cadence, carriedDay, maxDate(startDate, today)).dueDate
}

/**
 * Billing day to carry through repeated advancement. For month-based cycles
 * with no explicit billing day the start date's day is used, so a Jan 31
 * subscription returns to the 31st after February.
 */
export function effectiveBillingDay(
  subscription: Pick<Subscription, 'billingCycle' | 'billingDay' | 'startDate'>
): number | null {
  if (subscription.billingDay !== null) return subscription.billingDay
  if (isMonthBased(subscription.billingCycle)) return toParts(subscription.startDate).day
  return null
}

export function cadenceOfSubscription(subscription: Pick<Subscription, 'billingCycle' | 'customIntervalDays'>): Cadence {
  return cadenceOf(subscription.billingCycle, subscription.customIntervalDays)
}
