/**
 * Reminder Policy
 *
 * Decides which reminder instances must exist for a subscription's current
 * due date. Never looks past the current cycle: the next cycle's reminders are
 * only derived after the advancer moves `nextBillingDate`.
 */

import { type CalendarDate, assertCalendarDate, subtractDays } from '../../utils/calendarDate.js'
import { DataInvariantViolationError } from '../../utils/errors.js'
import { zonedInstant } from '../../utils/timezone.js'
import type { RequiredReminder, Subscription } from './types.js'

export interface ReminderPolicyOptions {
  /** Local hour (0-23) at which a reminder becomes due */
  sendHour: number
  maxLeadDays: number
  /** Used when a subscription has no lead days configured */
  defaultLeadDays: readonly number[]
}

/**
 * Validate, de-duplicate and sort lead days (largest first).
 */
export function normalizeLeadDays(
  leadDays: readonly number[],
  options: Pick<ReminderPolicyOptions, 'maxLeadDays' | 'defaultLeadDays'>
): number[] {
  const source = leadDays.length > 0 ? leadDays : options.defaultLeadDays

  for (const days of source) {
    if (!Number.isInteger(days) || days < 0) {
      throw new DataInvariantViolationError('reminderLeadDays', `lead days must be non-negative integers, got ${days}`)
    }
    if (days > options.maxLeadDays) {
      throw new DataInvariantViolationError(
        'reminderLeadDays',
        `${days} exceeds the maximum of ${options.maxLeadDays} days`
      )
    }
  }

  return [...new Set(source)].sort((a, b) => b - a)
}

/**
 * Boundary checks on a subscription before any reminder is derived from it.
 */
export function assertSchedulable(subscription: Subscription): void {
  assertCalendarDate(subscription.nextBillingDate, 'nextBillingDate')
  assertCalendarDate(subscription.startDate, 'startDate')
  if (subscription.endDate !== null) assertCalendarDate(subscription.endDate, 'endDate')

  if (subscription.nextBillingDate < subscription.startDate) {
    throw new DataInvariantViolationError(
      'nextBillingDate',
      `${subscription.nextBillingDate} is before start date ${subscription.startDate}`
    )
  }
}

export function requiresReminders(subscription: Subscription, today: CalendarDate): boolean {
  if (!subscription.isActive) return false
  if (subscription.endDate !== null) {
    if (subscription.endDate < subscription.nextBillingDate) return false
    if (subscription.endDate < today) return false
  }
  return true
}

/**
 * Reminders that must exist for the current `nextBillingDate`.
 * A reminder whose send time has already passed is still returned; it is
 * picked up by the next delivery pass.
 */
export function requiredReminders(
  subscription: Subscription,
  today: CalendarDate,
  options: ReminderPolicyOptions
): RequiredReminder[] {
  assertSchedulable(subscription)
  if (!requiresReminders(subscription, today)) return []

  const dueDate = subscription.nextBillingDate

  return normalizeLeadDays(subscription.reminderLeadDays, options).map(leadDays => {
    const scheduledFor = subtractDays(dueDate, leadDays)
    return {
      subscriptionId: subscription.id,
      dueDate,
      leadDays,
      scheduledFor,
      scheduledAt: zonedInstant(scheduledFor, options.sendHour, subscription.timezone),
    }
  })
}
