/**
 * Reminder Policy Tests
 */

import { describe, it, expect } from 'vitest'
import { normalizeLeadDays, requiredReminders, requiresReminders } from '../../../src/jobs/reminders/policy.js'
import { DataInvariantViolationError } from '../../../src/utils/errors.js'
import { makeSubscription, testSchedulerOptions } from '../../helpers/subscriptions.js'

describe('normalizeLeadDays', () => {
  it('de-duplicates and sorts largest first', () => {
    expect(normalizeLeadDays([1, 7, 3, 7], testSchedulerOptions)).toEqual([7, 3, 1])
  })

  it('falls back to the defaults when empty', () => {
    expect(normalizeLeadDays([], { maxLeadDays: 30, defaultLeadDays: [7, 1] })).toEqual([7, 1])
  })

  it('rejects negative, fractional and oversized leads', () => {
    expect(() => normalizeLeadDays([-1], testSchedulerOptions)).toThrow(DataInvariantViolationError)
    expect(() => normalizeLeadDays([1.5], testSchedulerOptions)).toThrow(DataInvariantViolationError)
    expect(() => normalizeLeadDays([31], testSchedulerOptions)).toThrow('31 exceeds the maximum of 30 days')
  })
})

describe('requiresReminders', () => {
  it('is false for inactive subscriptions', () => {
    expect(requiresReminders(makeSubscription({ isActive: false }), '2025-03-01')).toBe(false)
  })

  it('is false when the end date falls before the due date', () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', endDate: '2025-03-14' })
    expect(requiresReminders(subscription, '2025-03-01')).toBe(false)
  })

  it('is true when the subscription ends on the due date', () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', endDate: '2025-03-15' })
    expect(requiresReminders(subscription, '2025-03-01')).toBe(true)
  })
})

describe('requiredReminders', () => {
  it('derives one reminder per lead day at the local send hour', () => {
    const subscription = makeSubscription({
      nextBillingDate: '2025-03-11',
      reminderLeadDays: [7, 1],
      timezone: 'America/New_York',
    })

    const required = requiredReminders(subscription, '2025-03-01', testSchedulerOptions)

    expect(required).toEqual([
      {
        subscriptionId: subscription.id,
        dueDate: '2025-03-11',
        leadDays: 7,
        scheduledFor: '2025-03-04',
        // EST (UTC-5)
        scheduledAt: new Date('2025-03-04T14:00:00.000Z'),
      },
      {
        subscriptionId: subscription.id,
        dueDate: '2025-03-11',
        leadDays: 1,
        scheduledFor: '2025-03-10',
        // EDT (UTC-4) after the March 9 switch
        scheduledAt: new Date('2025-03-10T13:00:00.000Z'),
      },
    ])
  })

  it('keeps reminders whose send date has already passed', () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [7] })
    const required = requiredReminders(subscription, '2025-03-12', testSchedulerOptions)
    expect(required.map(r => r.scheduledFor)).toEqual(['2025-03-08'])
  })

  it('returns nothing for an inactive subscription', () => {
    const subscription = makeSubscription({ isActive: false })
    expect(requiredReminders(subscription, '2025-03-01', testSchedulerOptions)).toEqual([])
  })

  it('rejects a due date before the start date', () => {
    const subscription = makeSubscription({ startDate: '2025-04-01', nextBillingDate: '2025-03-15' })
    expect(() => requiredReminders(subscription, '2025-03-01', testSchedulerOptions)).toThrow(
      DataInvariantViolationError
    )
  })
})
