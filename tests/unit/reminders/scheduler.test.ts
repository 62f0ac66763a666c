/**
 * Scheduler Run Tests
 *
 * Runs the full Loading -> Reconciling -> Delivering cycle against the
 * in-memory store and ledger with a fake delivery channel.
 */

import { describe, it, expect, vi } from 'vitest'
import { fixedClock } from '../../../src/lib/clock.js'
import type { DeliveryResult, ReminderDelivery } from '../../../src/services/delivery.js'
import {
  SchedulerRunError,
  type SchedulerDeps,
  runScheduler,
  staleReason,
} from '../../../src/jobs/reminders/scheduler.js'
import { CANCEL_REASONS, type Subscription } from '../../../src/jobs/reminders/types.js'
import { ConfigurationError, TransientIOError } from '../../../src/utils/errors.js'
import { InMemoryNotificationLedger, InMemorySubscriptionStore } from '../../helpers/memoryStores.js'
import { makeSubscription, testSchedulerOptions } from '../../helpers/subscriptions.js'

const NOW = new Date('2025-03-12T10:00:00.000Z')

function setup(subscriptions: Subscription[], result: DeliveryResult = { success: true, messageId: 'msg-1' }) {
  const store = new InMemorySubscriptionStore(subscriptions)
  const ledger = new InMemoryNotificationLedger()
  const send = vi.fn(async (_delivery: ReminderDelivery): Promise<DeliveryResult> => result)
  const onDeliveryFailing = vi.fn(async () => {})
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

  const deps: SchedulerDeps = {
    subscriptions: store,
    ledger,
    delivery: { name: 'fake', send },
    clock: fixedClock(NOW),
    logger: log,
    onDeliveryFailing,
  }
  return { store, ledger, send, onDeliveryFailing, log, deps }
}

describe('runScheduler', () => {
  it('creates and delivers every due reminder', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [7, 3] })
    const { ledger, send, deps } = setup([subscription])

    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.state).toBe('done')
    expect(report.subscriptionsLoaded).toBe(1)
    expect(report.subscriptionsReconciled).toBe(1)
    expect(report.remindersCreated).toBe(2)
    expect(report.claimed).toBe(2)
    expect(report.sent).toBe(2)
    expect(send).toHaveBeenCalledTimes(2)
    expect(send.mock.calls[0][0].today).toBe('2025-03-12')

    const records = await ledger.listForSubscription(subscription.id)
    expect(records.map(r => [r.leadDays, r.status])).toEqual([
      [7, 'sent'],
      [3, 'sent'],
    ])
    expect(records.every(r => r.claimToken === null)).toBe(true)
  })

  it('is idempotent across repeated runs', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [7, 3] })
    const { send, deps } = setup([subscription])

    await runScheduler(deps, testSchedulerOptions)
    const second = await runScheduler(deps, testSchedulerOptions)

    expect(second.remindersCreated).toBe(0)
    expect(second.remindersExisting).toBe(2)
    expect(second.claimed).toBe(0)
    expect(send).toHaveBeenCalledTimes(2)
  })

  it('delivers each reminder once when runs overlap', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [3] })
    const { ledger, send, deps } = setup([subscription])

    const [a, b] = await Promise.all([
      runScheduler(deps, testSchedulerOptions),
      runScheduler(deps, testSchedulerOptions),
    ])

    expect(a.sent + b.sent).toBe(1)
    expect(send).toHaveBeenCalledTimes(1)
    expect(ledger.all()).toHaveLength(1)
  })

  it('creates future reminders without delivering them', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-25', reminderLeadDays: [3] })
    const { ledger, send, deps } = setup([subscription])

    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.remindersCreated).toBe(1)
    expect(report.claimed).toBe(0)
    expect(send).not.toHaveBeenCalled()
    const [record] = ledger.all()
    expect(record.status).toBe('pending')
    expect(record.scheduledFor).toBe('2025-03-22')
    expect(record.scheduledAt).toEqual(new Date('2025-03-22T09:00:00.000Z'))
  })

  it('skips subscriptions whose due date has passed in their own timezone', async () => {
    // 10:00 UTC on Mar 12 is already Mar 13 in Kiritimati (UTC+14)
    const subscription = makeSubscription({ nextBillingDate: '2025-03-12', timezone: 'Pacific/Kiritimati' })
    const { ledger, deps } = setup([subscription])

    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.subscriptionsLoaded).toBe(1)
    expect(report.subscriptionsSkipped).toBe(1)
    expect(ledger.all()).toEqual([])
  })

  it('cancels pending reminders for lead days that were removed', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-25', reminderLeadDays: [7, 3] })
    const { store, ledger, deps } = setup([subscription])

    await runScheduler(deps, testSchedulerOptions)
    store.put({ ...subscription, reminderLeadDays: [3] })
    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.remindersObsoleted).toBe(1)
    const records = await ledger.listForSubscription(subscription.id)
    const removed = records.find(r => r.leadDays === 7)
    expect(removed?.status).toBe('canceled')
    expect(removed?.cancelReason).toBe(CANCEL_REASONS.leadDayRemoved)
    expect(records.find(r => r.leadDays === 3)?.status).toBe('pending')
  })

  it('cancels claimed reminders whose due date was superseded', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-04-15' })
    const { ledger, send, deps } = setup([subscription])
    await ledger.ensureExists(
      { subscriptionId: subscription.id, dueDate: '2025-03-15', leadDays: 3 },
      '2025-03-12',
      new Date('2025-03-12T09:00:00.000Z')
    )

    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.canceledStale).toBe(1)
    expect(report.sent).toBe(0)
    expect(send).not.toHaveBeenCalled()
    const [record] = ledger.all()
    expect(record.status).toBe('canceled')
    expect(record.cancelReason).toBe(CANCEL_REASONS.staleDueDate)
  })

  it('releases failed deliveries and alerts at the threshold', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [3] })
    const { ledger, send, onDeliveryFailing, log, deps } = setup([subscription], {
      success: false,
      error: 'smtp down',
    })

    const report = await runScheduler(deps, { ...testSchedulerOptions, alertThreshold: 1 })

    expect(report.failed).toBe(1)
    expect(report.sent).toBe(0)
    // Released records wait for the next run
    expect(send).toHaveBeenCalledTimes(1)

    const [record] = ledger.all()
    expect(record.status).toBe('pending')
    expect(record.attempts).toBe(1)
    expect(record.lastError).toBe('smtp down')
    expect(record.claimToken).toBeNull()

    expect(log.error).toHaveBeenCalledTimes(1)
    expect(onDeliveryFailing).toHaveBeenCalledWith({
      reminderId: record.id,
      subscriptionId: subscription.id,
      dueDate: '2025-03-15',
      leadDays: 3,
      attempts: 1,
      error: 'smtp down',
    })
  })

  it('does not alert below the threshold', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [3] })
    const { onDeliveryFailing, deps } = setup([subscription], { success: false, error: 'smtp down' })

    await runScheduler(deps, testSchedulerOptions)

    expect(onDeliveryFailing).not.toHaveBeenCalled()
  })

  it('skips a subscription with bad data and carries on', async () => {
    const bad = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [45] })
    const good = makeSubscription({ nextBillingDate: '2025-03-16', reminderLeadDays: [3] })
    const { deps } = setup([bad, good])

    const report = await runScheduler(deps, testSchedulerOptions)

    expect(report.state).toBe('done')
    expect(report.errors.data_invariant).toBe(1)
    expect(report.subscriptionsReconciled).toBe(1)
    expect(report.remindersCreated).toBe(1)
  })

  it('aborts the run when the store is unreachable', async () => {
    const { store, deps } = setup([makeSubscription()])
    store.failure = new TransientIOError('subscription-store', 'connection refused')

    const error = await runScheduler(deps, testSchedulerOptions).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(SchedulerRunError)
    if (!(error instanceof SchedulerRunError)) return
    expect(error.state).toBe('loading')
    expect(error.report.state).toBe('failed')
    expect(error.report.errors.transient_io).toBe(1)
    expect(error.cause).toBe(store.failure)
  })

  it('aborts mid-delivery when the ledger goes away', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', reminderLeadDays: [3] })
    const { ledger, deps } = setup([subscription])
    const outage = new TransientIOError('notification-ledger', 'connection reset')
    vi.spyOn(ledger, 'claimDue').mockRejectedValueOnce(outage)

    const error = await runScheduler(deps, testSchedulerOptions).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(SchedulerRunError)
    if (!(error instanceof SchedulerRunError)) return
    expect(error.state).toBe('delivering')
    expect(error.report.remindersCreated).toBe(1)
  })

  it('rejects a lookahead shorter than the maximum lead', async () => {
    const { deps } = setup([])
    await expect(
      runScheduler(deps, { ...testSchedulerOptions, lookaheadDays: 7, maxLeadDays: 14 })
    ).rejects.toThrow(ConfigurationError)
  })
})

describe('staleReason', () => {
  const record = { dueDate: '2025-03-15' }

  it('flags missing and inactive subscriptions', () => {
    expect(staleReason(record, null)).toBe(CANCEL_REASONS.subscriptionInactive)
    expect(staleReason(record, makeSubscription({ isActive: false }))).toBe(CANCEL_REASONS.subscriptionInactive)
  })

  it('flags an ended subscription', () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', endDate: '2025-03-10' })
    expect(staleReason(record, subscription)).toBe(CANCEL_REASONS.subscriptionEnded)
  })

  it('returns null while the reminder still applies', () => {
    expect(staleReason(record, makeSubscription({ nextBillingDate: '2025-03-15' }))).toBeNull()
  })
})
