/**
 * Cycle Advancer Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { fixedClock } from '../../../src/lib/clock.js'
import {
  type AdvancerDeps,
  advanceLapsed,
  advanceLapsedSubscription,
  advanceOnPayment,
} from '../../../src/jobs/reminders/advancer.js'
import { CANCEL_REASONS, type PaymentRecordedEvent, type Subscription } from '../../../src/jobs/reminders/types.js'
import { DataInvariantViolationError, TransientIOError } from '../../../src/utils/errors.js'
import { InMemoryNotificationLedger, InMemorySubscriptionStore } from '../../helpers/memoryStores.js'
import { makeSubscription } from '../../helpers/subscriptions.js'

const NOW = new Date('2025-03-12T10:00:00.000Z')

function setup(subscriptions: Subscription[]) {
  const store = new InMemorySubscriptionStore(subscriptions)
  const ledger = new InMemoryNotificationLedger()
  const deps: AdvancerDeps = { subscriptions: store, ledger, clock: fixedClock(NOW) }
  return { store, ledger, deps }
}

function payment(subscriptionId: string, overrides: Partial<PaymentRecordedEvent> = {}): PaymentRecordedEvent {
  return {
    paymentId: 'pay-1',
    subscriptionId,
    paymentDate: '2025-03-12',
    amount: 15.99,
    status: 'paid',
    ...overrides,
  }
}

async function seedReminder(ledger: InMemoryNotificationLedger, subscriptionId: string, dueDate: string) {
  const { record } = await ledger.ensureExists(
    { subscriptionId, dueDate, leadDays: 3 },
    dueDate,
    new Date(`${dueDate}T09:00:00.000Z`)
  )
  return record
}

describe('advanceOnPayment', () => {
  it('advances one cycle and cancels reminders for the paid due date', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, ledger, deps } = setup([subscription])
    const reminder = await seedReminder(ledger, subscription.id, '2025-03-15')

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(outcome).toEqual({ status: 'advanced', from: '2025-03-15', to: '2025-04-15', canceledReminders: 1 })
    expect(store.get(subscription.id)?.nextBillingDate).toBe('2025-04-15')

    const [record] = ledger.all()
    expect(record.id).toBe(reminder.id)
    expect(record.status).toBe('canceled')
    expect(record.cancelReason).toBe(CANCEL_REASONS.cycleAdvanced)
  })

  it('leaves sent reminders alone', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { ledger, deps } = setup([subscription])
    const reminder = await seedReminder(ledger, subscription.id, '2025-03-15')
    const sendTime = new Date('2025-03-15T09:00:00.000Z')
    const [claimed] = await ledger.claimDue(sendTime, { limit: 10, leaseMs: 60_000 })
    await ledger.markSent(reminder.id, claimed.claimToken ?? '', sendTime)

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(outcome).toMatchObject({ status: 'advanced', canceledReminders: 0 })
    expect(ledger.all()[0].status).toBe('sent')
  })

  it('keeps a month-end billing day across short months', async () => {
    const subscription = makeSubscription({ startDate: '2025-01-31', nextBillingDate: '2025-02-28' })
    const { deps } = setup([subscription])

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(outcome).toMatchObject({ status: 'advanced', to: '2025-03-31' })
  })

  it('ignores payments that are not paid', async () => {
    const subscription = makeSubscription()
    const { store, deps } = setup([subscription])

    const outcome = await advanceOnPayment(deps, payment(subscription.id, { status: 'pending' }))

    expect(outcome).toEqual({ status: 'ignored', reason: 'payment status is pending' })
    expect(store.get(subscription.id)?.nextBillingDate).toBe(subscription.nextBillingDate)
  })

  it('reports unknown and inactive subscriptions', async () => {
    const inactive = makeSubscription({ isActive: false })
    const { deps } = setup([inactive])

    expect(await advanceOnPayment(deps, payment('00000000-0000-4000-8000-999999999999'))).toEqual({
      status: 'not_found',
    })
    expect(await advanceOnPayment(deps, payment(inactive.id))).toEqual({ status: 'inactive' })
  })

  it('deactivates when the next due date passes the end date', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', endDate: '2025-04-01' })
    const { store, ledger, deps } = setup([subscription])
    await seedReminder(ledger, subscription.id, '2025-03-15')

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(outcome).toEqual({ status: 'deactivated', endDate: '2025-04-01', canceledReminders: 1 })
    expect(store.get(subscription.id)?.isActive).toBe(false)
    expect(store.get(subscription.id)?.nextBillingDate).toBe('2025-03-15')
    expect(ledger.all()[0].cancelReason).toBe(CANCEL_REASONS.subscriptionEnded)
  })

  it('deactivates when the end date is the current due date', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15', endDate: '2025-03-15' })
    const { store, deps } = setup([subscription])

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(outcome).toEqual({ status: 'deactivated', endDate: '2025-03-15', canceledReminders: 0 })
    expect(store.get(subscription.id)?.isActive).toBe(false)
  })

  it('records the payment with the new due date', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, deps } = setup([subscription])

    await advanceOnPayment(deps, payment(subscription.id, { paymentId: 'pay-7' }))

    expect(store.get(subscription.id)?.lastPaymentId).toBe('pay-7')
  })

  it('does not advance twice when a payment is replayed after a ledger outage', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, ledger, deps } = setup([subscription])
    await seedReminder(ledger, subscription.id, '2025-03-15')
    const outage = new TransientIOError('notification-ledger', 'connection reset')
    vi.spyOn(ledger, 'cancelPendingForDueDate').mockRejectedValueOnce(outage)

    await expect(advanceOnPayment(deps, payment(subscription.id))).rejects.toBe(outage)
    expect(store.get(subscription.id)?.nextBillingDate).toBe('2025-04-15')

    const replay = await advanceOnPayment(deps, payment(subscription.id))

    expect(replay).toEqual({
      status: 'already_applied',
      paymentId: 'pay-1',
      nextBillingDate: '2025-04-15',
      canceledReminders: 1,
    })
    expect(store.get(subscription.id)?.nextBillingDate).toBe('2025-04-15')
    expect(ledger.all()[0].cancelReason).toBe(CANCEL_REASONS.cycleAdvanced)
  })

  it('advances again for a different payment', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, deps } = setup([subscription])

    await advanceOnPayment(deps, payment(subscription.id, { paymentId: 'pay-1' }))
    const outcome = await advanceOnPayment(deps, payment(subscription.id, { paymentId: 'pay-2' }))

    expect(outcome).toMatchObject({ status: 'advanced', from: '2025-04-15', to: '2025-05-15' })
    expect(store.get(subscription.id)?.lastPaymentId).toBe('pay-2')
  })

  it('retries once after losing the conditional update', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, deps } = setup([subscription])
    const update = vi.spyOn(store, 'updateNextBillingDate').mockResolvedValueOnce(false)

    const outcome = await advanceOnPayment(deps, payment(subscription.id))

    expect(update).toHaveBeenCalledTimes(2)
    expect(outcome).toMatchObject({ status: 'advanced', to: '2025-04-15' })
  })

  it('gives up with a conflict after the retry also loses', async () => {
    const subscription = makeSubscription({ nextBillingDate: '2025-03-15' })
    const { store, deps } = setup([subscription])
    vi.spyOn(store, 'updateNextBillingDate').mockResolvedValue(false)

    expect(await advanceOnPayment(deps, payment(subscription.id))).toEqual({ status: 'conflict' })
  })

  it('rejects a malformed payment date', async () => {
    const subscription = makeSubscription()
    const { deps } = setup([subscription])

    await expect(
      advanceOnPayment(deps, payment(subscription.id, { paymentDate: '2025-13-01' }))
    ).rejects.toThrow(DataInvariantViolationError)
  })
})

describe('advanceLapsedSubscription', () => {
  it('rolls forward past every missed cycle and cancels their reminders', async () => {
    const subscription = makeSubscription({
      startDate: '2024-12-31',
      nextBillingDate: '2025-01-31',
      autoRenew: true,
    })
    const { store, ledger, deps } = setup([subscription])
    await seedReminder(ledger, subscription.id, '2025-01-31')
    await seedReminder(ledger, subscription.id, '2025-02-28')

    const outcome = await advanceLapsedSubscription(deps, subscription.id)

    expect(outcome).toEqual({ status: 'advanced', from: '2025-01-31', to: '2025-03-31', canceledReminders: 2 })
    expect(store.get(subscription.id)?.nextBillingDate).toBe('2025-03-31')
  })

  it('ignores subscriptions without auto-renew or not yet lapsed', async () => {
    const manual = makeSubscription({ nextBillingDate: '2025-03-01', autoRenew: false })
    const current = makeSubscription({ nextBillingDate: '2025-03-12', autoRenew: true })
    const { deps } = setup([manual, current])

    expect(await advanceLapsedSubscription(deps, manual.id)).toEqual({ status: 'ignored', reason: 'nothing to advance' })
    expect(await advanceLapsedSubscription(deps, current.id)).toEqual({ status: 'ignored', reason: 'nothing to advance' })
  })
})

describe('advanceLapsed', () => {
  it('advances, deactivates and skips in one batch', async () => {
    const lapsed = makeSubscription({ startDate: '2025-01-01', nextBillingDate: '2025-03-01', autoRenew: true })
    const ending = makeSubscription({
      startDate: '2025-01-05',
      nextBillingDate: '2025-03-05',
      endDate: '2025-03-20',
      autoRenew: true,
    })
    const dueToday = makeSubscription({ startDate: '2025-01-12', nextBillingDate: '2025-03-12', autoRenew: true })
    const manual = makeSubscription({ nextBillingDate: '2025-03-01', autoRenew: false })
    const { store, deps } = setup([lapsed, ending, dueToday, manual])

    const report = await advanceLapsed(deps, { limit: 10 })

    expect(report).toEqual({
      examined: 3,
      advanced: 1,
      deactivated: 1,
      conflicts: 0,
      skipped: 1,
      hasMore: false,
      errors: { transient_io: 0, concurrency_conflict: 0, data_invariant: 0, configuration: 0, unknown: 0 },
    })
    expect(store.get(lapsed.id)?.nextBillingDate).toBe('2025-04-01')
    expect(store.get(ending.id)?.isActive).toBe(false)
    expect(store.get(manual.id)?.nextBillingDate).toBe('2025-03-01')
  })

  it('pages through every lapsed subscription in one run', async () => {
    const first = makeSubscription({ startDate: '2025-01-01', nextBillingDate: '2025-03-01', autoRenew: true })
    const second = makeSubscription({ startDate: '2025-01-02', nextBillingDate: '2025-03-02', autoRenew: true })
    const { store, deps } = setup([first, second])

    const report = await advanceLapsed(deps, { limit: 1 })

    expect(report).toMatchObject({ examined: 2, advanced: 2, hasMore: false })
    expect(store.get(first.id)?.nextBillingDate).toBe('2025-04-01')
    expect(store.get(second.id)?.nextBillingDate).toBe('2025-04-02')
  })

  it('flags when the page cap stops the run early', async () => {
    const subscriptions = [
      makeSubscription({ nextBillingDate: '2025-03-01', autoRenew: true }),
      makeSubscription({ nextBillingDate: '2025-03-02', autoRenew: true }),
    ]
    const { deps } = setup(subscriptions)

    const report = await advanceLapsed(deps, { limit: 1, maxPages: 1 })

    expect(report.examined).toBe(1)
    expect(report.hasMore).toBe(true)
  })

  it('gets past subscriptions that keep failing', async () => {
    const broken = makeSubscription({
      nextBillingDate: '2025-03-01',
      billingCycle: 'custom',
      customIntervalDays: null,
      autoRenew: true,
    })
    const healthy = makeSubscription({ startDate: '2025-01-02', nextBillingDate: '2025-03-02', autoRenew: true })
    const { store, deps } = setup([broken, healthy])

    const report = await advanceLapsed(deps, { limit: 1 })

    expect(report).toMatchObject({ examined: 2, advanced: 1, hasMore: false })
    expect(report.errors.data_invariant).toBe(1)
    expect(store.get(healthy.id)?.nextBillingDate).toBe('2025-04-02')
    expect(store.get(broken.id)?.nextBillingDate).toBe('2025-03-01')
  })

  it('counts bad data and keeps going', async () => {
    const broken = makeSubscription({
      nextBillingDate: '2025-03-01',
      billingCycle: 'custom',
      customIntervalDays: null,
      autoRenew: true,
    })
    const fine = makeSubscription({ nextBillingDate: '2025-03-02', autoRenew: true })
    const { deps } = setup([broken, fine])

    const report = await advanceLapsed(deps, { limit: 10 })

    expect(report.errors.data_invariant).toBe(1)
    expect(report.advanced).toBe(1)
  })

  it('aborts when the store is unreachable', async () => {
    const { store, deps } = setup([makeSubscription({ autoRenew: true })])
    store.failure = new TransientIOError('subscription-store', 'connection refused')

    await expect(advanceLapsed(deps, { limit: 10 })).rejects.toBe(store.failure)
  })
})
