/**
 * Cycle Advancer
 *
 * Moves a subscription's `nextBillingDate` forward after a payment or after a
 * lapsed auto-renew cycle, and cancels the pending reminders that pointed at
 * the superseded due dates. Writes are compare-and-set on the old due date, so
 * two advancers racing on the same subscription cannot both apply. A payment's
 * id is stored with the due date it advanced, so redelivering that payment
 * never moves the date a second time.
 */

import { type Clock, today as todayIn } from '../../lib/clock.js'
import { type CalendarDate, addDays, assertCalendarDate } from '../../utils/calendarDate.js'
import {
  ConcurrencyConflictError,
  errorKindOf,
  getErrorMessage,
  isSystemicError,
} from '../../utils/errors.js'
import { logger } from '../../utils/logger.js'
import { cadenceOfSubscription, effectiveBillingDay, nextDueDate, rollForward } from './cycle.js'
import type { NotificationLedger } from './ledger.js'
import type { ErrorCounts } from './scheduler.js'
import type { LapsedCursor, SubscriptionStore } from './subscriptionStore.js'
import { CANCEL_REASONS, type PaymentRecordedEvent, type Subscription } from './types.js'

export interface AdvancerDeps {
  subscriptions: SubscriptionStore
  ledger: NotificationLedger
  clock: Clock
}

export type AdvanceOutcome =
  | { status: 'ignored'; reason: string }
  | { status: 'not_found' }
  | { status: 'inactive' }
  | { status: 'advanced'; from: CalendarDate; to: CalendarDate; canceledReminders: number }
  | { status: 'already_applied'; paymentId: string; nextBillingDate: CalendarDate; canceledReminders: number }
  | { status: 'deactivated'; endDate: CalendarDate; canceledReminders: number }
  | { status: 'conflict' }

export interface AdvanceLapsedOptions {
  /** Page size */
  limit: number
  /** Pages per run; later pages wait for the next run */
  maxPages?: number
}

const DEFAULT_MAX_PAGES = 20

export interface AdvanceLapsedReport {
  examined: number
  advanced: number
  deactivated: number
  conflicts: number
  skipped: number
  /** The page cap was reached before the lapsed set ran out */
  hasMore: boolean
  errors: ErrorCounts
}

type Trigger = { kind: 'payment'; paymentId: string } | { kind: 'lapse' }

/**
 * Persist `newDueDate` (or deactivate when it passes the end date) and cancel
 * reminders for every superseded due date.
 */
async function applyAdvance(
  deps: AdvancerDeps,
  subscription: Subscription,
  newDueDate: CalendarDate,
  superseded: readonly CalendarDate[],
  trigger: Trigger
): Promise<AdvanceOutcome> {
  const { subscriptions, ledger, clock } = deps
  const oldDueDate = subscription.nextBillingDate

  if (subscription.endDate !== null && newDueDate > subscription.endDate) {
    await subscriptions.deactivate(subscription.id)
    const canceledReminders = await ledger.cancelAllPending(subscription.id, CANCEL_REASONS.subscriptionEnded, clock.now())
    logger.cycle.ended(subscription.id, subscription.endDate)
    return { status: 'deactivated', endDate: subscription.endDate, canceledReminders }
  }

  const appliedPaymentId = trigger.kind === 'payment' ? trigger.paymentId : subscription.lastPaymentId
  const updated = await subscriptions.updateNextBillingDate(subscription.id, oldDueDate, newDueDate, appliedPaymentId)
  if (!updated) {
    throw new ConcurrencyConflictError(subscription.id, `nextBillingDate is no longer ${oldDueDate}`)
  }

  let canceledReminders = 0
  for (const dueDate of superseded) {
    canceledReminders += await ledger.cancelPendingForDueDate(
      subscription.id,
      dueDate,
      CANCEL_REASONS.cycleAdvanced,
      clock.now()
    )
  }

  logger.cycle.advanced(subscription.id, oldDueDate, newDueDate, trigger.kind)
  return { status: 'advanced', from: oldDueDate, to: newDueDate, canceledReminders }
}

/**
 * A redelivered payment whose advance already committed. Finishes the reminder
 * cleanup the first delivery may not have reached.
 */
async function settleAppliedPayment(
  deps: AdvancerDeps,
  subscription: Subscription,
  paymentId: string
): Promise<AdvanceOutcome> {
  const { ledger, clock } = deps
  const records = await ledger.listForSubscription(subscription.id)
  const superseded = new Set(
    records.filter(r => r.status === 'pending' && r.dueDate < subscription.nextBillingDate).map(r => r.dueDate)
  )

  let canceledReminders = 0
  for (const dueDate of superseded) {
    canceledReminders += await ledger.cancelPendingForDueDate(
      subscription.id,
      dueDate,
      CANCEL_REASONS.cycleAdvanced,
      clock.now()
    )
  }

  logger.info('Payment already applied', { subscriptionId: subscription.id, paymentId, canceledReminders })
  return { status: 'already_applied', paymentId, nextBillingDate: subscription.nextBillingDate, canceledReminders }
}

/**
 * Re-read and retry once when the conditional update loses a race.
 */
async function withConflictRetry(
  deps: AdvancerDeps,
  subscriptionId: string,
  attempt: (subscription: Subscription) => Promise<AdvanceOutcome | null>
): Promise<AdvanceOutcome> {
  for (let round = 0; round < 2; round++) {
    const subscription = await deps.subscriptions.findById(subscriptionId)
    if (!subscription) return { status: 'not_found' }
    if (!subscription.isActive) return { status: 'inactive' }

    try {
      const outcome = await attempt(subscription)
      return outcome ?? { status: 'ignored', reason: 'nothing to advance' }
    } catch (error) {
      if (!(error instanceof ConcurrencyConflictError)) throw error
      if (round > 0) {
        logger.cycle.conflict(subscriptionId, subscription.nextBillingDate)
        return { status: 'conflict' }
      }
    }
  }
  return { status: 'conflict' }
}

/**
 * Advance one cycle for a recorded payment. Only `paid` payments count.
 */
export async function advanceOnPayment(deps: AdvancerDeps, event: PaymentRecordedEvent): Promise<AdvanceOutcome> {
  if (event.status !== 'paid') {
    return { status: 'ignored', reason: `payment status is ${event.status}` }
  }
  assertCalendarDate(event.paymentDate, 'paymentDate')

  return withConflictRetry(deps, event.subscriptionId, subscription => {
    if (subscription.lastPaymentId === event.paymentId) {
      return settleAppliedPayment(deps, subscription, event.paymentId)
    }

    const newDueDate = nextDueDate(
      subscription.nextBillingDate,
      cadenceOfSubscription(subscription),
      effectiveBillingDay(subscription)
    )
    return applyAdvance(deps, subscription, newDueDate, [subscription.nextBillingDate], {
      kind: 'payment',
      paymentId: event.paymentId,
    })
  })
}

/**
 * Roll a lapsed auto-renew subscription forward until its due date is today
 * or later in its own timezone. A subscription that has not lapsed is ignored.
 */
export async function advanceLapsedSubscription(deps: AdvancerDeps, subscriptionId: string): Promise<AdvanceOutcome> {
  return withConflictRetry(deps, subscriptionId, async subscription => {
    if (!subscription.autoRenew) return null

    const localToday = todayIn(deps.clock, subscription.timezone)
    if (subscription.nextBillingDate >= localToday) return null

    const { dueDate, superseded } = rollForward(
      subscription.nextBillingDate,
      cadenceOfSubscription(subscription),
      effectiveBillingDay(subscription),
      localToday
    )
    return applyAdvance(deps, subscription, dueDate, superseded, { kind: 'lapse' })
  })
}

/**
 * Time-based trigger: advance lapsed auto-renew subscriptions page by page.
 * Pages follow a (nextBillingDate, id) cursor, so a subscription that keeps
 * failing is passed over instead of blocking the ones behind it. Failures are
 * isolated per subscription; a store outage aborts the run.
 */
export async function advanceLapsed(deps: AdvancerDeps, options: AdvanceLapsedOptions): Promise<AdvanceLapsedReport> {
  const report: AdvanceLapsedReport = {
    examined: 0,
    advanced: 0,
    deactivated: 0,
    conflicts: 0,
    skipped: 0,
    hasMore: false,
    errors: { transient_io: 0, concurrency_conflict: 0, data_invariant: 0, configuration: 0, unknown: 0 },
  }

  // A day of margin: zones ahead of UTC may already be a day further on
  const before = addDays(todayIn(deps.clock, 'UTC'), 1)
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
  let cursor: LapsedCursor | null = null

  for (let page = 0; page < maxPages; page++) {
    const lapsed = await deps.subscriptions.listLapsedAutoRenew(before, options.limit, cursor)
    report.examined += lapsed.length
    for (const subscription of lapsed) {
      await advanceOneLapsed(deps, subscription.id, report)
    }

    const last = lapsed.at(-1)
    if (!last || lapsed.length < options.limit) return report
    cursor = { nextBillingDate: last.nextBillingDate, id: last.id }
  }

  report.hasMore = true
  return report
}

async function advanceOneLapsed(deps: AdvancerDeps, subscriptionId: string, report: AdvanceLapsedReport): Promise<void> {
  try {
    const outcome = await advanceLapsedSubscription(deps, subscriptionId)
    switch (outcome.status) {
      case 'advanced':
        report.advanced++
        break
      case 'deactivated':
        report.deactivated++
        break
      case 'conflict':
        report.conflicts++
        report.errors.concurrency_conflict++
        break
      default:
        report.skipped++
    }
  } catch (error) {
    if (isSystemicError(error)) throw error
    report.errors[errorKindOf(error)]++
    logger.warn('Skipping lapsed subscription', {
      subscriptionId,
      kind: errorKindOf(error),
      reason: getErrorMessage(error),
    })
  }
}
