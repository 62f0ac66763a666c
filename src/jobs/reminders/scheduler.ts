/**
 * Scheduler Run
 *
 * One invocation walks Loading -> Reconciling -> Delivering -> Done. Runs may
 * overlap; they coordinate only through the ledger's ensure/claim statements.
 *
 * Per-subscription problems (bad data, unsupported cycle, lost races) are
 * counted and skipped. A store outage aborts the run with SchedulerRunError.
 */

import { randomUUID } from 'node:crypto'
import { type Clock, today as todayIn } from '../../lib/clock.js'
import type { DeliveryChannel } from '../../services/delivery.js'
import { type CalendarDate, addDays, subtractDays } from '../../utils/calendarDate.js'
import {
  ConfigurationError,
  DataInvariantViolationError,
  type ReminderErrorKind,
  errorKindOf,
  getErrorMessage,
  isSystemicError,
} from '../../utils/errors.js'
import { type ChildLogger, logger as rootLogger } from '../../utils/logger.js'
import type { NotificationLedger } from './ledger.js'
import { type ReminderPolicyOptions, requiredReminders } from './policy.js'
import type { SubscriptionStore } from './subscriptionStore.js'
import { CANCEL_REASONS, type CancelReason, type ReminderRecord, type Subscription } from './types.js'

export type SchedulerState = 'loading' | 'reconciling' | 'delivering' | 'done' | 'failed'

export interface DeliveryFailingAlert {
  reminderId: string
  subscriptionId: string
  dueDate: CalendarDate
  leadDays: number
  attempts: number
  error: string
}

export type RunLogger = Pick<ChildLogger, 'debug' | 'info' | 'warn' | 'error'>

export interface SchedulerDeps {
  subscriptions: SubscriptionStore
  ledger: NotificationLedger
  delivery: DeliveryChannel
  clock: Clock
  logger?: RunLogger
  /** Called once a reminder's failed attempts reach the alert threshold */
  onDeliveryFailing?: (alert: DeliveryFailingAlert) => Promise<void>
}

export interface SchedulerOptions extends ReminderPolicyOptions {
  lookaheadDays: number
  batchSize: number
  claimLeaseMs: number
  alertThreshold: number
  /** Upper bound on claim batches per run */
  maxBatches?: number
}

export type ErrorCounts = Record<ReminderErrorKind | 'unknown', number>

export interface SchedulerRunReport {
  runId: string
  state: SchedulerState
  startedAt: Date
  finishedAt: Date | null
  window: { from: CalendarDate; to: CalendarDate } | null
  subscriptionsLoaded: number
  subscriptionsReconciled: number
  subscriptionsSkipped: number
  remindersCreated: number
  remindersExisting: number
  remindersObsoleted: number
  claimed: number
  sent: number
  failed: number
  canceledStale: number
  errors: ErrorCounts
}

export class SchedulerRunError extends Error {
  public readonly state: SchedulerState
  public readonly report: SchedulerRunReport

  constructor(state: SchedulerState, report: SchedulerRunReport, cause: unknown) {
    super(`Scheduler run ${report.runId} failed while ${state}: ${getErrorMessage(cause)}`, { cause })
    this.name = 'SchedulerRunError'
    this.state = state
    this.report = report
  }
}

const DEFAULT_MAX_BATCHES = 10

function emptyErrorCounts(): ErrorCounts {
  return { transient_io: 0, concurrency_conflict: 0, data_invariant: 0, configuration: 0, unknown: 0 }
}

/** Numeric fields of a report, for alerts and job responses */
export function reportCounts(report: SchedulerRunReport): Record<string, number> {
  return {
    subscriptionsLoaded: report.subscriptionsLoaded,
    subscriptionsReconciled: report.subscriptionsReconciled,
    remindersCreated: report.remindersCreated,
    claimed: report.claimed,
    sent: report.sent,
    failed: report.failed,
    canceledStale: report.canceledStale,
  }
}

export function assertSchedulerOptions(options: SchedulerOptions): void {
  if (options.lookaheadDays < options.maxLeadDays) {
    throw new ConfigurationError(
      `lookahead of ${options.lookaheadDays} days is shorter than the maximum lead of ${options.maxLeadDays} days`
    )
  }
  if (!Number.isInteger(options.sendHour) || options.sendHour < 0 || options.sendHour > 23) {
    throw new ConfigurationError(`send hour must be 0-23, got ${options.sendHour}`)
  }
  if (options.batchSize < 1) {
    throw new ConfigurationError(`batch size must be positive, got ${options.batchSize}`)
  }
}

/**
 * Why a claimed reminder should not be delivered, or null when it still applies.
 */
export function staleReason(
  record: Pick<ReminderRecord, 'dueDate'>,
  subscription: Subscription | null
): CancelReason | null {
  if (!subscription || !subscription.isActive) return CANCEL_REASONS.subscriptionInactive
  if (subscription.nextBillingDate !== record.dueDate) return CANCEL_REASONS.staleDueDate
  if (subscription.endDate !== null && subscription.endDate < record.dueDate) return CANCEL_REASONS.subscriptionEnded
  return null
}

export async function runScheduler(deps: SchedulerDeps, options: SchedulerOptions): Promise<SchedulerRunReport> {
  assertSchedulerOptions(options)

  const { subscriptions, ledger, clock } = deps
  const report: SchedulerRunReport = {
    runId: randomUUID(),
    state: 'loading',
    startedAt: clock.now(),
    finishedAt: null,
    window: null,
    subscriptionsLoaded: 0,
    subscriptionsReconciled: 0,
    subscriptionsSkipped: 0,
    remindersCreated: 0,
    remindersExisting: 0,
    remindersObsoleted: 0,
    claimed: 0,
    sent: 0,
    failed: 0,
    canceledStale: 0,
    errors: emptyErrorCounts(),
  }
  const log = deps.logger ?? rootLogger.child({ job: 'scheduled-reminders', runId: report.runId })

  const countError = (error: unknown) => {
    report.errors[errorKindOf(error)]++
  }

  try {
    // ---- Loading ----
    // The store window is padded a day each side; every zone's "today" is within a day of UTC's.
    const utcToday = todayIn(clock, 'UTC')
    report.window = {
      from: subtractDays(utcToday, 1),
      to: addDays(utcToday, options.lookaheadDays + 1),
    }
    const candidates = await subscriptions.listDueWithin(report.window)
    report.subscriptionsLoaded = candidates.length

    // ---- Reconciling ----
    report.state = 'reconciling'
    for (const subscription of candidates) {
      try {
        const localToday = todayIn(clock, subscription.timezone)
        const due = subscription.nextBillingDate
        if (due < localToday || due > addDays(localToday, options.lookaheadDays)) {
          report.subscriptionsSkipped++
          continue
        }

        const required = requiredReminders(subscription, localToday, options)
        const now = clock.now()

        if (required.length === 0) {
          const reason = subscription.isActive ? CANCEL_REASONS.subscriptionEnded : CANCEL_REASONS.subscriptionInactive
          report.remindersObsoleted += await ledger.cancelPendingForDueDate(subscription.id, due, reason, now)
          report.subscriptionsSkipped++
          continue
        }

        for (const reminder of required) {
          const { record, created } = await ledger.ensureExists(
            { subscriptionId: reminder.subscriptionId, dueDate: reminder.dueDate, leadDays: reminder.leadDays },
            reminder.scheduledFor,
            reminder.scheduledAt
          )
          if (created) {
            report.remindersCreated++
            log.debug('Reminder created', { subscriptionId: record.subscriptionId, dueDate: record.dueDate, leadDays: record.leadDays })
          } else {
            report.remindersExisting++
          }
        }

        report.remindersObsoleted += await ledger.cancelObsoleteLeads(
          subscription.id,
          due,
          required.map(r => r.leadDays),
          CANCEL_REASONS.leadDayRemoved,
          now
        )
        report.subscriptionsReconciled++
      } catch (error) {
        if (isSystemicError(error)) throw error
        countError(error)
        log.warn('Skipping subscription during reconcile', {
          subscriptionId: subscription.id,
          kind: errorKindOf(error),
          reason: getErrorMessage(error),
        })
      }
    }

    // ---- Delivering ----
    report.state = 'delivering'
    const maxBatches = options.maxBatches ?? DEFAULT_MAX_BATCHES

    for (let batch = 0; batch < maxBatches; batch++) {
      const claimed = await ledger.claimDue(clock.now(), { limit: options.batchSize, leaseMs: options.claimLeaseMs })
      report.claimed += claimed.length

      let batchFailures = 0
      for (const record of claimed) {
        const outcome = await deliverOne(deps, log, options, record)
        if (outcome === 'sent') report.sent++
        else if (outcome === 'canceled') report.canceledStale++
        else {
          batchFailures++
          if (outcome !== 'failed') countError(outcome.error)
        }
      }
      report.failed += batchFailures

      // Released records are due again immediately; leave them for the next run
      if (claimed.length < options.batchSize || batchFailures > 0) break
    }

    report.state = 'done'
    report.finishedAt = clock.now()
    log.info('Scheduler run complete', { ...reportCounts(report), errors: report.errors })
    return report
  } catch (error) {
    const failedIn = report.state
    report.state = 'failed'
    report.finishedAt = clock.now()
    countError(error)
    log.error(`Scheduler run failed while ${failedIn}`, error, reportCounts(report))
    throw new SchedulerRunError(failedIn, report, error)
  }
}

type DeliveryOutcome = 'sent' | 'canceled' | 'failed' | { error: unknown }

async function deliverOne(
  deps: SchedulerDeps,
  log: RunLogger,
  options: SchedulerOptions,
  record: ReminderRecord
): Promise<DeliveryOutcome> {
  const { subscriptions, ledger, delivery, clock } = deps
  const context = { reminderId: record.id, subscriptionId: record.subscriptionId, dueDate: record.dueDate }

  try {
    const claimToken = record.claimToken
    if (!claimToken) {
      throw new DataInvariantViolationError('claimToken', `claimed reminder ${record.id} has no claim token`)
    }

    const subscription = await subscriptions.findById(record.subscriptionId)
    const reason = staleReason(record, subscription)
    if (reason || !subscription) {
      await ledger.markCanceled(record.id, reason ?? CANCEL_REASONS.subscriptionInactive, clock.now())
      log.info('Reminder canceled', { ...context, reason })
      return 'canceled'
    }

    const result = await delivery.send({
      reminder: record,
      subscription,
      today: todayIn(clock, subscription.timezone),
    })

    if (result.success) {
      const marked = await ledger.markSent(record.id, claimToken, clock.now())
      if (!marked) {
        // Lease expired and another run took over; at-least-once delivery
        log.warn('Reminder claim lost before it could be marked sent', context)
      } else {
        log.info('Reminder sent', { ...context, channel: delivery.name, messageId: result.messageId })
      }
      return 'sent'
    }

    const errorMessage = result.error ?? 'delivery failed'
    const released = await ledger.releaseClaim(record.id, claimToken, errorMessage, clock.now())
    const attempts = released?.attempts ?? record.attempts + 1
    log.warn('Reminder delivery failed', { ...context, attempts, reason: errorMessage })

    if (attempts >= options.alertThreshold) {
      log.error('Reminder delivery keeps failing', undefined, { ...context, attempts, reason: errorMessage })
      if (deps.onDeliveryFailing) {
        await deps
          .onDeliveryFailing({
            reminderId: record.id,
            subscriptionId: record.subscriptionId,
            dueDate: record.dueDate,
            leadDays: record.leadDays,
            attempts,
            error: errorMessage,
          })
          .catch((alertError: unknown) => log.warn('Delivery alert hook failed', { reason: getErrorMessage(alertError) }))
      }
    }
    return 'failed'
  } catch (error) {
    if (isSystemicError(error)) throw error
    // The claim lease recovers the record on a later run
    log.warn('Skipping reminder during delivery', { ...context, kind: errorKindOf(error), reason: getErrorMessage(error) })
    return { error }
  }
}
