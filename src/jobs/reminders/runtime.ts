/**
 * Production wiring for the reminder engine: Postgres stores, email delivery,
 * Slack alerts and settings from env.
 */

import { env } from '../../config/env.js'
import { db } from '../../db/client.js'
import { type Clock, systemClock } from '../../lib/clock.js'
import { EmailDeliveryChannel } from '../../services/delivery.js'
import { alertReminderDeliveryFailing } from '../../services/slack.js'
import type { AdvanceLapsedOptions, AdvancerDeps } from './advancer.js'
import { PgNotificationLedger } from './ledger.js'
import type { SchedulerDeps, SchedulerOptions } from './scheduler.js'
import { PgSubscriptionStore } from './subscriptionStore.js'

const subscriptionStore = new PgSubscriptionStore(db)
const notificationLedger = new PgNotificationLedger(db)
const emailChannel = new EmailDeliveryChannel({ timeoutMs: env.DELIVERY_TIMEOUT_MS })

export const schedulerOptions: SchedulerOptions = {
  lookaheadDays: env.REMINDER_LOOKAHEAD_DAYS,
  maxLeadDays: env.MAX_REMINDER_LEAD_DAYS,
  defaultLeadDays: env.DEFAULT_REMINDER_LEAD_DAYS,
  sendHour: env.REMINDER_SEND_HOUR,
  batchSize: env.REMINDER_BATCH_SIZE,
  claimLeaseMs: env.REMINDER_CLAIM_LEASE_MS,
  alertThreshold: env.DELIVERY_ALERT_THRESHOLD,
}

export const lapsedOptions: AdvanceLapsedOptions = {
  limit: env.REMINDER_BATCH_SIZE,
}

export function schedulerDeps(clock: Clock = systemClock): SchedulerDeps {
  return {
    subscriptions: subscriptionStore,
    ledger: notificationLedger,
    delivery: emailChannel,
    clock,
    onDeliveryFailing: alertReminderDeliveryFailing,
  }
}

export function advancerDeps(clock: Clock = systemClock): AdvancerDeps {
  return {
    subscriptions: subscriptionStore,
    ledger: notificationLedger,
    clock,
  }
}
