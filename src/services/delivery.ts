/**
 * Delivery channels for reminders.
 *
 * A channel reports failure through its result instead of throwing, so the
 * scheduler can release the claim and keep going.
 */

import { env } from '../config/env.js'
import type { Clock } from '../lib/clock.js'
import { type CalendarDate } from '../utils/calendarDate.js'
import { withCircuitBreaker } from '../utils/circuitBreaker.js'
import { getErrorMessage } from '../utils/errors.js'
import { type ReminderMessage, buildReminderMessage } from '../jobs/reminders/message.js'
import type { ReminderRecord, Subscription } from '../jobs/reminders/types.js'
import { type EmailResult, sendRenewalReminderEmail } from './email.js'

export interface ReminderDelivery {
  reminder: ReminderRecord
  subscription: Subscription
  /** Calendar date in the subscription's timezone at send time */
  today: CalendarDate
}

export interface DeliveryResult {
  success: boolean
  messageId?: string
  error?: string
}

export interface DeliveryChannel {
  readonly name: string
  send(delivery: ReminderDelivery): Promise<DeliveryResult>
}

/** `signal` is aborted when the delivery times out */
export type EmailSender = (message: ReminderMessage, signal: AbortSignal) => Promise<EmailResult>

export interface EmailDeliveryOptions {
  sender?: EmailSender
  timeoutMs?: number
  circuitName?: string
  clock?: Clock
}

export class EmailDeliveryChannel implements DeliveryChannel {
  readonly name = 'email'
  private readonly sender: EmailSender
  private readonly timeoutMs: number
  private readonly circuitName: string
  private readonly clock?: Clock

  constructor(options: EmailDeliveryOptions = {}) {
    this.sender = options.sender ?? sendRenewalReminderEmail
    this.timeoutMs = options.timeoutMs ?? env.DELIVERY_TIMEOUT_MS
    this.circuitName = options.circuitName ?? 'email'
    this.clock = options.clock
  }

  async send({ reminder, subscription, today }: ReminderDelivery): Promise<DeliveryResult> {
    const message = buildReminderMessage(subscription, reminder, today)

    try {
      const result = await withCircuitBreaker({ name: this.circuitName, timeout: this.timeoutMs, clock: this.clock }, async (signal) => {
        const sent = await this.sender(message, signal)
        // Count provider rejections against the breaker too
        if (!sent.success) throw new Error(sent.error ?? 'Email provider rejected the message')
        return sent
      })
      return { success: true, messageId: result.messageId }
    } catch (err) {
      return { success: false, error: getErrorMessage(err) }
    }
  }
}
