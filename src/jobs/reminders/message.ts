/**
 * Reminder content
 *
 * Renders the subject, plain-text and HTML bodies for one reminder. The
 * countdown is measured from the day the reminder actually goes out, so a
 * reminder delivered late never claims more days than remain.
 */

import { format } from 'date-fns'
import { type CalendarDate, daysBetween, toLocalDate } from '../../utils/calendarDate.js'
import {
  baseTemplate,
  countdownChip,
  detailsPanel,
  escapeHtml,
  formatAmountForEmail,
  mutedText,
  sanitizeEmailSubject,
} from '../../services/emailTemplates.js'
import type { ReminderRecord, Subscription } from './types.js'

export interface ReminderMessage {
  to: string
  subject: string
  text: string
  html: string
}

export function renewalPhrase(daysUntilDue: number): string {
  if (daysUntilDue <= 0) return 'today'
  if (daysUntilDue === 1) return 'tomorrow'
  return `in ${daysUntilDue} days`
}

export function formatBillingDate(date: CalendarDate): string {
  return format(toLocalDate(date), 'MMMM d, yyyy')
}

export function buildReminderMessage(
  subscription: Subscription,
  reminder: Pick<ReminderRecord, 'dueDate'>,
  today: CalendarDate
): ReminderMessage {
  const daysUntilDue = Math.max(0, daysBetween(today, reminder.dueDate))
  const amount = formatAmountForEmail(subscription.amount, subscription.currency)
  const billingDate = formatBillingDate(reminder.dueDate)
  const greeting = subscription.ownerName ? `Hi ${subscription.ownerName},` : 'Hi there,'
  const summary =
    `Your ${subscription.name} subscription will be renewed ${renewalPhrase(daysUntilDue)} ` +
    `on ${reminder.dueDate} for ${amount}.`

  const text = [
    greeting,
    '',
    summary,
    '',
    `Subscription: ${subscription.name}`,
    `Amount: ${amount}`,
    `Billing date: ${billingDate}`,
    '',
    'Please make sure your payment method is up to date.',
  ].join('\n')

  const html = baseTemplate({
    preheader: summary,
    eyebrow: 'Reminder',
    headline: 'Upcoming subscription renewal',
    body: `
      ${countdownChip(daysUntilDue, daysUntilDue <= 1)}
      <p style="margin: 0 0 16px 0;">${escapeHtml(greeting)}</p>
      <p style="margin: 0 0 16px 0;">${escapeHtml(summary)}</p>
      ${detailsPanel([
        { label: 'Subscription', value: subscription.name },
        { label: 'Amount', value: amount, emphasize: true },
        { label: 'Billing date', value: billingDate },
      ])}
      ${mutedText('Please make sure your payment method is up to date.')}
    `,
  })

  return {
    to: subscription.ownerEmail,
    subject: sanitizeEmailSubject(`${subscription.name} subscription reminder`),
    text,
    html,
  }
}
