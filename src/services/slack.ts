/**
 * Slack Alerting Service
 *
 * Sends operational alerts to Slack for events like:
 * - Reminder deliveries that keep failing
 * - Scheduler runs aborted by a store outage
 * - Stale or failing scheduled jobs
 *
 * Uses Slack Incoming Webhooks. Configure SLACK_WEBHOOK_URL in environment variables.
 */

import { env } from '../config/env.js'
import { logger } from '../utils/logger.js'

export interface SlackMessage {
  text?: string
  blocks?: SlackBlock[]
  attachments?: SlackAttachment[]
}

interface SlackText {
  type: 'mrkdwn' | 'plain_text'
  text: string
}

interface SlackBlock {
  type: 'section' | 'divider' | 'header' | 'context'
  text?: SlackText
  fields?: SlackText[]
  elements?: SlackText[]
}

interface SlackAttachment {
  color?: string
  footer?: string
  ts?: number
}

const FOOTER = 'Renewal Reminder Alerts'

/**
 * Send a message to Slack
 * Non-blocking - errors are logged but don't throw
 */
export async function sendSlackMessage(message: SlackMessage): Promise<boolean> {
  if (!env.SLACK_WEBHOOK_URL) {
    // Silently skip if not configured - common in dev
    return false
  }

  try {
    const response = await fetch(env.SLACK_WEBHOOK_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
    })

    if (!response.ok) {
      logger.warn('[slack] Failed to send message', { status: response.status })
      return false
    }

    return true
  } catch (error) {
    logger.error('[slack] Error sending message', error)
    return false
  }
}

function footer(color: string): SlackAttachment[] {
  return [{ color, footer: FOOTER, ts: Math.floor(Date.now() / 1000) }]
}

// ============================================
// ALERT FUNCTIONS
// ============================================

/**
 * Alert: a reminder has failed delivery repeatedly and is still being retried
 */
export async function alertReminderDeliveryFailing(params: {
  reminderId: string
  subscriptionId: string
  dueDate: string
  leadDays: number
  attempts: number
  error: string
}): Promise<void> {
  await sendSlackMessage({
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: '⚠️ Reminder Delivery Failing' },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Subscription:*\n\`${params.subscriptionId}\`` },
          { type: 'mrkdwn', text: `*Due date:*\n${params.dueDate} (${params.leadDays}d lead)` },
          { type: 'mrkdwn', text: `*Attempts:*\n${params.attempts}` },
          { type: 'mrkdwn', text: `*Last error:*\n${params.error}` },
        ],
      },
      {
        type: 'context',
        elements: [{ type: 'mrkdwn', text: `Reminder ID: \`${params.reminderId}\`` }],
      },
    ],
    attachments: footer('#f59e0b'),
  })
}

/**
 * Alert: a scheduler run aborted on a systemic fault
 */
export async function alertSchedulerRunFailed(params: {
  job: string
  state: string
  error: string
  counts?: Record<string, number>
}): Promise<void> {
  const countsStr = params.counts
    ? Object.entries(params.counts)
        .map(([k, v]) => `• ${k}: ${v}`)
        .join('\n')
    : 'No progress recorded'

  await sendSlackMessage({
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: '🔥 Scheduler Run Failed' },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Job:*\n${params.job}` },
          { type: 'mrkdwn', text: `*Failed in:*\n${params.state}` },
          { type: 'mrkdwn', text: `*Error:*\n${params.error}` },
        ],
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Progress before failure:*\n${countsStr}` },
      },
    ],
    attachments: footer('#dc2626'),
  })
}

/**
 * Alert: scheduled jobs are stale or failing
 */
export async function alertJobsUnhealthy(params: {
  status: 'degraded' | 'critical'
  staleJobs: string[]
  failedJobs: string[]
}): Promise<void> {
  const emoji = params.status === 'critical' ? '🚨' : '⚠️'

  await sendSlackMessage({
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: `${emoji} Jobs ${params.status.toUpperCase()}` },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Stale:*\n${params.staleJobs.join(', ') || 'none'}` },
          { type: 'mrkdwn', text: `*Failed:*\n${params.failedJobs.join(', ') || 'none'}` },
        ],
      },
    ],
    attachments: footer(params.status === 'critical' ? '#dc2626' : '#f59e0b'),
  })
}
