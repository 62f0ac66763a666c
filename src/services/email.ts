// Email Service
//
// Template infrastructure lives in emailTemplates.ts; this file owns the Resend
// client and the send functions.

import { Resend } from 'resend'
import { env } from '../config/env.js'
import { logger, logEmailSent, logEmailFailed } from '../utils/logger.js'
import { getErrorMessage } from '../utils/errors.js'
import type { ReminderMessage } from '../jobs/reminders/message.js'
import { MAX_RETRIES, RETRY_DELAYS_MS, sleep } from './emailTemplates.js'

const resend = new Resend(env.RESEND_API_KEY)

export interface EmailResult {
  success: boolean
  messageId?: string
  error?: string
  attempts: number
}

export interface OutgoingEmail {
  to: string
  subject: string
  html: string
  text: string
}

type EmailApiResponse = {
  data: { id: string } | null
  error: { message: string } | null
}

// ============================================
// RETRY WRAPPER
// ============================================

/**
 * Send email with automatic retry on failure.
 * Validation errors (bad address etc.) are returned on the first attempt.
 * No further attempt starts once `signal` is aborted.
 */
export async function sendWithRetry(
  emailFn: () => Promise<EmailApiResponse>,
  delaysMs: readonly number[] = RETRY_DELAYS_MS,
  signal?: AbortSignal
): Promise<EmailResult> {
  let lastError: string | undefined

  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    if (signal?.aborted) {
      logger.warn('[email] Retries abandoned', { attempts: attempt, reason: lastError })
      return { success: false, error: getErrorMessage(signal.reason), attempts: attempt }
    }

    try {
      const { data, error } = await emailFn()

      if (error) {
        lastError = error.message
        logger.warn(`[email] Attempt ${attempt + 1} failed`, { reason: error.message })

        // Don't retry on validation errors (bad email address, etc.)
        if (error.message.includes('validation') || error.message.includes('invalid')) {
          return { success: false, error: error.message, attempts: attempt + 1 }
        }
      } else if (data?.id) {
        return { success: true, messageId: data.id, attempts: attempt + 1 }
      } else {
        lastError = 'No response data'
      }
    } catch (err) {
      lastError = getErrorMessage(err)
      logger.warn(`[email] Attempt ${attempt + 1} threw`, { reason: lastError })
    }

    // Wait before retry
    if (attempt < MAX_RETRIES - 1) {
      await sleep(delaysMs[attempt] ?? 0)
    }
  }

  logger.error(`[email] All ${MAX_RETRIES} attempts failed`, undefined, { reason: lastError })
  return { success: false, error: lastError, attempts: MAX_RETRIES }
}

export function sendEmail(email: OutgoingEmail, signal?: AbortSignal): Promise<EmailResult> {
  // Never reach the provider from tests
  if (env.NODE_ENV === 'test') {
    return Promise.resolve({ success: true, attempts: 0, messageId: 'skipped_test' })
  }

  return sendWithRetry(() =>
    resend.emails.send({
      from: env.EMAIL_FROM,
      to: email.to,
      subject: email.subject,
      html: email.html,
      text: email.text,
    }),
    RETRY_DELAYS_MS,
    signal
  )
}

// ============================================
// REMINDER EMAILS
// ============================================

export async function sendRenewalReminderEmail(message: ReminderMessage, signal?: AbortSignal): Promise<EmailResult> {
  const result = await sendEmail(message, signal)

  if (result.success) {
    logEmailSent('renewal reminder', message.to, { messageId: result.messageId, attempts: result.attempts })
  } else {
    logEmailFailed('renewal reminder', message.to, result.error ?? 'unknown error', { attempts: result.attempts })
  }

  return result
}
