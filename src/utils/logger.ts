/**
 * Structured Logging Utility
 * Provides consistent JSON logging in production for log aggregation
 * Automatically sanitizes PII (emails, phone numbers, credentials)
 */

import { env } from '../config/env.js'
import { sanitizeForLogging, maskEmail } from './pii.js'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  requestId?: string
  userId?: string
  subscriptionId?: string
  reminderId?: string
  job?: string
  duration?: number
  [key: string]: unknown
}

interface StructuredLog {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

// Minimum log level based on environment
const MIN_LEVEL: LogLevel = env.NODE_ENV === 'production' ? 'info' : 'debug'

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[MIN_LEVEL]
}

export function formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
  const log: StructuredLog = {
    timestamp: new Date().toISOString(),
    level,
    message,
  }

  // Sanitize context to remove/mask PII
  if (context && Object.keys(context).length > 0) {
    log.context = sanitizeForLogging(context)
  }

  if (error) {
    log.error = {
      name: error.name,
      message: error.message,
      stack: env.NODE_ENV !== 'production' ? error.stack : undefined,
    }
  }

  // In production, output JSON for log aggregators
  // In development, output formatted logs for readability
  if (env.NODE_ENV === 'production') {
    return JSON.stringify(log)
  }

  // Development format: [timestamp] LEVEL message {context}
  const contextStr = log.context ? ` ${JSON.stringify(log.context)}` : ''
  const errorStr = error ? ` | Error: ${error.message}` : ''
  return `[${log.timestamp}] ${level.toUpperCase()} ${message}${contextStr}${errorStr}`
}

function logMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
  if (!shouldLog(level)) return

  const formatted = formatLog(level, message, context, error)

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
      console.error(formatted)
      break
  }
}

/**
 * Logger instance with structured logging methods
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    logMessage('debug', message, context)
  },

  info(message: string, context?: LogContext): void {
    logMessage('info', message, context)
  },

  warn(message: string, context?: LogContext): void {
    logMessage('warn', message, context)
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined
    logMessage('error', message, context, err)
  },

  /**
   * Create a child logger with preset context
   * Useful for request- or run-scoped logging
   */
  child(baseContext: LogContext) {
    return {
      debug: (message: string, context?: LogContext) =>
        logMessage('debug', message, { ...baseContext, ...context }),
      info: (message: string, context?: LogContext) =>
        logMessage('info', message, { ...baseContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        logMessage('warn', message, { ...baseContext, ...context }),
      error: (message: string, error?: unknown, context?: LogContext) =>
        logMessage('error', message, { ...baseContext, ...context }, error instanceof Error ? error : undefined),
    }
  },

  /**
   * Log billing cycle advancement
   */
  cycle: {
    advanced(subscriptionId: string, from: string, to: string, trigger: 'payment' | 'lapse'): void {
      logMessage('info', 'Billing cycle advanced', { subscriptionId, from, to, trigger })
    },

    ended(subscriptionId: string, endDate: string): void {
      logMessage('info', 'Subscription reached end date', { subscriptionId, endDate })
    },

    conflict(subscriptionId: string, expected: string): void {
      logMessage('warn', 'Billing cycle advanced concurrently, skipping', { subscriptionId, expected })
    },
  },

  /**
   * Log circuit breaker events
   */
  circuitBreaker: {
    opened(name: string, failureCount: number): void {
      logMessage('warn', 'Circuit breaker opened', { name, failureCount })
    },

    halfOpen(name: string): void {
      logMessage('info', 'Circuit breaker half-open', { name })
    },

    closed(name: string): void {
      logMessage('info', 'Circuit breaker closed', { name })
    },
  },
}

export type Logger = typeof logger
export type ChildLogger = ReturnType<typeof logger.child>

// ============================================
// Safe Error Response Utilities
// ============================================

/**
 * Safe error codes for client responses
 * Use these instead of exposing raw error messages
 */
export const ErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  JOB_FAILED: 'JOB_FAILED',
  QUEUE_ERROR: 'QUEUE_ERROR',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

/**
 * Safe error messages that can be shown to clients
 */
const SAFE_ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCodes.INTERNAL_ERROR]: 'An unexpected error occurred. Please try again.',
  [ErrorCodes.INVALID_REQUEST]: 'Invalid request. Please check your input.',
  [ErrorCodes.NOT_FOUND]: 'The requested resource was not found.',
  [ErrorCodes.UNAUTHORIZED]: 'Authentication required.',
  [ErrorCodes.VALIDATION_ERROR]: 'Invalid input. Please check your data.',
  [ErrorCodes.JOB_FAILED]: 'Operation failed. Please try again.',
  [ErrorCodes.QUEUE_ERROR]: 'Service temporarily unavailable.',
  [ErrorCodes.STORE_UNAVAILABLE]: 'Storage temporarily unavailable. The job will be retried.',
}

export function getSafeErrorMessage(code: ErrorCode): string {
  return SAFE_ERROR_MESSAGES[code]
}

/**
 * Create a safe error response for API endpoints
 * Logs full error details server-side, returns safe message to client
 *
 * @example
 * try {
 *   await runScheduler(deps)
 * } catch (err) {
 *   return c.json(safeError('JOB_FAILED', err, 'scheduled-reminders'), 500)
 * }
 */
export function safeError(
  code: ErrorCode,
  error: unknown,
  source?: string
): { error: string; code: ErrorCode } {
  const errorDetail = error instanceof Error ? error.message : String(error)
  const prefix = source ? `[${source}] ` : ''

  logger.error(`${prefix}${code}: ${errorDetail}`, error)

  return {
    error: getSafeErrorMessage(code),
    code,
  }
}

/**
 * Log an email send event with the address masked
 */
export function logEmailSent(type: string, email: string, context?: LogContext): void {
  logger.info(`Email ${type} sent to ${maskEmail(email)}`, context)
}

/**
 * Log an email failure with the address masked
 */
export function logEmailFailed(type: string, email: string, error: unknown, context?: LogContext): void {
  const errorMsg = error instanceof Error ? error.message : String(error)
  logger.error(`Email ${type} failed to ${maskEmail(email)}: ${errorMsg}`, error, context)
}
