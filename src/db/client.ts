import { drizzle } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'
import { env } from '../config/env.js'
import { TransientIOError, getErrorMessage } from '../utils/errors.js'
import * as schema from './schema.js'

// Keep the pool small; the scheduler and worker each hold their own.
export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: env.DATABASE_POOL_MAX,
  connectionTimeoutMillis: 5000,
  idleTimeoutMillis: 30000,
})

// Idle clients can be dropped by the server; log instead of crashing the process
pool.on('error', (err) => {
  console.error('[db] Idle client error:', err.message)
})

export const db = drizzle(pool, { schema })

/** Any Postgres driver; the stores only use the query builder */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

// Graceful shutdown - only end the pool once
let isShuttingDown = false

export async function closeDb(): Promise<void> {
  if (isShuttingDown) return
  isShuttingDown = true
  console.log('[db] Graceful shutdown initiated')
  await pool.end()
}

// Node socket errors and Postgres SQLSTATEs that mean "try again later"
const RETRYABLE_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return null
}

export function isTransientDbError(error: unknown): boolean {
  const code = errorCode(error)
  // Class 08: connection exception
  if (code && (RETRYABLE_ERROR_CODES.includes(code) || code.startsWith('08'))) return true

  return (
    error instanceof Error &&
    (error.message.includes('Connection terminated') ||
      error.message.includes('connection was closed') ||
      error.message.includes('timeout exceeded when trying to connect'))
  )
}

/**
 * Classify a driver error. Connection-level failures become TransientIOError
 * (systemic for a scheduler run); everything else is returned unchanged.
 */
export function toStoreError(resource: string, error: unknown): unknown {
  if (error instanceof TransientIOError) return error
  if (isTransientDbError(error)) {
    return new TransientIOError(resource, getErrorMessage(error), { cause: error })
  }
  return error
}

// Utility for retrying transient connection errors
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries = 2,
  delayMs = 100
): Promise<T> {
  let lastError: unknown = null

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation()
    } catch (error) {
      lastError = error

      if (isTransientDbError(error) && attempt < maxRetries) {
        console.warn(`[db] Retrying after transient error (attempt ${attempt + 1}/${maxRetries}):`, getErrorMessage(error))
        await new Promise(resolve => setTimeout(resolve, delayMs * (attempt + 1)))
        continue
      }

      throw error
    }
  }

  throw lastError
}

/**
 * Run a store operation with retry, classifying whatever still fails.
 */
export async function runStoreOperation<T>(resource: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await withRetry(operation)
  } catch (error) {
    throw toStoreError(resource, error)
  }
}
