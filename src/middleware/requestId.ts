/**
 * Request ID Middleware
 *
 * Adds correlation IDs to requests for error tracking and debugging.
 * Uses existing X-Request-ID header if present, otherwise generates one.
 */

import crypto from 'crypto'
import type { Context, Next } from 'hono'
import { logger, type ChildLogger } from '../utils/logger.js'

export async function requestIdMiddleware(c: Context, next: Next) {
  // Use existing request ID from header (e.g., from load balancer)
  // or generate a new one
  const requestId = c.req.header('x-request-id') || crypto.randomUUID()

  c.set('requestId', requestId)

  // Add to response headers for client-side correlation
  c.header('x-request-id', requestId)

  await next()
}

export function getRequestId(c: Context): string {
  const requestId: unknown = c.get('requestId')
  return typeof requestId === 'string' ? requestId : 'unknown'
}

/** Logger carrying the request's correlation id */
export function requestLogger(c: Context): ChildLogger {
  return logger.child({ requestId: getRequestId(c) })
}
