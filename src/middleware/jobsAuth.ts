import type { Context, Next } from 'hono'
import { env } from '../config/env.js'
import { logger } from '../utils/logger.js'

/**
 * Simple API key auth for job and event endpoints.
 * SECURITY: Only accept the key via header (not query params) to keep it out of access logs.
 */
export async function requireJobsAuth(c: Context, next: Next) {
  const apiKey = c.req.header('x-jobs-api-key')
  const expectedKey = env.JOBS_API_KEY

  if (!expectedKey) {
    logger.warn('[jobs] JOBS_API_KEY not configured, jobs endpoints disabled')
    return c.json({ error: 'Jobs endpoint not configured' }, 503)
  }

  if (!apiKey || apiKey !== expectedKey) {
    return c.json({ error: 'Unauthorized' }, 401)
  }

  await next()
}
