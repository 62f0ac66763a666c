import { Hono } from 'hono'
import { logger } from 'hono/logger'
import { secureHeaders } from 'hono/secure-headers'
import { HTTPException } from 'hono/http-exception'
import { sql } from 'drizzle-orm'
import { ZodError } from 'zod'
import { env } from './config/env.js'
import { requestIdMiddleware, getRequestId } from './middleware/requestId.js'
import { db } from './db/client.js'
import { redis } from './db/redis.js'
import { logger as appLogger } from './utils/logger.js'

// Routes
import jobs from './routes/jobs.js'
import events from './routes/events.js'

const app = new Hono()

// Global middleware
app.use('*', requestIdMiddleware)
if (env.NODE_ENV !== 'test') {
  app.use('*', logger())
}
app.use('*', secureHeaders({
  xContentTypeOptions: 'nosniff',
  xFrameOptions: 'DENY',
}))

// Health check - deep check for production readiness
app.get('/health', async (c) => {
  const checks = {
    database: false,
    redis: false,
  }

  // Check database (with timeout)
  let timer: NodeJS.Timeout | undefined
  try {
    await Promise.race([
      db.execute(sql`SELECT 1`),
      new Promise((_, reject) => {
        timer = setTimeout(() => reject(new Error('Timeout')), 5000)
      }),
    ])
    checks.database = true
  } catch (err) {
    appLogger.error('[health] Database check failed', err)
  } finally {
    clearTimeout(timer)
  }

  try {
    const pong = await redis.ping()
    checks.redis = pong === 'PONG'
  } catch (err) {
    appLogger.error('[health] Redis check failed', err)
  }

  // Only fail if DATABASE is down. Without Redis, idempotency and job health degrade.
  const isHealthy = checks.database
  const status = isHealthy ? (checks.redis ? 'ok' : 'degraded') : 'down'

  return c.json({
    status,
    timestamp: new Date().toISOString(),
    checks,
  }, isHealthy ? 200 : 503)
})

// Lightweight liveness probe (for k8s)
app.get('/health/live', (c) => c.json({ status: 'ok' }))

app.route('/jobs', jobs)
app.route('/events', events)

app.notFound((c) => c.json({ error: 'Not found' }, 404))

// Error handler
app.onError((err, c) => {
  if (err instanceof HTTPException) {
    return c.json({ error: err.message, message: err.message }, err.status)
  }

  // Handle Zod validation errors (bad query/body params)
  if (err instanceof ZodError) {
    return c.json({ error: 'Invalid request', issues: err.issues }, 400)
  }

  appLogger.error('Unhandled error', err, { requestId: getRequestId(c), path: c.req.path })
  return c.json({ error: 'Internal server error' }, 500)
})

export default app
