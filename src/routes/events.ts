import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { redis } from '../db/redis.js'
import { requireJobsAuth } from '../middleware/jobsAuth.js'
import { requestLogger } from '../middleware/requestId.js'
import { advanceOnPayment } from '../jobs/reminders/advancer.js'
import { advancerDeps } from '../jobs/reminders/runtime.js'
import { paymentEventsQueue } from '../lib/queue.js'
import { paymentRecordedEventSchema } from '../schemas/events.js'
import { ReminderEngineError, isSystemicError } from '../utils/errors.js'
import { safeError } from '../utils/logger.js'

const events = new Hono()

// Payment ids are remembered for a week; redeliveries inside that window are acknowledged and dropped
const IDEMPOTENCY_TTL_SECONDS = 7 * 24 * 60 * 60

export function paymentIdempotencyKey(paymentId: string): string {
  return `payment_event:${paymentId}`
}

events.use('*', requireJobsAuth)

// Payment recorded by the CRUD layer -> advance the billing cycle
events.post('/payments', zValidator('json', paymentRecordedEventSchema), async (c) => {
  const event = c.req.valid('json')
  const log = requestLogger(c)
  const key = paymentIdempotencyKey(event.paymentId)

  const claimed = await redis.set(key, new Date().toISOString(), 'EX', IDEMPOTENCY_TTL_SECONDS, 'NX')
  if (claimed === null) {
    log.info('[events] Duplicate payment event ignored', { paymentId: event.paymentId })
    return c.json({ success: true, duplicate: true })
  }

  if (paymentEventsQueue) {
    try {
      const job = await paymentEventsQueue.add('payment-recorded', event, { jobId: `payment-${event.paymentId}` })
      return c.json({ success: true, queued: true, jobId: job.id }, 202)
    } catch (error) {
      // Let the sender retry
      await redis.del(key)
      return c.json(safeError('QUEUE_ERROR', error, 'events'), 503)
    }
  }

  // No worker without Redis: process inline
  try {
    const outcome = await advanceOnPayment(advancerDeps(), event)
    log.info('[events] Payment event processed', { paymentId: event.paymentId, status: outcome.status })
    return c.json({ success: true, outcome })
  } catch (error) {
    await redis.del(key)

    if (isSystemicError(error)) {
      return c.json(safeError('STORE_UNAVAILABLE', error, 'events'), 503)
    }
    if (error instanceof ReminderEngineError) {
      return c.json({ ...safeError('VALIDATION_ERROR', error, 'events'), kind: error.kind }, 422)
    }
    return c.json(safeError('INTERNAL_ERROR', error, 'events'), 500)
  }
})

export default events
