import type { Job } from 'bullmq'
import { advanceOnPayment, type AdvanceOutcome } from '../jobs/reminders/advancer.js'
import { advancerDeps } from '../jobs/reminders/runtime.js'
import type { PaymentRecordedEvent } from '../jobs/reminders/types.js'
import { paymentRecordedEventSchema } from '../schemas/events.js'
import { isSystemicError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

/**
 * Advance the billing cycle for one payment-recorded event.
 * Store outages are rethrown so BullMQ retries with backoff; anything else is
 * a permanent failure for this event and is logged instead.
 */
export async function paymentEventProcessor(
  job: Pick<Job<PaymentRecordedEvent>, 'id' | 'data'>
): Promise<AdvanceOutcome | null> {
  const parsed = paymentRecordedEventSchema.safeParse(job.data)
  if (!parsed.success) {
    logger.error('[payment-events] Dropping malformed event', undefined, { jobId: job.id, issues: parsed.error.issues })
    return null
  }

  const event = parsed.data
  try {
    const outcome = await advanceOnPayment(advancerDeps(), event)
    logger.info('[payment-events] Processed', {
      jobId: job.id,
      paymentId: event.paymentId,
      subscriptionId: event.subscriptionId,
      status: outcome.status,
    })
    return outcome
  } catch (error) {
    if (isSystemicError(error)) throw error
    logger.error('[payment-events] Event rejected', error, { jobId: job.id, paymentId: event.paymentId })
    return null
  }
}
