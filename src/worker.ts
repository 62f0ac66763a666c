import { createWorker, PAYMENT_EVENTS_QUEUE, closeQueues } from './lib/queue.js'
import { paymentEventProcessor } from './workers/paymentProcessor.js'
import type { PaymentRecordedEvent } from './jobs/reminders/types.js'
import { closeDb } from './db/client.js'
import { redis } from './db/redis.js'
import { logger } from './utils/logger.js'

logger.info('Starting background workers...')

// Advancing is a compare-and-set per subscription, so concurrent events are safe
const paymentWorker = createWorker<PaymentRecordedEvent>(PAYMENT_EVENTS_QUEUE, paymentEventProcessor, 5)

const workers = [paymentWorker]

async function shutdown() {
  logger.info('Shutting down workers...')

  await Promise.all(workers.map(w => w.close()))
  await closeQueues()
  await closeDb()
  await redis.quit()

  logger.info('Workers shut down')
  process.exit(0)
}

process.on('SIGTERM', () => void shutdown())
process.on('SIGINT', () => void shutdown())

logger.info('Workers are running')
