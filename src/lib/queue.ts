import { Queue, Worker, type Processor } from 'bullmq'
import { env } from '../config/env.js'
import type { PaymentRecordedEvent } from '../jobs/reminders/types.js'
import { logger } from '../utils/logger.js'

type JobOptions = {
  /** BullMQ keeps one job per id */
  jobId: string
}

export interface QueueLike<T> {
  readonly name: string
  add(jobName: string, data: T, opts: JobOptions): Promise<{ id: string }>
  getJobCounts(): Promise<{ waiting: number; active: number; failed: number }>
  close(): Promise<void>
}

export interface WorkerLike {
  close(): Promise<void>
}

// BullMQ requires Redis. In tests (and local envs without Redis) there is no queue
// and routes process events inline, so imports don't try to open network sockets.
const redisUrl = env.NODE_ENV !== 'test' ? env.REDIS_URL : undefined

// Queue Definitions
const defaultJobOptions = {
  attempts: 5,
  backoff: {
    type: 'exponential',
    delay: 1000, // 1s, 2s, 4s, 8s, 16s
  },
  removeOnComplete: { count: 100 },
  removeOnFail: { count: 1000 },
}

class BullQueue<T> implements QueueLike<T> {
  private readonly queue: Queue

  constructor(public readonly name: string, url: string) {
    // BullMQ uses its own Redis connections (blocking commands), so pass the URL and let it manage them.
    this.queue = new Queue(name, { connection: { url }, defaultJobOptions })
  }

  async add(jobName: string, data: T, opts: JobOptions) {
    // BullMQ returns the existing job when the jobId is already present
    const job = await this.queue.add(jobName, data, opts)
    return { id: job.id ?? opts.jobId }
  }

  async getJobCounts() {
    const counts = await this.queue.getJobCounts('waiting', 'active', 'failed')
    return {
      waiting: counts.waiting || 0,
      active: counts.active || 0,
      failed: counts.failed || 0,
    }
  }

  async close() {
    await this.queue.close()
  }
}

function createQueue<T>(name: string): QueueLike<T> | null {
  return redisUrl ? new BullQueue<T>(name, redisUrl) : null
}

export const PAYMENT_EVENTS_QUEUE = 'payment-events'

export const paymentEventsQueue = createQueue<PaymentRecordedEvent>(PAYMENT_EVENTS_QUEUE)

// Worker Factory Helper
export function createWorker<T>(
  queueName: string,
  processor: Processor<T>,
  concurrency = 1
): WorkerLike {
  if (!redisUrl) {
    // No background processing without Redis. Routes process inline instead.
    return {
      async close() { },
    }
  }

  return new Worker<T>(queueName, processor, {
    connection: { url: redisUrl, maxRetriesPerRequest: null },
    concurrency,
    // Wait 5 seconds before polling again when queue is empty
    drainDelay: 5000,
    // Check for stalled jobs less frequently (default 30s, bump to 60s)
    stalledInterval: 60000,
    // Remove completed jobs to save Redis memory (keep last 100)
    removeOnComplete: { count: 100 },
    // Keep failed jobs for inspection (keep last 1000)
    removeOnFail: { count: 1000 },
  })
}

// Graceful shutdown helper for queues
export async function closeQueues(): Promise<void> {
  await paymentEventsQueue?.close()
}

// Get queue depth for health monitoring
export async function getQueueDepths(): Promise<{
  paymentEvents: { waiting: number; active: number; failed: number } | null
}> {
  if (!paymentEventsQueue) return { paymentEvents: null }
  try {
    return { paymentEvents: await paymentEventsQueue.getJobCounts() }
  } catch (err) {
    logger.warn('[queue] Failed to get queue depths', { error: String(err) })
    return { paymentEvents: null }
  }
}
