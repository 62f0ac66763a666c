/**
 * Job Health Tracking
 *
 * Tracks last run times for scheduled jobs in Redis.
 * Provides staleness detection for alerting when jobs haven't run on schedule.
 */

import { z } from 'zod'
import { redis } from '../db/redis.js'
import { logger } from '../utils/logger.js'

const JOB_HEALTH_PREFIX = 'job_health:'

// Expected run intervals for each job (in seconds)
// If a job hasn't run in 2x this interval, it's considered stale
export const JOB_SCHEDULES = {
  'scheduled-reminders': { intervalSeconds: 15 * 60, description: 'Reconcile and deliver renewal reminders (every 15 min)' },
  'auto-renew': { intervalSeconds: 60 * 60, description: 'Roll lapsed auto-renew subscriptions forward (hourly)' },
} as const

export type JobName = keyof typeof JOB_SCHEDULES

// Reminders stop going out when these stall
const CRITICAL_JOBS: readonly JobName[] = ['scheduled-reminders']

const jobRunRecordSchema = z.object({
  lastRunAt: z.string(),
  lastRunDurationMs: z.number(),
  lastRunSuccess: z.boolean(),
  lastRunError: z.string().optional(),
  runCount: z.number(),
})

type JobRunRecord = z.infer<typeof jobRunRecordSchema>

function parseRecord(data: string | null): JobRunRecord | null {
  if (!data) return null
  const parsed = jobRunRecordSchema.safeParse(JSON.parse(data))
  return parsed.success ? parsed.data : null
}

/**
 * Record a job run
 */
export async function recordJobRun(
  jobName: JobName,
  durationMs: number,
  success: boolean = true,
  error?: string
): Promise<void> {
  const key = `${JOB_HEALTH_PREFIX}${jobName}`

  try {
    // Get existing record to increment run count
    const prev = parseRecord(await redis.get(key))

    const record: JobRunRecord = {
      lastRunAt: new Date().toISOString(),
      lastRunDurationMs: durationMs,
      lastRunSuccess: success,
      lastRunError: error,
      runCount: (prev?.runCount ?? 0) + 1,
    }

    // Keep for 30 days
    await redis.setex(key, 30 * 24 * 60 * 60, JSON.stringify(record))
  } catch (err) {
    // Non-critical - just log
    logger.warn(`[jobHealth] Failed to record run for ${jobName}`, { error: String(err) })
  }
}

export interface JobHealthStatus {
  name: JobName
  description: string
  lastRunAt: string | null
  lastRunDurationMs: number | null
  lastRunSuccess: boolean | null
  runCount: number
  isStale: boolean
  staleSinceMinutes: number | null
  expectedIntervalMinutes: number
}

export type JobsHealthLevel = 'healthy' | 'degraded' | 'critical'

export interface JobsHealth {
  status: JobsHealthLevel
  jobs: JobHealthStatus[]
  staleJobs: JobName[]
  failedJobs: JobName[]
}

function jobNames(): JobName[] {
  return ['scheduled-reminders', 'auto-renew']
}

/**
 * Get health status for all tracked jobs
 */
export async function getJobsHealth(now: Date = new Date()): Promise<JobsHealth> {
  const jobs: JobHealthStatus[] = []
  const staleJobs: JobName[] = []
  const failedJobs: JobName[] = []

  for (const name of jobNames()) {
    const schedule = JOB_SCHEDULES[name]
    const expectedIntervalMinutes = Math.round(schedule.intervalSeconds / 60)

    try {
      const record = parseRecord(await redis.get(`${JOB_HEALTH_PREFIX}${name}`))

      let isStale = true
      let staleSinceMinutes: number | null = null

      if (record) {
        const ageSeconds = (now.getTime() - new Date(record.lastRunAt).getTime()) / 1000

        // Stale if hasn't run in 2x expected interval
        const staleThreshold = schedule.intervalSeconds * 2
        isStale = ageSeconds > staleThreshold

        if (isStale) {
          staleSinceMinutes = Math.round((ageSeconds - staleThreshold) / 60)
        }

        if (!record.lastRunSuccess) {
          failedJobs.push(name)
        }
      }

      // Never run counts as stale
      if (isStale) staleJobs.push(name)

      jobs.push({
        name,
        description: schedule.description,
        lastRunAt: record?.lastRunAt ?? null,
        lastRunDurationMs: record?.lastRunDurationMs ?? null,
        lastRunSuccess: record?.lastRunSuccess ?? null,
        runCount: record?.runCount ?? 0,
        isStale,
        staleSinceMinutes,
        expectedIntervalMinutes,
      })
    } catch (err) {
      // Redis error - mark as unknown
      logger.warn(`[jobHealth] Failed to read health for ${name}`, { error: String(err) })
      jobs.push({
        name,
        description: schedule.description,
        lastRunAt: null,
        lastRunDurationMs: null,
        lastRunSuccess: null,
        runCount: 0,
        isStale: true,
        staleSinceMinutes: null,
        expectedIntervalMinutes,
      })
      staleJobs.push(name)
    }
  }

  let status: JobsHealthLevel = 'healthy'
  if (CRITICAL_JOBS.some(j => staleJobs.includes(j) || failedJobs.includes(j))) {
    status = 'critical'
  } else if (staleJobs.length > 0 || failedJobs.length > 0) {
    status = 'degraded'
  }

  return { status, jobs, staleJobs, failedJobs }
}

// ============================================
// ALERT DEDUPLICATION
// ============================================

const ALERT_STATE_KEY = 'job_health:alert_state'
const ALERT_COOLDOWN_MS = 60 * 60 * 1000 // 1 hour - don't spam alerts

const alertStateSchema = z.object({
  status: z.string(),
  timestamp: z.number(),
})

/**
 * Check if we should send an alert based on state transitions and cooldown
 *
 * - Always alert on state transitions (healthy→degraded, degraded→critical, etc.)
 * - Repeat alerts after 1 hour cooldown if still unhealthy
 * - Never alert if healthy
 */
export async function shouldSendAlert(currentStatus: JobsHealthLevel): Promise<boolean> {
  if (currentStatus === 'healthy') return false

  try {
    const lastAlert = await redis.get(ALERT_STATE_KEY)
    if (!lastAlert) return true

    const state = alertStateSchema.safeParse(JSON.parse(lastAlert))
    if (!state.success) return true

    // Status changed - alert on transition
    if (state.data.status !== currentStatus) return true

    // Same status but cooldown expired - send reminder
    return Date.now() - state.data.timestamp > ALERT_COOLDOWN_MS
  } catch (err) {
    // Redis error - alert anyway
    logger.warn('[jobHealth] Error checking alert state', { error: String(err) })
    return true
  }
}

/**
 * Record that an alert was sent
 */
export async function recordAlertSent(status: JobsHealthLevel): Promise<void> {
  try {
    // Keep state for 24 hours
    await redis.setex(ALERT_STATE_KEY, 24 * 60 * 60, JSON.stringify({ status, timestamp: Date.now() }))
  } catch (err) {
    logger.warn('[jobHealth] Failed to record alert state', { error: String(err) })
  }
}

/**
 * Clear alert state (call when health returns to normal)
 */
export async function clearAlertState(): Promise<void> {
  try {
    await redis.del(ALERT_STATE_KEY)
  } catch (err) {
    logger.warn('[jobHealth] Failed to clear alert state', { error: String(err) })
  }
}
