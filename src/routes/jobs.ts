import { Hono } from 'hono'
import { requireJobsAuth } from '../middleware/jobsAuth.js'
import { requestLogger } from '../middleware/requestId.js'
import { advanceLapsed } from '../jobs/reminders/advancer.js'
import { advancerDeps, lapsedOptions, schedulerDeps, schedulerOptions } from '../jobs/reminders/runtime.js'
import { SchedulerRunError, reportCounts, runScheduler } from '../jobs/reminders/scheduler.js'
import {
  type JobName,
  clearAlertState,
  getJobsHealth,
  recordAlertSent,
  recordJobRun,
  shouldSendAlert,
} from '../lib/jobHealth.js'
import { getQueueDepths } from '../lib/queue.js'
import { alertJobsUnhealthy, alertSchedulerRunFailed } from '../services/slack.js'
import { getErrorMessage, isSystemicError } from '../utils/errors.js'
import { safeError } from '../utils/logger.js'

const jobs = new Hono()

// Apply auth to all job routes
jobs.use('*', requireJobsAuth)

// Reconcile and deliver renewal reminders (run every 15 minutes)
jobs.post('/scheduled-reminders', async (c) => {
  const job: JobName = 'scheduled-reminders'
  const log = requestLogger(c)
  const startedAt = Date.now()
  log.info('[jobs] Starting scheduled reminders job')

  try {
    const report = await runScheduler(schedulerDeps(), schedulerOptions)
    const durationMs = Date.now() - startedAt
    await recordJobRun(job, durationMs, true)

    log.info(`[jobs] Scheduled reminders complete: ${report.sent}/${report.claimed} sent`, { durationMs })

    return c.json({
      success: true,
      runId: report.runId,
      ...reportCounts(report),
      errors: report.errors,
      durationMs,
    })
  } catch (error) {
    await recordJobRun(job, Date.now() - startedAt, false, getErrorMessage(error))

    if (error instanceof SchedulerRunError) {
      await alertSchedulerRunFailed({
        job,
        state: error.state,
        error: getErrorMessage(error.cause),
        counts: reportCounts(error.report),
      })
      return c.json({
        ...safeError('STORE_UNAVAILABLE', error, job),
        state: error.state,
        progress: reportCounts(error.report),
      }, 503)
    }

    return c.json(safeError('JOB_FAILED', error, job), 500)
  }
})

// Roll lapsed auto-renew subscriptions forward (run hourly)
jobs.post('/auto-renew', async (c) => {
  const job: JobName = 'auto-renew'
  const log = requestLogger(c)
  const startedAt = Date.now()
  log.info('[jobs] Starting auto-renew job')

  try {
    const result = await advanceLapsed(advancerDeps(), lapsedOptions)
    const durationMs = Date.now() - startedAt
    await recordJobRun(job, durationMs, true)

    log.info(`[jobs] Auto-renew complete: ${result.advanced} advanced, ${result.deactivated} deactivated`, { durationMs })

    return c.json({ success: true, ...result, durationMs })
  } catch (error) {
    await recordJobRun(job, Date.now() - startedAt, false, getErrorMessage(error))

    if (isSystemicError(error)) {
      await alertSchedulerRunFailed({ job, state: 'advancing', error: getErrorMessage(error) })
      return c.json(safeError('STORE_UNAVAILABLE', error, job), 503)
    }

    return c.json(safeError('JOB_FAILED', error, job), 500)
  }
})

// Health of the scheduled jobs (staleness, last failures, queue depth)
jobs.get('/health', async (c) => {
  const health = await getJobsHealth()
  const queues = await getQueueDepths()

  return c.json({
    ...health,
    queues,
    timestamp: new Date().toISOString(),
  }, health.status === 'critical' ? 503 : 200)
})

// Alert on stale or failing jobs (run every 15 minutes, from a separate cron)
jobs.post('/health-check', async (c) => {
  const health = await getJobsHealth()

  if (health.status === 'healthy') {
    await clearAlertState()
    return c.json({ status: health.status, alerted: false })
  }

  const alerted = await shouldSendAlert(health.status)
  if (alerted) {
    await alertJobsUnhealthy({
      status: health.status,
      staleJobs: health.staleJobs,
      failedJobs: health.failedJobs,
    })
    await recordAlertSent(health.status)
  }

  return c.json({
    status: health.status,
    staleJobs: health.staleJobs,
    failedJobs: health.failedJobs,
    alerted,
  })
})

export default jobs
