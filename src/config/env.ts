import { z } from 'zod'

function normalizeUrlEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value
  // Strip whitespace aggressively to avoid broken URLs from env var copy/paste.
  const trimmed = value.trim().replace(/\s+/g, '')
  if (!trimmed) return trimmed

  // Fix accidental double scheme prefixes (e.g., "https://https://example.com").
  if (/^(https?:\/\/){2,}/i.test(trimmed)) {
    const withoutScheme = trimmed.replace(/^(https?:\/\/)+/i, '')
    const isLocalhost = /^(localhost|127\.0\.0\.1|0\.0\.0\.0)(:|$)/.test(withoutScheme)
    const protocol = isLocalhost ? 'http://' : 'https://'
    return `${protocol}${withoutScheme}`
  }

  if (/^[a-zA-Z][a-zA-Z\d+.-]*:\/\//.test(trimmed)) return trimmed

  const isLocalhost = /^(localhost|127\.0\.0\.1|0\.0\.0\.0)(:|$)/.test(trimmed)
  const protocol = isLocalhost ? 'http://' : 'https://'
  return `${protocol}${trimmed}`
}

// "7,3,1" -> [7, 3, 1]
const leadDaysList = z
  .string()
  .transform((value, ctx) => {
    const parts = value.split(',').map(p => p.trim()).filter(Boolean)
    const days = parts.map(Number)
    if (days.length === 0 || days.some(d => !Number.isInteger(d) || d < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected comma-separated non-negative integers' })
      return z.NEVER
    }
    return days
  })

const envSchema = z.object({
  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001'),
  APP_URL: z.preprocess(normalizeUrlEnv, z.string().url()),

  // Database
  DATABASE_URL: z.string(),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // Redis (queues, job health, payment event idempotency)
  REDIS_URL: z.string().optional(),

  // Email
  RESEND_API_KEY: z.string().startsWith('re_'),
  EMAIL_FROM: z.string(),

  // Jobs/Scheduler
  JOBS_API_KEY: z.string().min(16).optional(),  // API key for job + event endpoints (cron, CRUD layer)

  // Slack Alerts
  SLACK_WEBHOOK_URL: z.string().url().optional(),

  // Reminder engine
  REMINDER_SEND_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  REMINDER_LOOKAHEAD_DAYS: z.coerce.number().int().positive().default(30),
  MAX_REMINDER_LEAD_DAYS: z.coerce.number().int().nonnegative().default(30),
  DEFAULT_REMINDER_LEAD_DAYS: leadDaysList.default('3'),
  REMINDER_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  REMINDER_CLAIM_LEASE_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  DELIVERY_ALERT_THRESHOLD: z.coerce.number().int().positive().default(3),
})
  .refine(e => e.REMINDER_LOOKAHEAD_DAYS >= e.MAX_REMINDER_LEAD_DAYS, {
    message: 'REMINDER_LOOKAHEAD_DAYS must be >= MAX_REMINDER_LEAD_DAYS, otherwise long lead reminders are created late',
    path: ['REMINDER_LOOKAHEAD_DAYS'],
  })
  .refine(e => e.DEFAULT_REMINDER_LEAD_DAYS.every(d => d <= e.MAX_REMINDER_LEAD_DAYS), {
    message: 'DEFAULT_REMINDER_LEAD_DAYS must not exceed MAX_REMINDER_LEAD_DAYS',
    path: ['DEFAULT_REMINDER_LEAD_DAYS'],
  })

function loadEnv() {
  const parsed = envSchema.safeParse(process.env)

  if (!parsed.success) {
    console.error('❌ Invalid environment variables:')
    console.error(parsed.error.flatten().fieldErrors)
    process.exit(1)
  }

  const data = parsed.data

  // Production-only validations
  if (data.NODE_ENV === 'production') {
    // Jobs endpoints are the only trigger surface; they must be protected.
    if (!data.JOBS_API_KEY) {
      console.error('❌ FATAL: JOBS_API_KEY is required in production')
      process.exit(1)
    }

    if (!data.APP_URL.startsWith('https://')) {
      console.error('❌ FATAL: APP_URL must use HTTPS in production')
      process.exit(1)
    }

    console.log('✅ Production environment validated')
  }

  return data
}

export const env = loadEnv()

export type Env = z.infer<typeof envSchema>
