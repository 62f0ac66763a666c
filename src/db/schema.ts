import { sql } from 'drizzle-orm'
import {
  boolean,
  check,
  date,
  index,
  integer,
  numeric,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core'
// drizzle-kit loads this file on its own, so it imports nothing from the app
export const billingCycleEnum = pgEnum('billing_cycle', ['weekly', 'monthly', 'quarterly', 'semiannual', 'yearly', 'custom'])
export const reminderStatusEnum = pgEnum('reminder_status', ['pending', 'sending', 'sent', 'canceled'])

/**
 * users
 *
 * Owned by the CRUD layer. Read here for delivery address and timezone.
 */
export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }),
  timezone: varchar('timezone', { length: 64 }).default('UTC').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
})

/**
 * subscriptions
 *
 * Owned by the CRUD layer. The reminder engine only writes
 * `next_billing_date`, `last_payment_id`, `is_active` and `updated_at`.
 */
export const subscriptions = pgTable(
  'subscriptions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    currency: varchar('currency', { length: 3 }).notNull(),
    billingCycle: billingCycleEnum('billing_cycle').notNull(),
    customIntervalDays: integer('custom_interval_days'),
    /** Day-of-month (1-31) or day-of-week (0-6) depending on the cycle. */
    billingDay: integer('billing_day'),
    nextBillingDate: date('next_billing_date', { mode: 'string' }).notNull(),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    autoRenew: boolean('auto_renew').default(true).notNull(),
    reminderLeadDays: integer('reminder_lead_days').array().default(sql`'{}'::integer[]`).notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    /** Frozen at creation; due dates and send times are evaluated in this zone. */
    timezone: varchar('timezone', { length: 64 }).default('UTC').notNull(),
    lastPaymentId: varchar('last_payment_id', { length: 255 }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    activeDueIdx: index('subscriptions_active_next_billing_idx').on(table.isActive, table.nextBillingDate),
    customIntervalCheck: check(
      'subscriptions_custom_interval_days_check',
      sql`${table.customIntervalDays} IS NULL OR ${table.customIntervalDays} >= 1`
    ),
    billingDayCheck: check(
      'subscriptions_billing_day_check',
      sql`${table.billingDay} IS NULL OR ${table.billingDay} BETWEEN 0 AND 31`
    ),
  })
)

/**
 * reminders
 *
 * The notification ledger. At most one non-canceled row per
 * (subscription_id, due_date, lead_days), enforced by a partial unique index.
 */
export const reminders = pgTable(
  'reminders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    subscriptionId: uuid('subscription_id')
      .references(() => subscriptions.id, { onDelete: 'cascade' })
      .notNull(),
    dueDate: date('due_date', { mode: 'string' }).notNull(),
    leadDays: integer('lead_days').notNull(),
    scheduledFor: date('scheduled_for', { mode: 'string' }).notNull(),
    scheduledAt: timestamp('scheduled_at', { withTimezone: true }).notNull(),
    status: reminderStatusEnum('status').default('pending').notNull(),
    attempts: integer('attempts').default(0).notNull(),
    lastError: text('last_error'),
    claimToken: uuid('claim_token'),
    claimedAt: timestamp('claimed_at', { withTimezone: true }),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    canceledAt: timestamp('canceled_at', { withTimezone: true }),
    cancelReason: text('cancel_reason'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    activeKeyUnique: uniqueIndex('reminders_active_key_unique')
      .on(table.subscriptionId, table.dueDate, table.leadDays)
      .where(sql`status <> 'canceled'`),
    dueIdx: index('reminders_status_scheduled_at_idx').on(table.status, table.scheduledAt),
    leadDaysCheck: check('reminders_lead_days_check', sql`${table.leadDays} >= 0`),
  })
)

export type SubscriptionRow = typeof subscriptions.$inferSelect
export type ReminderRow = typeof reminders.$inferSelect
export type UserRow = typeof users.$inferSelect
