/**
 * Notification Ledger
 *
 * Durable record of reminder instances. Every mutation is a single atomic
 * statement so overlapping scheduler runs and independent worker processes
 * coordinate only through this table.
 */

import { randomUUID } from 'node:crypto'
import { type SQL, and, asc, eq, inArray, lt, lte, ne, notInArray, or, sql } from 'drizzle-orm'
import { type Database, runStoreOperation } from '../../db/client.js'
import { type ReminderRow, reminders } from '../../db/schema.js'
import { type CalendarDate } from '../../utils/calendarDate.js'
import { ConcurrencyConflictError } from '../../utils/errors.js'
import type { CancelReason, ReminderKey, ReminderRecord } from './types.js'

export interface EnsureResult {
  record: ReminderRecord
  created: boolean
}

export interface ClaimOptions {
  limit: number
  /** A `sending` claim older than this is treated as abandoned */
  leaseMs: number
}

export interface NotificationLedger {
  /** Insert a pending record unless a non-canceled one exists for the key. */
  ensureExists(key: ReminderKey, scheduledFor: CalendarDate, scheduledAt: Date): Promise<EnsureResult>
  /** Move due records to `sending` under a fresh claim token. */
  claimDue(now: Date, options: ClaimOptions): Promise<ReminderRecord[]>
  /** `sending -> sent` for the claim holder. False when already terminal or the claim was lost. */
  markSent(id: string, claimToken: string, sentAt: Date): Promise<boolean>
  /** `pending|sending -> canceled`. False when already terminal. */
  markCanceled(id: string, reason: CancelReason, canceledAt: Date): Promise<boolean>
  /** `sending -> pending` after a failed delivery, counting the attempt. */
  releaseClaim(id: string, claimToken: string, error: string, releasedAt: Date): Promise<ReminderRecord | null>
  cancelPendingForDueDate(subscriptionId: string, dueDate: CalendarDate, reason: CancelReason, canceledAt: Date): Promise<number>
  cancelAllPending(subscriptionId: string, reason: CancelReason, canceledAt: Date): Promise<number>
  /** Cancel pending records for `dueDate` whose lead day is not in `keepLeadDays`. */
  cancelObsoleteLeads(
    subscriptionId: string,
    dueDate: CalendarDate,
    keepLeadDays: readonly number[],
    reason: CancelReason,
    canceledAt: Date
  ): Promise<number>
  listForSubscription(subscriptionId: string): Promise<ReminderRecord[]>
}

const RESOURCE = 'notification-ledger'

function toRecord(row: ReminderRow): ReminderRecord {
  return {
    id: row.id,
    subscriptionId: row.subscriptionId,
    dueDate: row.dueDate,
    leadDays: row.leadDays,
    scheduledFor: row.scheduledFor,
    scheduledAt: row.scheduledAt,
    status: row.status,
    attempts: row.attempts,
    lastError: row.lastError,
    claimToken: row.claimToken,
    claimedAt: row.claimedAt,
    sentAt: row.sentAt,
    canceledAt: row.canceledAt,
    cancelReason: row.cancelReason,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

function sameKey(key: ReminderKey) {
  return and(
    eq(reminders.subscriptionId, key.subscriptionId),
    eq(reminders.dueDate, key.dueDate),
    eq(reminders.leadDays, key.leadDays)
  )
}

/**
 * Postgres ledger. Relies on the `reminders_active_key_unique` partial index
 * for ensure and on `FOR UPDATE SKIP LOCKED` for claims.
 */
export class PgNotificationLedger implements NotificationLedger {
  constructor(private readonly db: Database) {}

  async ensureExists(key: ReminderKey, scheduledFor: CalendarDate, scheduledAt: Date): Promise<EnsureResult> {
    return runStoreOperation(RESOURCE, async () => {
      // Two attempts: the conflicting row can be canceled between insert and read
      for (let attempt = 0; attempt < 2; attempt++) {
        const inserted = await this.db
          .insert(reminders)
          .values({
            subscriptionId: key.subscriptionId,
            dueDate: key.dueDate,
            leadDays: key.leadDays,
            scheduledFor,
            scheduledAt,
            status: 'pending',
          })
          .onConflictDoNothing({
            target: [reminders.subscriptionId, reminders.dueDate, reminders.leadDays],
            where: sql`status <> 'canceled'`,
          })
          .returning()

        if (inserted.length > 0) return { record: toRecord(inserted[0]), created: true }

        const [existing] = await this.db
          .select()
          .from(reminders)
          .where(and(sameKey(key), ne(reminders.status, 'canceled')))
          .limit(1)

        if (existing) return { record: toRecord(existing), created: false }
      }

      throw new ConcurrencyConflictError(
        key.subscriptionId,
        `reminder ${key.dueDate}/${key.leadDays}d changed twice while being ensured`
      )
    })
  }

  async claimDue(now: Date, options: ClaimOptions): Promise<ReminderRecord[]> {
    const claimToken = randomUUID()
    const leaseExpiredBefore = new Date(now.getTime() - options.leaseMs)

    return runStoreOperation(RESOURCE, async () => {
      const candidates = this.db
        .select({ id: reminders.id })
        .from(reminders)
        .where(
          and(
            lte(reminders.scheduledAt, now),
            or(
              eq(reminders.status, 'pending'),
              and(eq(reminders.status, 'sending'), lt(reminders.claimedAt, leaseExpiredBefore))
            )
          )
        )
        .orderBy(asc(reminders.scheduledAt))
        .limit(options.limit)
        .for('update', { skipLocked: true })

      const claimed = await this.db
        .update(reminders)
        .set({ status: 'sending', claimToken, claimedAt: now, updatedAt: now })
        .where(inArray(reminders.id, candidates))
        .returning()

      return claimed
        .map(toRecord)
        .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime())
    })
  }

  async markSent(id: string, claimToken: string, sentAt: Date): Promise<boolean> {
    return runStoreOperation(RESOURCE, async () => {
      const updated = await this.db
        .update(reminders)
        .set({ status: 'sent', sentAt, claimToken: null, updatedAt: sentAt })
        .where(and(eq(reminders.id, id), eq(reminders.status, 'sending'), eq(reminders.claimToken, claimToken)))
        .returning({ id: reminders.id })
      return updated.length > 0
    })
  }

  async markCanceled(id: string, reason: CancelReason, canceledAt: Date): Promise<boolean> {
    return runStoreOperation(RESOURCE, async () => {
      const updated = await this.db
        .update(reminders)
        .set({ status: 'canceled', cancelReason: reason, canceledAt, claimToken: null, updatedAt: canceledAt })
        .where(and(eq(reminders.id, id), inArray(reminders.status, ['pending', 'sending'])))
        .returning({ id: reminders.id })
      return updated.length > 0
    })
  }

  async releaseClaim(id: string, claimToken: string, error: string, releasedAt: Date): Promise<ReminderRecord | null> {
    return runStoreOperation(RESOURCE, async () => {
      const [released] = await this.db
        .update(reminders)
        .set({
          status: 'pending',
          attempts: sql`${reminders.attempts} + 1`,
          lastError: error.slice(0, 1000),
          claimToken: null,
          claimedAt: null,
          updatedAt: releasedAt,
        })
        .where(and(eq(reminders.id, id), eq(reminders.status, 'sending'), eq(reminders.claimToken, claimToken)))
        .returning()
      return released ? toRecord(released) : null
    })
  }

  async cancelPendingForDueDate(
    subscriptionId: string,
    dueDate: CalendarDate,
    reason: CancelReason,
    canceledAt: Date
  ): Promise<number> {
    return this.cancelPendingWhere(
      and(eq(reminders.subscriptionId, subscriptionId), eq(reminders.dueDate, dueDate)),
      reason,
      canceledAt
    )
  }

  async cancelAllPending(subscriptionId: string, reason: CancelReason, canceledAt: Date): Promise<number> {
    return this.cancelPendingWhere(eq(reminders.subscriptionId, subscriptionId), reason, canceledAt)
  }

  async cancelObsoleteLeads(
    subscriptionId: string,
    dueDate: CalendarDate,
    keepLeadDays: readonly number[],
    reason: CancelReason,
    canceledAt: Date
  ): Promise<number> {
    const scope = and(eq(reminders.subscriptionId, subscriptionId), eq(reminders.dueDate, dueDate))
    return this.cancelPendingWhere(
      keepLeadDays.length > 0 ? and(scope, notInArray(reminders.leadDays, [...keepLeadDays])) : scope,
      reason,
      canceledAt
    )
  }

  async listForSubscription(subscriptionId: string): Promise<ReminderRecord[]> {
    return runStoreOperation(RESOURCE, async () => {
      const rows = await this.db
        .select()
        .from(reminders)
        .where(eq(reminders.subscriptionId, subscriptionId))
        .orderBy(asc(reminders.dueDate), asc(reminders.scheduledAt))
      return rows.map(toRecord)
    })
  }

  private async cancelPendingWhere(
    scope: SQL | undefined,
    reason: CancelReason,
    canceledAt: Date
  ): Promise<number> {
    return runStoreOperation(RESOURCE, async () => {
      const canceled = await this.db
        .update(reminders)
        .set({ status: 'canceled', cancelReason: reason, canceledAt, updatedAt: canceledAt })
        .where(and(scope, eq(reminders.status, 'pending')))
        .returning({ id: reminders.id })
      return canceled.length
    })
  }
}
