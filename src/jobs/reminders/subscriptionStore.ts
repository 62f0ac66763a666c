/**
 * Subscription Store
 *
 * Read access to subscriptions plus the two writes the engine is allowed:
 * a conditional due-date update and deactivation.
 */

import { and, asc, eq, gt, gte, lt, lte, or } from 'drizzle-orm'
import { type Database, runStoreOperation } from '../../db/client.js'
import { subscriptions, users } from '../../db/schema.js'
import type { CalendarDate } from '../../utils/calendarDate.js'
import type { DateWindow, Subscription } from './types.js'

/** Position after the last row of a lapsed page */
export interface LapsedCursor {
  nextBillingDate: CalendarDate
  id: string
}

export interface SubscriptionStore {
  /** Active subscriptions with `nextBillingDate` in [from, to]. */
  listDueWithin(window: DateWindow): Promise<Subscription[]>
  /** Active auto-renewing subscriptions with `nextBillingDate` before `before`, ordered by (nextBillingDate, id) after `after`. */
  listLapsedAutoRenew(before: CalendarDate, limit: number, after: LapsedCursor | null): Promise<Subscription[]>
  findById(id: string): Promise<Subscription | null>
  /**
   * Compare-and-set on `nextBillingDate`. False when `expectedOldDate` no longer matches.
   * `appliedPaymentId` is written in the same statement.
   */
  updateNextBillingDate(
    id: string,
    expectedOldDate: CalendarDate,
    newDate: CalendarDate,
    appliedPaymentId: string | null
  ): Promise<boolean>
  /** False when the subscription was already inactive. */
  deactivate(id: string): Promise<boolean>
}

const RESOURCE = 'subscription-store'

const subscriptionColumns = {
  id: subscriptions.id,
  userId: subscriptions.userId,
  name: subscriptions.name,
  amount: subscriptions.amount,
  currency: subscriptions.currency,
  billingCycle: subscriptions.billingCycle,
  customIntervalDays: subscriptions.customIntervalDays,
  billingDay: subscriptions.billingDay,
  nextBillingDate: subscriptions.nextBillingDate,
  startDate: subscriptions.startDate,
  endDate: subscriptions.endDate,
  autoRenew: subscriptions.autoRenew,
  reminderLeadDays: subscriptions.reminderLeadDays,
  isActive: subscriptions.isActive,
  timezone: subscriptions.timezone,
  lastPaymentId: subscriptions.lastPaymentId,
  ownerEmail: users.email,
  ownerName: users.name,
}

type SubscriptionSelection = Omit<Subscription, 'amount'> & { amount: string }

function toSubscription(row: SubscriptionSelection): Subscription {
  return { ...row, amount: Number(row.amount) }
}

export class PgSubscriptionStore implements SubscriptionStore {
  constructor(private readonly db: Database) {}

  async listDueWithin(window: DateWindow): Promise<Subscription[]> {
    return runStoreOperation(RESOURCE, async () => {
      const rows = await this.db
        .select(subscriptionColumns)
        .from(subscriptions)
        .innerJoin(users, eq(subscriptions.userId, users.id))
        .where(
          and(
            eq(subscriptions.isActive, true),
            gte(subscriptions.nextBillingDate, window.from),
            lte(subscriptions.nextBillingDate, window.to)
          )
        )
        .orderBy(asc(subscriptions.nextBillingDate))
      return rows.map(toSubscription)
    })
  }

  async listLapsedAutoRenew(before: CalendarDate, limit: number, after: LapsedCursor | null): Promise<Subscription[]> {
    return runStoreOperation(RESOURCE, async () => {
      const rows = await this.db
        .select(subscriptionColumns)
        .from(subscriptions)
        .innerJoin(users, eq(subscriptions.userId, users.id))
        .where(
          and(
            eq(subscriptions.isActive, true),
            eq(subscriptions.autoRenew, true),
            lt(subscriptions.nextBillingDate, before),
            after
              ? or(
                  gt(subscriptions.nextBillingDate, after.nextBillingDate),
                  and(eq(subscriptions.nextBillingDate, after.nextBillingDate), gt(subscriptions.id, after.id))
                )
              : undefined
          )
        )
        .orderBy(asc(subscriptions.nextBillingDate), asc(subscriptions.id))
        .limit(limit)
      return rows.map(toSubscription)
    })
  }

  async findById(id: string): Promise<Subscription | null> {
    return runStoreOperation(RESOURCE, async () => {
      const [row] = await this.db
        .select(subscriptionColumns)
        .from(subscriptions)
        .innerJoin(users, eq(subscriptions.userId, users.id))
        .where(eq(subscriptions.id, id))
        .limit(1)
      return row ? toSubscription(row) : null
    })
  }

  async updateNextBillingDate(
    id: string,
    expectedOldDate: CalendarDate,
    newDate: CalendarDate,
    appliedPaymentId: string | null
  ): Promise<boolean> {
    return runStoreOperation(RESOURCE, async () => {
      const updated = await this.db
        .update(subscriptions)
        .set({ nextBillingDate: newDate, lastPaymentId: appliedPaymentId, updatedAt: new Date() })
        .where(and(eq(subscriptions.id, id), eq(subscriptions.nextBillingDate, expectedOldDate)))
        .returning({ id: subscriptions.id })
      return updated.length > 0
    })
  }

  async deactivate(id: string): Promise<boolean> {
    return runStoreOperation(RESOURCE, async () => {
      const updated = await this.db
        .update(subscriptions)
        .set({ isActive: false, updatedAt: new Date() })
        .where(and(eq(subscriptions.id, id), eq(subscriptions.isActive, true)))
        .returning({ id: subscriptions.id })
      return updated.length > 0
    })
  }
}
