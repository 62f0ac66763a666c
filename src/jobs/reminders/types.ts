/**
 * Reminder System Types
 */

import type { CalendarDate } from '../../utils/calendarDate.js'

export const BILLING_CYCLES = ['weekly', 'monthly', 'quarterly', 'semiannual', 'yearly', 'custom'] as const
export type BillingCycle = (typeof BILLING_CYCLES)[number]

export type Cadence =
  | { cycle: Exclude<BillingCycle, 'custom'> }
  | { cycle: 'custom'; intervalDays: number }

export interface Subscription {
  id: string
  userId: string
  name: string
  amount: number
  currency: string
  billingCycle: BillingCycle
  customIntervalDays: number | null
  billingDay: number | null
  nextBillingDate: CalendarDate
  startDate: CalendarDate
  endDate: CalendarDate | null
  autoRenew: boolean
  reminderLeadDays: number[]
  isActive: boolean
  timezone: string
  /** Last payment that advanced `nextBillingDate` */
  lastPaymentId: string | null
  ownerEmail: string
  ownerName: string | null
}

export const REMINDER_STATUSES = ['pending', 'sending', 'sent', 'canceled'] as const
export type ReminderStatus = (typeof REMINDER_STATUSES)[number]

/** Deduplication key: at most one non-canceled record per key. */
export interface ReminderKey {
  subscriptionId: string
  dueDate: CalendarDate
  leadDays: number
}

export interface ReminderRecord extends ReminderKey {
  id: string
  scheduledFor: CalendarDate
  scheduledAt: Date
  status: ReminderStatus
  attempts: number
  lastError: string | null
  claimToken: string | null
  claimedAt: Date | null
  sentAt: Date | null
  canceledAt: Date | null
  cancelReason: string | null
  createdAt: Date
  updatedAt: Date
}

export interface RequiredReminder extends ReminderKey {
  scheduledFor: CalendarDate
  scheduledAt: Date
}

export interface DateWindow {
  from: CalendarDate
  to: CalendarDate
}

export const PAYMENT_STATUSES = ['paid', 'pending', 'failed'] as const
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number]

/** Payment-recorded event emitted by the CRUD layer */
export interface PaymentRecordedEvent {
  paymentId: string
  subscriptionId: string
  paymentDate: CalendarDate
  amount: number
  status: PaymentStatus
}

export const CANCEL_REASONS = {
  cycleAdvanced: 'cycle advanced',
  subscriptionEnded: 'subscription ended',
  staleDueDate: 'due date superseded',
  subscriptionInactive: 'subscription inactive',
  leadDayRemoved: 'lead day no longer configured',
} as const

export type CancelReason = (typeof CANCEL_REASONS)[keyof typeof CANCEL_REASONS]
