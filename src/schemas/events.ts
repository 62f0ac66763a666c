import { z } from 'zod'
import { PAYMENT_STATUSES } from '../jobs/reminders/types.js'
import { isCalendarDate } from '../utils/calendarDate.js'

// Payment recorded by the CRUD layer
export const paymentRecordedEventSchema = z.object({
  // Also used as the queue job id, so keep it to id-safe characters
  paymentId: z.string().min(1).max(100).regex(/^[\w-]+$/, 'paymentId may only contain letters, digits, _ and -'),
  subscriptionId: z.string().uuid(),
  paymentDate: z.string().refine(isCalendarDate, 'Expected a YYYY-MM-DD date'),
  amount: z.number().nonnegative().max(100_000_000),
  status: z.enum(PAYMENT_STATUSES),
})

export type PaymentRecordedEventInput = z.infer<typeof paymentRecordedEventSchema>
