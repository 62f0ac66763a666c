/**
 * Reminder engine error taxonomy
 *
 * - transient_io: store or delivery unreachable, retried on the next run
 * - concurrency_conflict: a conditional update lost a race
 * - data_invariant: bad data rejected at the boundary, never coerced
 * - configuration: unsupported cycle or invalid engine settings
 */

export type ReminderErrorKind =
  | 'transient_io'
  | 'concurrency_conflict'
  | 'data_invariant'
  | 'configuration'

export abstract class ReminderEngineError extends Error {
  abstract readonly kind: ReminderErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class TransientIOError extends ReminderEngineError {
  readonly kind = 'transient_io'
  public readonly resource: string

  constructor(resource: string, message: string, options?: { cause?: unknown }) {
    super(`${resource}: ${message}`, options)
    this.resource = resource
  }
}

export class ConcurrencyConflictError extends ReminderEngineError {
  readonly kind = 'concurrency_conflict'
  public readonly subscriptionId: string

  constructor(subscriptionId: string, message: string) {
    super(message)
    this.subscriptionId = subscriptionId
  }
}

export class DataInvariantViolationError extends ReminderEngineError {
  readonly kind = 'data_invariant'
  public readonly field: string

  constructor(field: string, message: string) {
    super(`${field}: ${message}`)
    this.field = field
  }
}

export class ConfigurationError extends ReminderEngineError {
  readonly kind = 'configuration'
}

/**
 * Errors that mean a shared store is unreachable. These abort a whole scheduler
 * run instead of being isolated to one subscription.
 */
export function isSystemicError(error: unknown): boolean {
  return error instanceof TransientIOError
}

export function errorKindOf(error: unknown): ReminderErrorKind | 'unknown' {
  return error instanceof ReminderEngineError ? error.kind : 'unknown'
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return typeof error === 'string' ? error : 'Unknown error'
}
