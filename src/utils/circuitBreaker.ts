/**
 * Circuit breaker for outbound delivery providers.
 *
 * Breakers are kept per name for the life of the process. After
 * `failureThreshold` consecutive failures the circuit opens and calls fail
 * fast until `resetTimeout` has passed; the next call is then let through
 * as a trial.
 */

import { type Clock, systemClock } from '../lib/clock.js'
import { logger } from './logger.js'

export type CircuitStatus = 'closed' | 'open' | 'half-open'

export interface CircuitBreakerOptions {
  name: string
  failureThreshold?: number
  /** ms the circuit stays open before a trial call */
  resetTimeout?: number
  /** ms before a call counts as failed; the call's signal is aborted then */
  timeout?: number
  clock?: Clock
}

export interface CircuitSnapshot {
  status: CircuitStatus
  failures: number
  lastFailureAt: number | null
}

export class CircuitBreakerError extends Error {
  constructor(
    readonly service: string,
    readonly retryAfterMs: number
  ) {
    super(`Service ${service} is temporarily unavailable`)
    this.name = 'CircuitBreakerError'
  }
}

export class CircuitTimeoutError extends Error {
  constructor(service: string, timeoutMs: number) {
    super(`${service} request timeout after ${timeoutMs}ms`)
    this.name = 'CircuitTimeoutError'
  }
}

class Circuit {
  status: CircuitStatus = 'closed'
  failures = 0
  lastFailureAt: number | null = null

  constructor(readonly name: string) {}

  /** Throws while open; flips to half-open once the reset window passed. */
  admit(now: number, resetTimeout: number): void {
    if (this.status !== 'open' || this.lastFailureAt === null) return

    const waited = now - this.lastFailureAt
    if (waited < resetTimeout) {
      throw new CircuitBreakerError(this.name, resetTimeout - waited)
    }
    this.status = 'half-open'
    logger.circuitBreaker.halfOpen(this.name)
  }

  succeeded(): void {
    if (this.status === 'half-open') logger.circuitBreaker.closed(this.name)
    this.status = 'closed'
    this.failures = 0
  }

  failed(now: number, threshold: number): void {
    this.failures += 1
    this.lastFailureAt = now

    if (this.status === 'half-open' || this.failures >= threshold) {
      this.status = 'open'
      logger.circuitBreaker.opened(this.name, this.failures)
    } else {
      logger.warn('Circuit breaker failure', { name: this.name, failures: this.failures, threshold })
    }
  }

  snapshot(): CircuitSnapshot {
    return { status: this.status, failures: this.failures, lastFailureAt: this.lastFailureAt }
  }
}

const circuits = new Map<string, Circuit>()

function circuitFor(name: string): Circuit {
  let circuit = circuits.get(name)
  if (!circuit) {
    circuit = new Circuit(name)
    circuits.set(name, circuit)
  }
  return circuit
}

function withTimeout<T>(name: string, timeoutMs: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CircuitTimeoutError(name, timeoutMs)
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })
  return Promise.race([work(controller.signal), expiry]).finally(() => clearTimeout(timer))
}

export async function withCircuitBreaker<T>(
  options: CircuitBreakerOptions,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const {
    name,
    failureThreshold = 5,
    resetTimeout = 30_000,
    timeout = 10_000,
    clock = systemClock,
  } = options

  const circuit = circuitFor(name)
  circuit.admit(clock.now().getTime(), resetTimeout)

  try {
    const result = await withTimeout(name, timeout, fn)
    circuit.succeeded()
    return result
  } catch (error) {
    circuit.failed(clock.now().getTime(), failureThreshold)
    throw error
  }
}

export function getCircuitState(name: string): CircuitSnapshot | undefined {
  return circuits.get(name)?.snapshot()
}

export function resetCircuit(name: string): void {
  circuitFor(name).succeeded()
  logger.info('Circuit breaker manually reset', { name })
}
