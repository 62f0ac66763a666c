import { Redis } from 'ioredis'
import { env } from '../config/env.js'

/**
 * The subset of Redis commands this service uses (job health, payment event
 * idempotency). Satisfied by ioredis and by the in-memory fallback.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>
  setex(key: string, seconds: number, value: string): Promise<string>
  del(...keys: string[]): Promise<number>
  ping(): Promise<string>
  quit(): Promise<string>
}

// Mock Redis for when REDIS_URL is not set (prevents crash)
class MockRedis implements RedisClient {
  private store = new Map<string, { value: string; expiresAt: number }>()

  private read(key: string): string | null {
    const entry = this.store.get(key)
    if (!entry) return null
    if (entry.expiresAt <= Date.now()) {
      this.store.delete(key)
      return null
    }
    return entry.value
  }

  async get(key: string) {
    return this.read(key)
  }

  async set(key: string, value: string, _secondsToken: 'EX', seconds: number, _nx: 'NX'): Promise<'OK' | null> {
    if (this.read(key) !== null) return null
    this.store.set(key, { value, expiresAt: Date.now() + seconds * 1000 })
    return 'OK'
  }

  async setex(key: string, seconds: number, value: string) {
    this.store.set(key, { value, expiresAt: Date.now() + seconds * 1000 })
    return 'OK'
  }

  async del(...keys: string[]): Promise<number> {
    let deleted = 0
    for (const key of keys) {
      if (this.store.delete(key)) deleted++
    }
    return deleted
  }

  async ping() { return 'PONG' }

  async quit() { return 'OK' }
}

function createRedisClient(): RedisClient {
  // Payment event idempotency across processes depends on a shared Redis.
  // In production, fail fast if Redis is missing.
  if (env.NODE_ENV === 'production' && !env.REDIS_URL) {
    console.error('❌ FATAL: REDIS_URL is required in production (queues, idempotency, job health).')
    process.exit(1)
  }

  if (!env.REDIS_URL) {
    console.warn('⚠️ REDIS_URL not set. Using in-memory mock (idempotency keys will not be shared).')
    return new MockRedis()
  }

  const client = new Redis(env.REDIS_URL, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      return Math.min(times * 50, 2000)
    },
  })

  client.on('error', (err: Error) => {
    console.error('Redis connection error:', err.message)
  })

  client.on('connect', () => {
    console.log('✅ Redis connected')
  })

  return client
}

export const redis: RedisClient = createRedisClient()
