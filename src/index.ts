import { serve } from '@hono/node-server'
import app from './app.js'
import { env } from './config/env.js'
import { closeDb } from './db/client.js'
import { redis } from './db/redis.js'
import { closeQueues } from './lib/queue.js'
import { logger } from './utils/logger.js'

const port = Number.parseInt(env.PORT, 10)
if (!Number.isFinite(port) || port <= 0) {
  throw new Error(`Invalid PORT: ${env.PORT}`)
}

// Containers need an externally reachable bind address.
// In production, prefer IPv4-any to avoid IPv6-only bind issues on some hosts/proxies.
const hostname = process.env.HOST || (env.NODE_ENV === 'production' ? '0.0.0.0' : undefined)

const server = serve({
  fetch: app.fetch,
  port,
  ...(hostname ? { hostname } : {}),
})

logger.info(`Server running on http://${hostname || 'localhost'}:${port}`, { env: env.NODE_ENV })

// Graceful shutdown handler
let isShuttingDown = false

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return
  isShuttingDown = true

  logger.info(`Received ${signal}, shutting down gracefully...`)

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed')
  })

  // Give in-flight requests 10 seconds to complete
  await new Promise(resolve => setTimeout(resolve, 10000))

  try {
    await closeQueues()
  } catch (err) {
    logger.error('Error closing queues', err)
  }

  try {
    await closeDb()
    logger.info('Database connection closed')
  } catch (err) {
    logger.error('Error closing database', err)
  }

  try {
    await redis.quit()
    logger.info('Redis connection closed')
  } catch (err) {
    logger.error('Error closing Redis', err)
  }

  logger.info('Shutdown complete')
  process.exit(0)
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'))
process.on('SIGINT', () => void gracefulShutdown('SIGINT'))
