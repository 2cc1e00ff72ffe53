/**
 * @tidemark/redis - Shared Redis connection utilities
 *
 * One place for connection options so the crawl queues, the per-target locks
 * and the event publisher all talk to Redis the same way.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@tidemark/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Resolve connection settings.
 *
 * REDIS_URL wins and is split into host/port/password so the options never
 * fall back to ioredis defaults. Otherwise REDIS_HOST/REDIS_PORT/REDIS_PASSWORD.
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
        redisUrl,
      }
    } catch (error) {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT', {}, error)
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/**
 * Connection string for logs, password masked.
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl
    ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')
    : `${config.host}:${config.port}`
}

const config = parseRedisConfig()
const redisLogInfo = describeRedisConfig(config)

// =============================================================================
// Connection Options
// =============================================================================

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * Backoff for reconnects: 500ms steps capped at 30s; past 20 attempts
 * the outage is logged at most once a minute.
 */
export function reconnectDelay(times: number, now = Date.now()): number {
  consecutiveFailures = times

  if (times > 20) {
    if (now - lastCircuitBreakerLog > 60_000) {
      lastCircuitBreakerLog = now
      log.error('Circuit breaker: prolonged outage', {
        attempts: times,
        connection: redisLogInfo,
      })
    }
    return 30_000
  }

  const delay = Math.min(times * 500, 30_000)
  log.info('Reconnecting', { attempt: times, delayMs: delay })
  return delay
}

/**
 * Options shared by every client. maxRetriesPerRequest must stay null for BullMQ workers.
 */
export const redisConnection: RedisOptions = {
  host: config.host,
  port: config.port,
  password: config.password,

  maxRetriesPerRequest: null,

  keepAlive: 10_000,
  connectTimeout: 10_000,
  commandTimeout: 30_000,
  enableOfflineQueue: true,

  retryStrategy: (times: number) => reconnectDelay(times),

  reconnectOnError(err: Error) {
    if (RECONNECT_ERRORS.some((code) => err.message.includes(code))) {
      if (consecutiveFailures <= 20) {
        log.warn('Reconnecting due to error', { reason: err.message })
      }
      return true
    }
    return false
  },
}

// =============================================================================
// Client Factory Functions
// =============================================================================

let singletonClient: Redis | null = null

/**
 * Lazily created shared client.
 */
export function getRedisClient(): Redis {
  if (!singletonClient) {
    singletonClient = new Redis(redisConnection)

    singletonClient.on('error', (err: Error) => {
      log.error('Connection error', { reason: err.message })
    })

    singletonClient.on('connect', () => {
      consecutiveFailures = 0
      log.info('Connected', { connection: redisLogInfo })
    })
  }
  return singletonClient
}

/**
 * Quit the shared client. Safe to call when none was created.
 */
export async function disconnectRedis(): Promise<void> {
  if (singletonClient) {
    await singletonClient.quit()
    singletonClient = null
  }
}

// =============================================================================
// Warmup / Health Check
// =============================================================================

/**
 * Ping Redis with exponential backoff before workers start.
 * @returns true once a ping succeeds, false after maxAttempts
 */
export async function warmupRedis(maxAttempts = 5): Promise<boolean> {
  const warmupOptions: RedisOptions = {
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: 5_000,
    lazyConnect: true,
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis(warmupOptions)
    try {
      log.info('Warmup attempt', { attempt, maxAttempts, connection: redisLogInfo })
      await client.connect()
      await client.ping()
      await client.quit()
      log.info('Warmup successful')
      return true
    } catch (error) {
      client.disconnect()
      log.warn('Warmup failed', { attempt }, error)

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2_000 * Math.pow(2, attempt - 1), 30_000)
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    }
  }

  log.error('Warmup failed after all attempts', { maxAttempts })
  return false
}

export { RedisLock, DEFAULT_LOCK_TTL_MS } from './lock.js'
export type { LockClient } from './lock.js'
