import { Pool, type PoolConfig, type QueryResultRow } from 'pg'
import { createLogger } from '@tidemark/logger'

const log = createLogger('db')

/**
 * Anything that runs a parameterized query: a Pool, a PoolClient, or a test stand-in.
 */
export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>
}

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 1)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: tidemark-crawler)
 *
 * Crawl workers hold one browser each and write one record at a time, so the
 * pool stays small.
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    max: parseInt(env.DB_POOL_MAX || '10', 10),
    min: parseInt(env.DB_POOL_MIN || '1', 10),

    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,

    // Recycle connections (stale DNS, credential rotation)
    maxUses: 7_500,
    maxLifetimeSeconds: 1_800,

    keepAlive: true,
    keepAliveInitialDelayMillis: 10_000,

    application_name: env.DB_SERVICE_NAME || 'tidemark-crawler',
  }
}

/**
 * New pool against DATABASE_URL (or the given connection string).
 */
export function createPool(connectionString = process.env.DATABASE_URL): Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  const pool = new Pool(getPoolConfig(connectionString))
  pool.on('error', (err: Error) => {
    // Idle client errors (server restart, network drop); the pool replaces the client.
    log.error('Idle client error', { reason: err.message })
  })
  return pool
}

/**
 * SELECT 1 with exponential backoff before workers start.
 */
export async function warmupDatabase(
  db: SqlExecutor,
  maxAttempts = 5,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('Connection attempt', { attempt, maxAttempts })
      await db.query('SELECT 1')
      log.info('Connection established')
      return true
    } catch (error) {
      log.warn('Connection failed', { attempt }, error)

      if (attempt < maxAttempts) {
        await sleep(Math.min(2_000 * Math.pow(2, attempt - 1), 30_000))
      }
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts })
  return false
}
