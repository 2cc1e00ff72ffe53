import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('@tidemark/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(), child: vi.fn() }
  log.child.mockReturnValue(log)
  return { createLogger: () => log }
})

import { getPoolConfig, warmupDatabase } from '../client.js'
import { applySchema, SCHEMA_PATH } from '../schema.js'

describe('getPoolConfig', () => {
  it('uses crawler defaults', () => {
    const config = getPoolConfig('postgres://crawler:test-secret@db/tidemark', {})

    expect(config).toMatchObject({
      connectionString: 'postgres://crawler:test-secret@db/tidemark',
      max: 10,
      min: 1,
      maxUses: 7_500,
      keepAlive: true,
      application_name: 'tidemark-crawler',
    })
  })

  it('reads pool size and service name from env', () => {
    const config = getPoolConfig('postgres://db/tidemark', {
      DB_POOL_MAX: '4',
      DB_POOL_MIN: '0',
      DB_SERVICE_NAME: 'crawler-worker-7',
    })

    expect(config.max).toBe(4)
    expect(config.min).toBe(0)
    expect(config.application_name).toBe('crawler-worker-7')
  })
})

describe('warmupDatabase', () => {
  const sleep = vi.fn(async (_ms: number) => undefined)

  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('returns true on the first successful ping', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 })

    await expect(warmupDatabase({ query }, 3, sleep)).resolves.toBe(true)
    expect(query).toHaveBeenCalledWith('SELECT 1')
    expect(sleep).not.toHaveBeenCalled()
  })

  it('backs off exponentially between failed attempts', async () => {
    const query = vi
      .fn()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValue({ rows: [], rowCount: 1 })

    await expect(warmupDatabase({ query }, 5, sleep)).resolves.toBe(true)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2_000, 4_000])
  })

  it('gives up after maxAttempts', async () => {
    const query = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'))

    await expect(warmupDatabase({ query }, 2, sleep)).resolves.toBe(false)
    expect(query).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledTimes(1)
  })
})

describe('applySchema', () => {
  it('runs the bundled schema file', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 })

    await applySchema({ query })

    expect(SCHEMA_PATH.endsWith('schema.sql')).toBe(true)
    const sql = String(query.mock.calls[0][0])
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS crawl_targets')
    expect(sql).toContain('PRIMARY KEY (target_id, item_id)')
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS crawler_error_logs')
  })
})
