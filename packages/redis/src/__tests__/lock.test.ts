import { describe, it, expect, beforeEach } from 'vitest'
import { RedisLock, type LockClient } from '../lock.js'

/**
 * In-memory SET NX plus the owner-checked delete/pexpire script.
 */
class FakeLockClient implements LockClient {
  readonly values = new Map<string, string>()
  readonly ttls = new Map<string, number>()

  async set(key: string, value: string, _mode: 'PX', ttlMs: number, _condition: 'NX'): Promise<'OK' | null> {
    if (this.values.has(key)) return null
    this.values.set(key, value)
    this.ttls.set(key, ttlMs)
    return 'OK'
  }

  async eval(_script: string, _numKeys: number, ...args: string[]): Promise<number> {
    const [key, token, ttl] = args
    if (this.values.get(key) !== token) return 0
    if (ttl === '0') {
      this.values.delete(key)
      this.ttls.delete(key)
    } else {
      this.ttls.set(key, Number(ttl))
    }
    return 1
  }
}

describe('RedisLock', () => {
  let client: FakeLockClient

  beforeEach(() => {
    client = new FakeLockClient()
  })

  it('takes a free key under its token and ttl', async () => {
    const lock = await RedisLock.acquire(client, 'crawl-lock:t-1', 5_000)

    expect(lock?.key).toBe('crawl-lock:t-1')
    expect(client.values.get('crawl-lock:t-1')).toBe(lock?.token)
    expect(client.ttls.get('crawl-lock:t-1')).toBe(5_000)
  })

  it('is null while another owner holds the key', async () => {
    await RedisLock.acquire(client, 'crawl-lock:t-1')

    await expect(RedisLock.acquire(client, 'crawl-lock:t-1')).resolves.toBeNull()
  })

  it('refuses a ttl that would never expire', async () => {
    await expect(RedisLock.acquire(client, 'crawl-lock:t-1', 0)).rejects.toThrow('Lock ttl must be positive, got 0')
  })

  it('extends its own ttl', async () => {
    const lock = await RedisLock.acquire(client, 'crawl-lock:t-1', 1_000)
    client.ttls.set('crawl-lock:t-1', 10)

    await expect(lock?.extend()).resolves.toBe(true)
    expect(client.ttls.get('crawl-lock:t-1')).toBe(1_000)
  })

  it('cannot extend or release after the key changed owner', async () => {
    const lock = await RedisLock.acquire(client, 'crawl-lock:t-1')
    client.values.set('crawl-lock:t-1', 'someone-else')

    await expect(lock?.extend()).resolves.toBe(false)
    await expect(lock?.release()).resolves.toBe(false)
    expect(client.values.get('crawl-lock:t-1')).toBe('someone-else')
  })

  it('releases the key it owns', async () => {
    const lock = await RedisLock.acquire(client, 'crawl-lock:t-1')

    await expect(lock?.release()).resolves.toBe(true)
    expect(client.values.has('crawl-lock:t-1')).toBe(false)
  })
})
