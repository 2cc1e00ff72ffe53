import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { LockClient } from '@tidemark/redis'
import { TargetLease, targetLockKey } from '../lock.js'

class FakeLockClient implements LockClient {
  readonly values = new Map<string, string>()
  readonly extensions: string[] = []
  failEval = false

  async set(key: string, value: string, _mode: 'PX', _ttlMs: number, _condition: 'NX'): Promise<'OK' | null> {
    if (this.values.has(key)) return null
    this.values.set(key, value)
    return 'OK'
  }

  async eval(_script: string, _numKeys: number, ...args: string[]): Promise<number> {
    if (this.failEval) throw new Error('ETIMEDOUT')
    const [key, token, ttl] = args
    if (ttl !== '0') this.extensions.push(ttl)
    if (this.values.get(key) !== token) return 0
    if (ttl === '0') this.values.delete(key)
    return 1
  }
}

async function acquire(client: LockClient): Promise<TargetLease> {
  const lease = await TargetLease.acquire('t-1', { client, ttlMs: 120_000 })
  if (!lease) throw new Error('lease not acquired')
  return lease
}

describe('TargetLease', () => {
  let client: FakeLockClient

  beforeEach(() => {
    client = new FakeLockClient()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('locks on a per-target key and releases it', async () => {
    const lease = await acquire(client)

    expect(targetLockKey('t-1')).toBe('crawl-lock:t-1')
    expect(client.values.has('crawl-lock:t-1')).toBe(true)

    await expect(lease.release()).resolves.toBe(true)
    expect(client.values.has('crawl-lock:t-1')).toBe(false)
  })

  it('is null when another job holds the target', async () => {
    client.values.set('crawl-lock:t-1', 'other-token')

    await expect(TargetLease.acquire('t-1', { client })).resolves.toBeNull()
  })

  it('renews every quarter ttl until released', async () => {
    vi.useFakeTimers()
    const lease = await acquire(client)

    await vi.advanceTimersByTimeAsync(60_000)
    await lease.release()
    await vi.advanceTimersByTimeAsync(60_000)

    expect(client.extensions).toEqual(['120000', '120000'])
    expect(lease.isLost).toBe(false)
  })

  it('aborts its signal when the lock changes owner', async () => {
    vi.useFakeTimers()
    const lease = await acquire(client)
    client.values.set('crawl-lock:t-1', 'other-token')

    await vi.advanceTimersByTimeAsync(29_999)
    expect(lease.signal.aborted).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    expect(lease.signal.aborted).toBe(true)

    await vi.advanceTimersByTimeAsync(60_000)
    expect(client.extensions).toHaveLength(1)
  })

  it('aborts its signal when a renewal errors', async () => {
    vi.useFakeTimers()
    const lease = await acquire(client)
    client.failEval = true

    await vi.advanceTimersByTimeAsync(30_000)

    expect(lease.isLost).toBe(true)
  })

  it('reports a failed release instead of throwing', async () => {
    const lease = await acquire(client)
    client.failEval = true

    await expect(lease.release()).resolves.toBe(false)
  })
})
