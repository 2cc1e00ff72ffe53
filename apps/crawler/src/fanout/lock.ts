/**
 * Per-target lease across worker processes.
 *
 * A redelivered job must never drive a second browser over the same target
 * while the first is still sweeping it. The lease renews its Redis lock in
 * the background and aborts its signal as soon as ownership can no longer
 * be confirmed, so the crawl holding it stops.
 */

import { DEFAULT_LOCK_TTL_MS, RedisLock, getRedisClient, type LockClient } from '@tidemark/redis'
import { loggers } from '../config/logger.js'

const log = loggers.fanout

export function targetLockKey(targetId: string): string {
  return `crawl-lock:${targetId}`
}

export interface TargetLeaseOptions {
  client?: LockClient
  ttlMs?: number
  /** Defaults to a quarter of the ttl. */
  renewEveryMs?: number
}

export class TargetLease {
  private readonly lost = new AbortController()
  private readonly timer: NodeJS.Timeout
  private renewal: Promise<void> = Promise.resolve()

  private constructor(
    readonly targetId: string,
    private readonly lock: RedisLock,
    renewEveryMs: number
  ) {
    this.timer = setInterval(() => {
      this.renewal = this.renewal.then(() => this.renew())
    }, renewEveryMs)
  }

  /**
   * Null when another job holds the target.
   */
  static async acquire(targetId: string, options: TargetLeaseOptions = {}): Promise<TargetLease | null> {
    const ttlMs = options.ttlMs ?? DEFAULT_LOCK_TTL_MS
    const lock = await RedisLock.acquire(options.client ?? getRedisClient(), targetLockKey(targetId), ttlMs)
    if (!lock) {
      log.debug('Target lock held elsewhere', { targetId })
      return null
    }

    log.debug('Target lock acquired', { targetId })
    return new TargetLease(targetId, lock, options.renewEveryMs ?? Math.floor(ttlMs / 4))
  }

  /** Aborts once the lock is lost. */
  get signal(): AbortSignal {
    return this.lost.signal
  }

  get isLost(): boolean {
    return this.lost.signal.aborted
  }

  /**
   * Stop renewing and delete the lock if still owned. Never throws.
   */
  async release(): Promise<boolean> {
    clearInterval(this.timer)
    await this.renewal

    try {
      const released = await this.lock.release()
      if (released) {
        log.debug('Target lock released', { targetId: this.targetId })
      } else {
        log.warn('Target lock already gone at release', { targetId: this.targetId })
      }
      return released
    } catch (error) {
      log.warn('Target lock release error', { targetId: this.targetId }, error)
      return false
    }
  }

  private async renew(): Promise<void> {
    if (this.isLost) return

    try {
      if (await this.lock.extend()) return
      log.warn('Target lock lost', { targetId: this.targetId })
    } catch (error) {
      log.warn('Target lock renewal error', { targetId: this.targetId }, error)
    }
    clearInterval(this.timer)
    this.lost.abort()
  }
}
