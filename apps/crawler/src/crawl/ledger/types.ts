/**
 * Progress Ledger
 *
 * Durable per-target crawl state. Every operation touches one target's rows
 * only, so workers on different targets never contend.
 */

import type { CrawlTarget, ItemRecord, ItemRef } from '../types.js'

export interface FollowerSnapshot {
  targetId: string
  /** Calendar day the count belongs to, YYYY-MM-DD. */
  collectionDate: string
  followerText: string
  followerCount?: number
}

export type ErrorGenre = 'proxy_block' | 'browser_version' | 'target_locked' | 'session_lost' | 'unknown'

export interface WorkerErrorEntry {
  workerId: string
  genre: ErrorGenre
  targetId?: string
  message?: string
}

export interface ProgressLedger {
  getTarget(targetId: string): Promise<CrawlTarget | null>

  /**
   * Insert or merge by (targetId, itemId).
   * Light records never clear heavy fields. A new light-only item starts with
   * needs_update = true; a heavy record clears needs_update in the same write.
   */
  upsertItem(record: ItemRecord): Promise<void>

  /** Live items still waiting on heavy data, read from storage on every call. */
  itemsNeedingUpdate(targetId: string): Promise<ItemRef[]>

  /** Clear is_new. Resolves true only for the call that actually cleared it. */
  markSwept(targetId: string): Promise<boolean>

  /** Move last_crawled forward; an earlier timestamp leaves it unchanged. */
  touchLastCrawled(targetId: string, when: Date): Promise<void>

  saveDisplayName(targetId: string, displayName: string): Promise<void>

  /** One row per target per day; a second snapshot the same day overwrites it. */
  recordFollowerSnapshot(snapshot: FollowerSnapshot): Promise<void>

  /** The account no longer exists; excluded from future scheduling. */
  markTargetGone(targetId: string): Promise<void>

  /** The item no longer exists; excluded from future sweeps. */
  markItemGone(targetId: string, itemId: string): Promise<void>

  /**
   * Live targets assigned to a worker that were never crawled or last crawled
   * before dueBefore: never crawled first, then priority, then oldest crawl.
   */
  listDueTargets(workerId: string, limit: number, dueBefore: Date): Promise<CrawlTarget[]>

  recordWorkerError(entry: WorkerErrorEntry): Promise<void>
}
