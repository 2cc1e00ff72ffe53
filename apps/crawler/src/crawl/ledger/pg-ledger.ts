/**
 * PostgreSQL Progress Ledger
 *
 * Tables live in packages/db/sql/schema.sql. Each statement is a single
 * row-level write, so a crash mid-sweep keeps every item already written.
 */

import type { SqlExecutor } from '@tidemark/db'
import { loggers } from '../../config/logger.js'
import type { CrawlTarget, HeavyRecord, ItemRecord, ItemRef, LightRecord } from '../types.js'
import type { FollowerSnapshot, ProgressLedger, WorkerErrorEntry } from './types.js'

const log = loggers.ledger

interface TargetRow {
  target_id: string
  handle: string
  worker_id: string | null
  display_name: string | null
  is_new: boolean
  is_alive: boolean
  crawl_priority: number
  last_crawled: Date | null
}

interface ItemRefRow {
  target_id: string
  item_id: string
  canonical_url: string
  listing_index: number | null
}

const TARGET_COLUMNS = `target_id, handle, worker_id, display_name, is_new, is_alive, crawl_priority, last_crawled`

function toTarget(row: TargetRow): CrawlTarget {
  return {
    targetId: row.target_id,
    handle: row.handle,
    workerId: row.worker_id,
    displayName: row.display_name,
    isNew: row.is_new,
    isAlive: row.is_alive,
    crawlPriority: row.crawl_priority,
    lastCrawled: row.last_crawled,
  }
}

// Light data never replaces stored values with NULL, and never touches needs_update on conflict.
const UPSERT_LIGHT = `
  INSERT INTO crawl_items (
    target_id, item_id, canonical_url, listing_index,
    thumbnail_url, thumbnail_alt, count_text, count,
    needs_update, is_alive, crawling_algorithm, light_crawled_at, crawled_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, TRUE, TRUE, $9, $10, $10)
  ON CONFLICT (target_id, item_id) DO UPDATE SET
    canonical_url      = EXCLUDED.canonical_url,
    listing_index      = COALESCE(EXCLUDED.listing_index, crawl_items.listing_index),
    thumbnail_url      = COALESCE(EXCLUDED.thumbnail_url, crawl_items.thumbnail_url),
    thumbnail_alt      = COALESCE(EXCLUDED.thumbnail_alt, crawl_items.thumbnail_alt),
    count_text         = COALESCE(EXCLUDED.count_text, crawl_items.count_text),
    count              = COALESCE(EXCLUDED.count, crawl_items.count),
    is_alive           = TRUE,
    crawling_algorithm = EXCLUDED.crawling_algorithm,
    light_crawled_at   = EXCLUDED.light_crawled_at,
    crawled_at         = EXCLUDED.crawled_at
`

// Heavy data clears needs_update in the same statement that stores it.
const UPSERT_HEAVY = `
  INSERT INTO crawl_items (
    target_id, item_id, canonical_url,
    title, posted_at, posted_at_text, audio_title, audio_author, audio_text,
    like_text, like_count, comments,
    needs_update, is_alive, crawling_algorithm, heavy_crawled_at, crawled_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, FALSE, TRUE, $13, $14, $14)
  ON CONFLICT (target_id, item_id) DO UPDATE SET
    canonical_url      = EXCLUDED.canonical_url,
    title              = COALESCE(EXCLUDED.title, crawl_items.title),
    posted_at          = COALESCE(EXCLUDED.posted_at, crawl_items.posted_at),
    posted_at_text     = COALESCE(EXCLUDED.posted_at_text, crawl_items.posted_at_text),
    audio_title        = COALESCE(EXCLUDED.audio_title, crawl_items.audio_title),
    audio_author       = COALESCE(EXCLUDED.audio_author, crawl_items.audio_author),
    audio_text         = COALESCE(EXCLUDED.audio_text, crawl_items.audio_text),
    like_text          = COALESCE(EXCLUDED.like_text, crawl_items.like_text),
    like_count         = COALESCE(EXCLUDED.like_count, crawl_items.like_count),
    comments           = COALESCE(EXCLUDED.comments, crawl_items.comments),
    needs_update       = FALSE,
    crawling_algorithm = EXCLUDED.crawling_algorithm,
    heavy_crawled_at   = EXCLUDED.heavy_crawled_at,
    crawled_at         = EXCLUDED.crawled_at
`

function lightParams(record: LightRecord): unknown[] {
  return [
    record.targetId,
    record.itemId,
    record.canonicalUrl,
    record.listingIndex ?? null,
    record.thumbnailUrl ?? null,
    record.thumbnailAlt ?? null,
    record.countText ?? null,
    record.count ?? null,
    record.algorithm,
    record.crawledAt,
  ]
}

function heavyParams(record: HeavyRecord): unknown[] {
  return [
    record.targetId,
    record.itemId,
    record.canonicalUrl,
    record.title ?? null,
    record.postedAt ?? null,
    record.postedAtText ?? null,
    record.audioTitle ?? null,
    record.audioAuthor ?? null,
    record.audioText ?? null,
    record.likeText ?? null,
    record.likeCount ?? null,
    record.comments ? JSON.stringify(record.comments) : null,
    record.algorithm,
    record.crawledAt,
  ]
}

export class PgProgressLedger implements ProgressLedger {
  constructor(private readonly db: SqlExecutor) {}

  async getTarget(targetId: string): Promise<CrawlTarget | null> {
    const { rows } = await this.db.query<TargetRow>(
      `SELECT ${TARGET_COLUMNS} FROM crawl_targets WHERE target_id = $1`,
      [targetId]
    )
    return rows.length > 0 ? toTarget(rows[0]) : null
  }

  async upsertItem(record: ItemRecord): Promise<void> {
    if (record.kind === 'light') {
      await this.db.query(UPSERT_LIGHT, lightParams(record))
    } else {
      await this.db.query(UPSERT_HEAVY, heavyParams(record))
    }
    log.debug('Item upserted', { targetId: record.targetId, itemId: record.itemId, kind: record.kind })
  }

  async itemsNeedingUpdate(targetId: string): Promise<ItemRef[]> {
    const { rows } = await this.db.query<ItemRefRow>(
      `SELECT target_id, item_id, canonical_url, listing_index
         FROM crawl_items
        WHERE target_id = $1 AND needs_update AND is_alive`,
      [targetId]
    )
    return rows.map((row) => ({
      targetId: row.target_id,
      itemId: row.item_id,
      canonicalUrl: row.canonical_url,
      listingIndex: row.listing_index,
    }))
  }

  async markSwept(targetId: string): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE crawl_targets SET is_new = FALSE, updated_at = now() WHERE target_id = $1 AND is_new`,
      [targetId]
    )
    return rowCount === 1
  }

  async touchLastCrawled(targetId: string, when: Date): Promise<void> {
    // GREATEST skips NULL, so the first touch sets the value.
    await this.db.query(
      `UPDATE crawl_targets
          SET last_crawled = GREATEST(last_crawled, $2::timestamptz), updated_at = now()
        WHERE target_id = $1`,
      [targetId, when]
    )
  }

  async saveDisplayName(targetId: string, displayName: string): Promise<void> {
    await this.db.query(
      `UPDATE crawl_targets SET display_name = $2, updated_at = now() WHERE target_id = $1`,
      [targetId, displayName]
    )
  }

  async recordFollowerSnapshot(snapshot: FollowerSnapshot): Promise<void> {
    await this.db.query(
      `INSERT INTO target_follower_history (target_id, collection_date, follower_text, follower_count)
       VALUES ($1, $2::date, $3, $4)
       ON CONFLICT (target_id, collection_date) DO UPDATE SET
         follower_text  = EXCLUDED.follower_text,
         follower_count = EXCLUDED.follower_count,
         recorded_at    = now()`,
      [snapshot.targetId, snapshot.collectionDate, snapshot.followerText, snapshot.followerCount ?? null]
    )
  }

  async markTargetGone(targetId: string): Promise<void> {
    await this.db.query(
      `UPDATE crawl_targets SET is_alive = FALSE, updated_at = now() WHERE target_id = $1`,
      [targetId]
    )
    log.info('Target marked gone', { targetId })
  }

  async markItemGone(targetId: string, itemId: string): Promise<void> {
    await this.db.query(
      `UPDATE crawl_items SET is_alive = FALSE WHERE target_id = $1 AND item_id = $2`,
      [targetId, itemId]
    )
  }

  async listDueTargets(workerId: string, limit: number, dueBefore: Date): Promise<CrawlTarget[]> {
    const { rows } = await this.db.query<TargetRow>(
      `SELECT ${TARGET_COLUMNS}
         FROM crawl_targets
        WHERE worker_id = $1 AND is_alive
          AND (last_crawled IS NULL OR last_crawled < $3)
        ORDER BY last_crawled IS NULL DESC, crawl_priority DESC, last_crawled ASC
        LIMIT $2`,
      [workerId, limit, dueBefore]
    )
    return rows.map(toTarget)
  }

  async recordWorkerError(entry: WorkerErrorEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO crawler_error_logs (worker_id, error_genre, target_id, message) VALUES ($1, $2, $3, $4)`,
      [entry.workerId, entry.genre, entry.targetId ?? null, entry.message ?? null]
    )
  }
}
