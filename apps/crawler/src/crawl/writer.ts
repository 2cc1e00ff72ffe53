/**
 * Dual-Sink Writer
 *
 * Persist first, then publish. The two are not one transaction: a failed
 * publish leaves the stored record in place and is only logged.
 */

import { loggers } from '../config/logger.js'
import { CrawlError } from './errors.js'
import type { ProgressLedger } from './ledger/types.js'
import { ItemSyncEventSchema, type EventPublisher, type ItemSyncEvent } from './publisher.js'
import type { ItemRecord } from './types.js'

const log = loggers.writer

export interface CommitResult {
  targetId: string
  itemId: string
  recordKind: ItemRecord['kind']
  /** False when publishing is disabled or failed. */
  published: boolean
  publicationError?: string
}

export interface RecordWriter {
  commit(record: ItemRecord): Promise<CommitResult>
}

/**
 * Schema-stable subset of a record for downstream consumers.
 */
export function toItemSyncEvent(record: ItemRecord): ItemSyncEvent {
  return ItemSyncEventSchema.parse({
    itemId: record.itemId,
    targetId: record.targetId,
    canonicalUrl: record.canonicalUrl,
    count: record.kind === 'light' ? (record.count ?? null) : null,
    recordKind: record.kind,
    crawledAt: record.crawledAt.toISOString(),
    algorithm: record.algorithm,
  })
}

export class DualSinkWriter implements RecordWriter {
  constructor(
    private readonly ledger: Pick<ProgressLedger, 'upsertItem'>,
    private readonly publisher: EventPublisher
  ) {}

  /**
   * @throws CrawlError PersistenceFailure when the ledger write fails; nothing is published then
   */
  async commit(record: ItemRecord): Promise<CommitResult> {
    const { targetId, itemId, kind } = record

    try {
      await this.ledger.upsertItem(record)
    } catch (error) {
      throw new CrawlError('PersistenceFailure', `Failed to persist ${kind} record for item ${itemId}`, {
        targetId,
        itemId,
        cause: error,
      })
    }

    const result: CommitResult = { targetId, itemId, recordKind: kind, published: false }
    if (!this.publisher.enabled) {
      return result
    }

    try {
      await this.publisher.publish(toItemSyncEvent(record))
      result.published = true
    } catch (error) {
      const publication = new CrawlError('PublicationFailure', 'Item sync event not published', {
        targetId,
        itemId,
        cause: error,
      })
      result.publicationError = error instanceof Error ? error.message : String(error)
      log.warn('Item sync publish failed', { targetId, itemId, recordKind: kind, kind: publication.kind }, error)
    }

    return result
  }
}
