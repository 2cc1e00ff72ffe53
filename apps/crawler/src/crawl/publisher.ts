/**
 * Item sync event stream
 *
 * One event per committed record, handed to a BullMQ queue that downstream
 * consumers read. Publishing is best-effort; storage is the source of truth.
 */

import { Queue } from 'bullmq'
import { z } from 'zod'
import { redisConnection } from '@tidemark/redis'
import { loggers } from '../config/logger.js'
import type { CrawlerSettings } from '../config/settings.js'

const log = loggers.writer

export const ItemSyncEventSchema = z.object({
  itemId: z.string().min(1),
  targetId: z.string().min(1),
  canonicalUrl: z.string().url(),
  count: z.number().int().nonnegative().nullable(),
  recordKind: z.enum(['light', 'heavy']),
  crawledAt: z.string().datetime(),
  algorithm: z.string().min(1),
})

export type ItemSyncEvent = z.infer<typeof ItemSyncEventSchema>

export interface EventPublisher {
  readonly enabled: boolean
  publish(event: ItemSyncEvent): Promise<void>
  close(): Promise<void>
}

/**
 * Used when no project or destination is configured. Commits still succeed.
 */
export class DisabledEventPublisher implements EventPublisher {
  readonly enabled = false

  async publish(_event: ItemSyncEvent): Promise<void> {}

  async close(): Promise<void> {}
}

export const ITEM_SYNC_JOB_NAME = 'item-sync'

/**
 * Publishes onto a BullMQ queue. Jobs get generated ids, so re-publishing
 * the same record always produces a new event.
 */
export class QueueEventPublisher implements EventPublisher {
  readonly enabled = true

  constructor(private readonly queue: Queue<ItemSyncEvent>) {}

  async publish(event: ItemSyncEvent): Promise<void> {
    await this.queue.add(ITEM_SYNC_JOB_NAME, event, {
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    })
  }

  async close(): Promise<void> {
    await this.queue.close()
  }
}

export function itemSyncQueueName(project: string, destination: string): string {
  return `${project}-${destination}`
}

export function createEventPublisher(
  settings: Pick<CrawlerSettings, 'eventProject' | 'itemSyncQueue'>
): EventPublisher {
  const { eventProject, itemSyncQueue } = settings
  if (!eventProject || !itemSyncQueue) {
    log.info('Item sync publishing disabled', {
      hasProject: Boolean(eventProject),
      hasDestination: Boolean(itemSyncQueue),
    })
    return new DisabledEventPublisher()
  }

  const name = itemSyncQueueName(eventProject, itemSyncQueue)
  log.info('Item sync publishing enabled', { queue: name })
  return new QueueEventPublisher(new Queue<ItemSyncEvent>(name, { connection: redisConnection }))
}
