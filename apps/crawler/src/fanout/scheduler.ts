/**
 * Crawl batch scheduling
 *
 * Picks the targets a worker should crawl now and queues one job per target.
 * The cron schedule gives a cutoff: a target is due when it was never crawled
 * or last crawled before the most recent tick. The ledger applies the cutoff
 * before ordering and limiting, so recently crawled high-priority targets
 * cannot crowd out due ones.
 */

import { CronExpressionParser } from 'cron-parser'
import { createId } from '@paralleldrive/cuid2'
import { loggers } from '../config/logger.js'
import { enqueueCrawlTarget, type CrawlJobData } from '../config/queues.js'
import type { ProgressLedger } from '../crawl/ledger/types.js'
import type { CrawlMode, CrawlTarget } from '../crawl/types.js'

const log = loggers.fanout

export const DEFAULT_CRAWL_CRON = '0 */6 * * *'

// Used when the configured schedule does not parse.
const FALLBACK_INTERVAL_MS = 6 * 60 * 60 * 1000

/**
 * Most recent scheduled tick at or before now (UTC).
 */
export function scheduleCutoff(cronExpr: string = DEFAULT_CRAWL_CRON, now: Date = new Date()): Date {
  try {
    return CronExpressionParser.parse(cronExpr, { currentDate: now, tz: 'UTC' }).prev().toDate()
  } catch (error) {
    log.warn('Invalid cron schedule, using fallback', { schedule: cronExpr }, error)
    return new Date(now.getTime() - FALLBACK_INTERVAL_MS)
  }
}

export function isTargetDue(lastCrawled: Date | null, cronExpr: string = DEFAULT_CRAWL_CRON, now: Date = new Date()): boolean {
  return lastCrawled === null || lastCrawled < scheduleCutoff(cronExpr, now)
}

export interface DueTargetQuery {
  workerId: string
  maxTargets: number
  scheduleCron: string
  now?: Date
}

export interface DueTargets {
  due: CrawlTarget[]
  /** Targets last crawled at or after this tick were left out. */
  dueBefore: Date
}

export async function selectDueTargets(ledger: ProgressLedger, query: DueTargetQuery): Promise<DueTargets> {
  const dueBefore = scheduleCutoff(query.scheduleCron, query.now ?? new Date())
  const due = await ledger.listDueTargets(query.workerId, query.maxTargets, dueBefore)
  return { due, dueBefore }
}

export interface EnqueueBatchOptions extends DueTargetQuery {
  mode: CrawlMode
  maxItems: number
  maxRetries: number
}

export interface EnqueueBatchResult {
  runId: string
  jobIds: string[]
  dueBefore: Date
}

export async function enqueueCrawlBatch(
  ledger: ProgressLedger,
  options: EnqueueBatchOptions
): Promise<EnqueueBatchResult> {
  const { due, dueBefore } = await selectDueTargets(ledger, options)
  const runId = createId()

  const jobIds: string[] = []
  for (const target of due) {
    const data: CrawlJobData = {
      targetId: target.targetId,
      workerId: options.workerId,
      runId,
      mode: options.mode,
      maxItems: options.maxItems,
    }
    jobIds.push(await enqueueCrawlTarget(data, options.maxRetries))
  }

  log.info('Crawl batch enqueued', {
    runId,
    workerId: options.workerId,
    enqueued: jobIds.length,
    dueBefore: dueBefore.toISOString(),
  })

  return { runId, jobIds, dueBefore }
}
