import { loggers } from '../../config/logger.js'
import type { CrawlerSettings } from '../../config/settings.js'
import type { ProgressLedger } from '../../crawl/ledger/types.js'
import { enqueueCrawlBatch } from '../../fanout/scheduler.js'
import type { CrawlerFlags } from '../parse-flags.js'

const log = loggers.cli.child('enqueue')

/**
 * Queue one job per due target on the worker's queue.
 */
export async function runEnqueueCommand(
  ledger: ProgressLedger,
  settings: Pick<CrawlerSettings, 'scheduleCron' | 'fanoutMaxRetries'>,
  flags: CrawlerFlags
): Promise<number> {
  const result = await enqueueCrawlBatch(ledger, {
    workerId: flags.workerId,
    maxTargets: flags.maxTargets,
    scheduleCron: settings.scheduleCron,
    mode: flags.mode,
    maxItems: flags.maxItems,
    maxRetries: settings.fanoutMaxRetries,
  })

  log.info('Crawl jobs enqueued', {
    workerId: flags.workerId,
    runId: result.runId,
    jobs: result.jobIds.length,
    dueBefore: result.dueBefore.toISOString(),
  })
  return 0
}
