import { loggers } from '../../config/logger.js'
import type { CrawlerSettings } from '../../config/settings.js'
import type { ProgressLedger } from '../../crawl/ledger/types.js'
import { CrawlOrchestrator } from '../../crawl/orchestrator.js'
import { crawlTargets, verifyLogin } from '../../crawl/run.js'
import type { ExtractionStrategy } from '../../crawl/strategy.js'
import type { RecordWriter } from '../../crawl/writer.js'
import { selectDueTargets } from '../../fanout/scheduler.js'
import type { SessionProvider } from '../../render/session.js'
import type { CrawlerFlags } from '../parse-flags.js'

const log = loggers.cli.child('crawl')

export interface CrawlCommandDeps {
  ledger: ProgressLedger
  writer: RecordWriter
  strategy: ExtractionStrategy
  sessions: SessionProvider
  settings: Pick<
    CrawlerSettings,
    | 'batchSize'
    | 'maxScrolls'
    | 'itemTimeoutMs'
    | 'targetTimeoutMs'
    | 'runMinutes'
    | 'utcOffsetMinutes'
    | 'scheduleCron'
  >
}

/**
 * Crawl this worker's due targets in process, one after another.
 * @returns 0 when the run completed or reached its deadline, 1 when a failure ended it
 */
export async function runCrawlCommand(deps: CrawlCommandDeps, flags: CrawlerFlags, signal?: AbortSignal): Promise<number> {
  const { ledger, writer, strategy, sessions, settings } = deps

  if (flags.loginOnly) {
    const signedIn = await verifyLogin(sessions, strategy)
    if (!signedIn) {
      log.error('Browser profile is not signed in', { workerId: flags.workerId })
    }
    return signedIn ? 0 : 1
  }

  const { due, dueBefore } = await selectDueTargets(ledger, {
    workerId: flags.workerId,
    maxTargets: flags.maxTargets,
    scheduleCron: settings.scheduleCron,
  })
  log.info('Crawl run starting', { workerId: flags.workerId, due: due.length, dueBefore: dueBefore.toISOString(), mode: flags.mode })

  const orchestrator = new CrawlOrchestrator(
    { ledger, writer, strategy, sessions },
    {
      mode: flags.mode,
      maxItems: flags.maxItems,
      batchSize: settings.batchSize,
      maxScrolls: settings.maxScrolls,
      itemTimeoutMs: settings.itemTimeoutMs,
      utcOffsetMinutes: settings.utcOffsetMinutes,
    }
  )

  const summary = await crawlTargets(
    orchestrator,
    due.map((target) => target.targetId),
    { runTimeoutMs: settings.runMinutes * 60_000, targetTimeoutMs: settings.targetTimeoutMs, signal }
  )

  return summary.stoppedBy === 'run-failure' ? 1 : 0
}
