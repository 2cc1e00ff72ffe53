/**
 * A crawl run: targets one after another on one worker, until the list is
 * done, the run deadline passes, or a failure ends the run.
 */

import { loggers } from '../config/logger.js'
import type { SessionProvider } from '../render/session.js'
import { linkedDeadline } from '../utils/timeout.js'
import type { CrawlOrchestrator, CrawlOutcome } from './orchestrator.js'
import type { ExtractionStrategy } from './strategy.js'

const log = loggers.orchestrator.child('run')

export interface RunOptions {
  /** Whole-run budget in ms; 0 disables. */
  runTimeoutMs: number
  /** Per-target budget in ms; 0 disables. */
  targetTimeoutMs: number
  signal?: AbortSignal
}

export type RunStop = 'completed' | 'deadline' | 'run-failure'

export interface RunSummary {
  outcomes: CrawlOutcome[]
  stoppedBy: RunStop
  /** Targets never started because the run stopped early. */
  skipped: string[]
}

export async function crawlTargets(
  orchestrator: Pick<CrawlOrchestrator, 'crawl'>,
  targetIds: readonly string[],
  options: RunOptions
): Promise<RunSummary> {
  const runDeadline = linkedDeadline(options.runTimeoutMs, options.signal)
  const outcomes: CrawlOutcome[] = []
  let stoppedBy: RunStop = 'completed'

  try {
    for (const targetId of targetIds) {
      if (runDeadline.signal.aborted) {
        stoppedBy = 'deadline'
        break
      }

      const targetDeadline = linkedDeadline(options.targetTimeoutMs, runDeadline.signal)
      let outcome: CrawlOutcome
      try {
        outcome = await orchestrator.crawl(targetId, { signal: targetDeadline.signal })
      } finally {
        targetDeadline.dispose()
      }
      outcomes.push(outcome)

      if (outcome.failure?.scope === 'run') {
        log.error('Run stopped', { targetId, kind: outcome.failure.kind, reason: outcome.failure.message })
        stoppedBy = 'run-failure'
        break
      }
    }
  } finally {
    runDeadline.dispose()
  }

  // The last target may have been cut short by the run deadline.
  if (stoppedBy === 'completed' && runDeadline.signal.aborted) {
    stoppedBy = 'deadline'
  }

  const skipped = targetIds.slice(outcomes.length)
  log.info('Run finished', {
    targets: targetIds.length,
    done: outcomes.filter((o) => o.state === 'DONE').length,
    failed: outcomes.filter((o) => o.state === 'FAILED').length,
    skipped: skipped.length,
    stoppedBy,
  })

  return { outcomes, stoppedBy, skipped }
}

/**
 * Open one session and ask the strategy whether it is signed in.
 */
export async function verifyLogin(sessions: SessionProvider, strategy: ExtractionStrategy): Promise<boolean> {
  const lease = await sessions.acquire('login-check')
  try {
    const signedIn = await strategy.verifySession(lease.session)
    log.info('Login check', { signedIn })
    return signedIn
  } finally {
    await lease.release()
  }
}
