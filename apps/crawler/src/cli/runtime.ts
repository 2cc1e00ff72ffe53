/**
 * Wiring for the CLI commands: Postgres ledger, dual-sink writer, strategy
 * and browser sessions, each with its own teardown.
 */

import type { Pool } from 'pg'
import { createPool } from '@tidemark/db'
import { loggers } from '../config/logger.js'
import type { CrawlerSettings } from '../config/settings.js'
import { PgProgressLedger } from '../crawl/ledger/pg-ledger.js'
import type { ProgressLedger } from '../crawl/ledger/types.js'
import { createEventPublisher, type EventPublisher } from '../crawl/publisher.js'
import { createStrategyRegistry, DEFAULT_STRATEGY_ID } from '../crawl/strategies/index.js'
import type { ExtractionStrategy } from '../crawl/strategy.js'
import { DualSinkWriter } from '../crawl/writer.js'
import { PlaywrightSessionProvider } from '../render/playwright-session.js'
import type { CrawlerFlags } from './parse-flags.js'

const log = loggers.cli

export interface Database {
  pool: Pool
  ledger: PgProgressLedger
}

export function openDatabase(settings: Pick<CrawlerSettings, 'databaseUrl'>): Database {
  const pool = createPool(settings.databaseUrl)
  return { pool, ledger: new PgProgressLedger(pool) }
}

export interface CrawlStack {
  writer: DualSinkWriter
  publisher: EventPublisher
  strategy: ExtractionStrategy
  sessions: PlaywrightSessionProvider
}

export function createCrawlStack(
  settings: Readonly<CrawlerSettings>,
  ledger: ProgressLedger,
  flags: Pick<CrawlerFlags, 'device' | 'profileDir' | 'loginOnly'>
): CrawlStack {
  const publisher = createEventPublisher(settings)
  const strategy = createStrategyRegistry(settings).require(DEFAULT_STRATEGY_ID)
  const sessions = new PlaywrightSessionProvider({
    device: flags.device,
    wsEndpoint: settings.browserWsEndpoint,
    executablePath: settings.chromeExecutablePath,
    userDataDir: flags.profileDir ?? settings.chromeUserDataDir,
    // A login check on a desktop needs a visible window to sign in through.
    headless: !(flags.loginOnly && flags.device === 'pc'),
  })

  log.info('Crawl stack ready', {
    strategy: strategy.id,
    device: flags.device,
    publishing: publisher.enabled,
  })

  return { writer: new DualSinkWriter(ledger, publisher), publisher, strategy, sessions }
}

/**
 * Run every teardown even when one fails; the first failure is rethrown.
 */
export async function closeAll(steps: Array<[string, () => Promise<void>]>): Promise<void> {
  const results = await Promise.allSettled(steps.map(([, close]) => close()))
  const failures = results.flatMap((result, i) =>
    result.status === 'rejected' ? [{ step: steps[i][0], reason: result.reason }] : []
  )

  for (const failure of failures) {
    log.error('Shutdown step failed', { step: failure.step }, failure.reason)
  }
  if (failures.length > 0) {
    throw failures[0].reason
  }
}

/**
 * Resolves with the first SIGINT or SIGTERM.
 */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      resolve(signal)
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}
