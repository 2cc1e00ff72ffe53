#!/usr/bin/env node
import '../env.js'
import { disconnectRedis } from '@tidemark/redis'
import { closeCrawlQueues } from '../config/queues.js'
import { loggers } from '../config/logger.js'
import { getSettings, SettingsError } from '../config/settings.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runEnqueueCommand } from './commands/enqueue.js'
import { runMigrateCommand } from './commands/migrate.js'
import { runWorkerCommand } from './commands/worker.js'
import { parseFlags, readCrawlerFlags, UsageError, type CrawlerFlags } from './parse-flags.js'
import { closeAll, createCrawlStack, openDatabase, waitForShutdown } from './runtime.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Tidemark crawler')
  console.log('')
  console.log('Commands:')
  console.log('  crawl   --worker <id> [--device pc|vps] [--profile-dir <path>] [--max-items 100] [--max-targets 50] [--mode light|full] [--login-only]')
  console.log('  enqueue --worker <id> [--max-items 100] [--max-targets 50] [--mode light|full]')
  console.log('  worker  --worker <id> [--device pc|vps] [--profile-dir <path>]')
  console.log('  db:migrate')
  console.log('')
  console.log('Exit codes: 0 success, 1 run failure, 2 usage error')
}

async function crawl(flags: CrawlerFlags): Promise<number> {
  const settings = getSettings()
  const { pool, ledger } = openDatabase(settings)
  const stack = createCrawlStack(settings, ledger, flags)

  const abort = new AbortController()
  void waitForShutdown().then((signal) => {
    log.warn('Interrupted, stopping after the current item', { signal })
    abort.abort()
  })

  try {
    return await runCrawlCommand({ ledger, settings, ...stack }, flags, abort.signal)
  } finally {
    await closeAll([
      ['browser', () => stack.sessions.close()],
      ['publisher', () => stack.publisher.close()],
      ['database', () => pool.end()],
    ])
  }
}

async function enqueue(flags: CrawlerFlags): Promise<number> {
  const settings = getSettings()
  const { pool, ledger } = openDatabase(settings)
  try {
    return await runEnqueueCommand(ledger, settings, flags)
  } finally {
    await closeAll([
      ['queues', () => closeCrawlQueues()],
      ['database', () => pool.end()],
    ])
  }
}

async function worker(flags: CrawlerFlags): Promise<number> {
  const settings = getSettings()
  const { pool, ledger } = openDatabase(settings)
  const stack = createCrawlStack(settings, ledger, flags)
  try {
    return await runWorkerCommand(
      {
        workerId: flags.workerId,
        ledger,
        writer: stack.writer,
        strategy: stack.strategy,
        sessions: stack.sessions,
        settings,
      },
      waitForShutdown()
    )
  } finally {
    await closeAll([
      ['browser', () => stack.sessions.close()],
      ['publisher', () => stack.publisher.close()],
      ['locks', () => disconnectRedis()],
      ['database', () => pool.end()],
    ])
  }
}

async function migrate(): Promise<number> {
  const { pool } = openDatabase(getSettings())
  try {
    return await runMigrateCommand(pool)
  } finally {
    await pool.end()
  }
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'crawl':
      exitCode = await crawl(readCrawlerFlags(flags))
      break
    case 'enqueue':
      exitCode = await enqueue(readCrawlerFlags(flags))
      break
    case 'worker':
      exitCode = await worker(readCrawlerFlags(flags))
      break
    case 'db:migrate':
      exitCode = await migrate()
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(error.message)
    process.exit(error.exitCode)
  }
  if (error instanceof SettingsError) {
    console.error(error.message)
    process.exit(2)
  }
  log.fatal('Crawler failed', {}, error)
  process.exit(1)
})
