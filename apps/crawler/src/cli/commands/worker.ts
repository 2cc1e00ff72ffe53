import { warmupRedis } from '@tidemark/redis'
import { loggers } from '../../config/logger.js'
import { startCrawlWorker, type CrawlWorkerContext } from '../../fanout/worker.js'

const log = loggers.cli.child('worker')

/**
 * Consume this worker's queue until `shutdown` resolves, then let the
 * running job finish before returning.
 */
export async function runWorkerCommand(context: CrawlWorkerContext, shutdown: Promise<string>): Promise<number> {
  if (!(await warmupRedis())) {
    log.error('Redis unreachable, not starting worker', { workerId: context.workerId })
    return 1
  }

  const worker = startCrawlWorker(context)
  const signal = await shutdown

  log.info('Shutdown requested, waiting for the current job', { signal })
  const started = Date.now()
  await worker.close()
  log.info('Worker closed', { durationMs: Date.now() - started })
  return 0
}
