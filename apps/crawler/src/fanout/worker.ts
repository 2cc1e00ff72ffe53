/**
 * Crawl Target Worker
 *
 * BullMQ worker bound to one worker identity (one browser login).
 * Each job: Lease -> Orchestrator -> outcome -> retry decision. Losing the
 * lease mid-crawl aborts the crawl like a deadline would.
 * Concurrency is 1: a worker has one browser and the session is not parallel-safe.
 */

import { UnrecoverableError, Worker, type Job } from 'bullmq'
import { redisConnection } from '@tidemark/redis'
import { loggers } from '../config/logger.js'
import { crawlQueueName, CrawlJobDataSchema, type CrawlJobData } from '../config/queues.js'
import type { CrawlerSettings } from '../config/settings.js'
import type { ProgressLedger, ErrorGenre } from '../crawl/ledger/types.js'
import { CrawlOrchestrator, type CrawlOutcome } from '../crawl/orchestrator.js'
import type { ExtractionStrategy } from '../crawl/strategy.js'
import type { RecordWriter } from '../crawl/writer.js'
import type { SessionProvider } from '../render/session.js'
import { linkedDeadline } from '../utils/timeout.js'
import { TargetLease } from './lock.js'
import { decideRetry, genreOfError, genreOfFailure } from './retry.js'

const log = loggers.fanout

export interface CrawlWorkerContext {
  workerId: string
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
    | 'utcOffsetMinutes'
    | 'fanoutMaxRetries'
    | 'blockRetryDelayMs'
  >
}

export interface CrawlJobResult {
  targetId: string
  state: CrawlOutcome['state']
  failureKind?: string
  lightCommitted: number
  heavyCommitted: number
  swept: boolean
}

/**
 * A failure BullMQ should retry. delayMs feeds the worker's backoff strategy.
 */
export class CrawlJobError extends Error {
  constructor(
    readonly genre: ErrorGenre,
    message: string,
    readonly delayMs: number
  ) {
    super(message)
    this.name = 'CrawlJobError'
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function toResult(outcome: CrawlOutcome): CrawlJobResult {
  return {
    targetId: outcome.targetId,
    state: outcome.state,
    failureKind: outcome.failure?.kind,
    lightCommitted: outcome.lightCommitted,
    heavyCommitted: outcome.heavyCommitted,
    swept: outcome.swept,
  }
}

/**
 * Record the failure, then decide whether BullMQ gets to try again.
 */
async function failJob(
  job: Job<CrawlJobData>,
  context: CrawlWorkerContext,
  targetId: string,
  genre: ErrorGenre,
  message: string
): Promise<Error> {
  try {
    await context.ledger.recordWorkerError({ workerId: context.workerId, genre, targetId, message })
  } catch (error) {
    log.error('Failed to record worker error', { targetId, genre }, error)
  }

  const decision = decideRetry(genre, job.attemptsMade, {
    maxRetries: context.settings.fanoutMaxRetries,
    blockDelayMs: context.settings.blockRetryDelayMs,
  })

  log.warn('Crawl job failed', {
    jobId: job.id,
    targetId,
    genre,
    attempt: job.attemptsMade + 1,
    retry: decision.retry,
    delayMs: decision.delayMs,
    reason: message,
  })

  return decision.retry
    ? new CrawlJobError(genre, message, decision.delayMs)
    : new UnrecoverableError(`[${genre}] ${message}`)
}

// A lost browser is rebuilt on the next acquire.
async function resetSessions(context: CrawlWorkerContext): Promise<void> {
  try {
    await context.sessions.close()
  } catch (error) {
    log.warn('Closing lost browser session failed', {}, error)
  }
}

export async function processCrawlJob(job: Job<CrawlJobData>, context: CrawlWorkerContext): Promise<CrawlJobResult> {
  const parsed = CrawlJobDataSchema.safeParse(job.data)
  if (!parsed.success) {
    throw new UnrecoverableError(`Invalid crawl job data: ${parsed.error.issues.map((i) => i.message).join(', ')}`)
  }
  const data = parsed.data
  if (data.workerId !== context.workerId) {
    throw new UnrecoverableError(`Job for worker ${data.workerId} reached worker ${context.workerId}`)
  }

  const jobLog = log.child({ jobId: job.id, targetId: data.targetId, runId: data.runId })
  jobLog.info('Crawl job started', { mode: data.mode, attempt: job.attemptsMade + 1 })

  let lease: TargetLease | null
  try {
    lease = await TargetLease.acquire(data.targetId)
  } catch (error) {
    throw await failJob(job, context, data.targetId, genreOfError(error), messageOf(error))
  }
  if (!lease) {
    throw await failJob(job, context, data.targetId, 'target_locked', 'Target is locked by another job')
  }

  try {
    const orchestrator = new CrawlOrchestrator(
      { ledger: context.ledger, writer: context.writer, strategy: context.strategy, sessions: context.sessions },
      {
        mode: data.mode,
        maxItems: data.maxItems,
        batchSize: context.settings.batchSize,
        maxScrolls: context.settings.maxScrolls,
        itemTimeoutMs: context.settings.itemTimeoutMs,
        utcOffsetMinutes: context.settings.utcOffsetMinutes,
      }
    )

    const deadline = linkedDeadline(context.settings.targetTimeoutMs, lease.signal)
    let outcome: CrawlOutcome
    try {
      outcome = await orchestrator.crawl(data.targetId, { signal: deadline.signal })
    } finally {
      deadline.dispose()
    }

    if (outcome.state === 'FAILED' && lease.isLost) {
      throw await failJob(job, context, data.targetId, 'target_locked', 'Target lock lost during crawl')
    }

    if (outcome.state === 'DONE' || outcome.failure?.kind === 'TargetNotFound') {
      jobLog.info('Crawl job finished', { state: outcome.state, heavyCommitted: outcome.heavyCommitted })
      return toResult(outcome)
    }

    const failure = outcome.failure
    if (failure?.kind === 'SessionLost') {
      await resetSessions(context)
    }
    throw await failJob(
      job,
      context,
      data.targetId,
      failure ? genreOfFailure(failure) : 'unknown',
      failure?.message ?? 'Target crawl failed'
    )
  } catch (error) {
    if (error instanceof CrawlJobError || error instanceof UnrecoverableError) {
      throw error
    }
    throw await failJob(job, context, data.targetId, genreOfError(error), messageOf(error))
  } finally {
    await lease.release()
  }
}

export function startCrawlWorker(context: CrawlWorkerContext): Worker<CrawlJobData, CrawlJobResult> {
  const worker = new Worker<CrawlJobData, CrawlJobResult>(
    crawlQueueName(context.workerId),
    async (job: Job<CrawlJobData>) => processCrawlJob(job, context),
    {
      connection: redisConnection,
      concurrency: 1,
      settings: {
        backoffStrategy: (_attemptsMade: number, _type?: string, err?: Error) =>
          err instanceof CrawlJobError ? err.delayMs : 0,
      },
    }
  )

  worker.on('completed', (job, result) => {
    log.info('Crawl job completed', { jobId: job.id, targetId: result.targetId, state: result.state })
  })

  worker.on('failed', (job, error) => {
    log.error('Crawl job attempt failed', { jobId: job?.id, targetId: job?.data.targetId }, error)
  })

  log.info('Crawl worker started', { workerId: context.workerId, queue: crawlQueueName(context.workerId) })

  return worker
}
