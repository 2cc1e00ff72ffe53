/**
 * Crawl worker: lock handling, outcome mapping and retry decisions.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Job } from 'bullmq'

const workerMocks = vi.hoisted(() => {
  const state = {
    processor: null as ((job: unknown) => Promise<unknown>) | null,
    options: null as Record<string, unknown> | null,
  }

  class WorkerMock {
    constructor(_name: string, handler: (job: unknown) => Promise<unknown>, options: Record<string, unknown>) {
      state.processor = handler
      state.options = options
    }

    on = vi.fn()

    close = vi.fn()
  }

  class UnrecoverableErrorMock extends Error {}

  return { state, WorkerMock, UnrecoverableErrorMock }
})

const mocks = vi.hoisted(() => ({
  mockAcquireLease: vi.fn(),
  mockReleaseLease: vi.fn(),
}))

vi.mock('bullmq', () => ({
  Worker: workerMocks.WorkerMock,
  UnrecoverableError: workerMocks.UnrecoverableErrorMock,
}))

vi.mock('../lock.js', () => ({
  TargetLease: { acquire: mocks.mockAcquireLease },
}))

import type { CrawlJobData } from '../../config/queues.js'
import { VideoGridStrategy } from '../../crawl/strategies/video-grid/strategy.js'
import { DualSinkWriter } from '../../crawl/writer.js'
import { DisabledEventPublisher } from '../../crawl/publisher.js'
import { FakeSession, FakeSessionProvider } from '../../crawl/__tests__/support/fake-session.js'
import { MemoryLedger } from '../../crawl/__tests__/support/memory-ledger.js'
import { ORIGIN, createSiteSession, videosFrom } from '../../crawl/__tests__/support/video-site.js'
import { CrawlJobError, processCrawlJob, startCrawlWorker, type CrawlWorkerContext } from '../worker.js'

const settings: CrawlWorkerContext['settings'] = {
  batchSize: 100,
  maxScrolls: 5,
  itemTimeoutMs: 0,
  targetTimeoutMs: 0,
  utcOffsetMinutes: 0,
  fanoutMaxRetries: 3,
  blockRetryDelayMs: 300_000,
}

const jobData: CrawlJobData = { targetId: 't-1', workerId: 'worker-1', runId: 'run1', mode: 'full', maxItems: 100 }

function createJob(data: unknown = jobData, attemptsMade = 0): Job<CrawlJobData> {
  // Only the fields the processor reads.
  const job = { id: 'crawl-t-1-run1', data, attemptsMade }
  return job as unknown as Job<CrawlJobData>
}

describe('processCrawlJob', () => {
  let ledger: MemoryLedger
  let session: FakeSession
  let sessions: FakeSessionProvider
  let context: CrawlWorkerContext
  let leaseLoss: AbortController

  beforeEach(() => {
    vi.clearAllMocks()
    leaseLoss = new AbortController()
    mocks.mockReleaseLease.mockResolvedValue(true)
    mocks.mockAcquireLease.mockImplementation(async (targetId: string) => ({
      targetId,
      signal: leaseLoss.signal,
      get isLost() {
        return leaseLoss.signal.aborted
      },
      release: mocks.mockReleaseLease,
    }))

    ledger = new MemoryLedger()
    ledger.addTarget({ targetId: 't-1', handle: 'creator' })
    session = createSiteSession(videosFrom(103, 3))
    sessions = new FakeSessionProvider(() => session)
    context = {
      workerId: 'worker-1',
      ledger,
      writer: new DualSinkWriter(ledger, new DisabledEventPublisher()),
      strategy: new VideoGridStrategy({ origin: ORIGIN, commentLimit: 5, utcOffsetMinutes: 0, maxScrolls: 5 }),
      sessions,
      settings,
    }
  })

  it('crawls the target under its lock', async () => {
    const result = await processCrawlJob(createJob(), context)

    expect(result).toEqual({
      targetId: 't-1',
      state: 'DONE',
      failureKind: undefined,
      lightCommitted: 3,
      heavyCommitted: 3,
      swept: true,
    })
    expect(mocks.mockAcquireLease).toHaveBeenCalledWith('t-1')
    expect(mocks.mockReleaseLease).toHaveBeenCalledTimes(1)
  })

  it('stops the crawl and fails with target_locked when the lease is lost', async () => {
    vi.spyOn(ledger, 'touchLastCrawled').mockImplementationOnce(async () => {
      leaseLoss.abort()
    })

    const error = await processCrawlJob(createJob(), context).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CrawlJobError)
    expect(error).toMatchObject({ genre: 'target_locked', delayMs: 300_000 })
    expect(ledger.workerErrors).toEqual([
      { workerId: 'worker-1', genre: 'target_locked', targetId: 't-1', message: 'Target lock lost during crawl' },
    ])
    expect(ledger.item('t-1', '103')?.heavyWrites ?? 0).toBe(0)
    expect(mocks.mockReleaseLease).toHaveBeenCalledTimes(1)
  })

  it('completes the job when the target no longer exists', async () => {
    session = createSiteSession([], { missing: true })

    const result = await processCrawlJob(createJob(), context)

    expect(result).toMatchObject({ state: 'FAILED', failureKind: 'TargetNotFound' })
    expect(ledger.workerErrors).toEqual([])
  })

  it('fails with target_locked and a delayed retry when the lock is held', async () => {
    mocks.mockAcquireLease.mockResolvedValue(null)

    const error = await processCrawlJob(createJob(), context).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CrawlJobError)
    expect(error).toMatchObject({ genre: 'target_locked', delayMs: 300_000 })
    expect(ledger.workerErrors).toEqual([
      { workerId: 'worker-1', genre: 'target_locked', targetId: 't-1', message: 'Target is locked by another job' },
    ])
    expect(sessions.acquired).toEqual([])
  })

  it('records a lost session, resets the browser and retries', async () => {
    session.lost = true

    const error = await processCrawlJob(createJob(), context).catch((e: unknown) => e)

    expect(error).toMatchObject({ genre: 'session_lost', delayMs: 300_000 })
    expect(sessions.closed).toBe(true)
    expect(ledger.workerErrors[0]).toMatchObject({ genre: 'session_lost', targetId: 't-1' })
    expect(mocks.mockReleaseLease).toHaveBeenCalledTimes(1)
  })

  it('gives up once the retry budget is spent', async () => {
    session.lost = true

    const error = await processCrawlJob(createJob(jobData, 3), context).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(workerMocks.UnrecoverableErrorMock)
    expect(error).toMatchObject({ message: '[session_lost] Browser has been closed' })
  })

  it('retries an unexpected error once, immediately', async () => {
    vi.spyOn(ledger, 'getTarget').mockRejectedValue(new Error('connection reset'))

    const first = await processCrawlJob(createJob(), context).catch((e: unknown) => e)
    const second = await processCrawlJob(createJob(jobData, 1), context).catch((e: unknown) => e)

    expect(first).toMatchObject({ genre: 'unknown', delayMs: 0 })
    expect(second).toBeInstanceOf(workerMocks.UnrecoverableErrorMock)
  })

  it('rejects jobs for another worker without retrying', async () => {
    const error = await processCrawlJob(createJob({ ...jobData, workerId: 'worker-2' }), context).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(workerMocks.UnrecoverableErrorMock)
    expect(mocks.mockAcquireLease).not.toHaveBeenCalled()
  })

  it('rejects malformed job data without retrying', async () => {
    const error = await processCrawlJob(createJob({ targetId: '' }), context).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(workerMocks.UnrecoverableErrorMock)
  })
})

describe('startCrawlWorker', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('listens on the worker queue with one job at a time', () => {
    const ledger = new MemoryLedger()
    startCrawlWorker({
      workerId: 'worker-1',
      ledger,
      writer: new DualSinkWriter(ledger, new DisabledEventPublisher()),
      strategy: new VideoGridStrategy({ origin: ORIGIN, commentLimit: 5, utcOffsetMinutes: 0, maxScrolls: 5 }),
      sessions: new FakeSessionProvider(() => new FakeSession(new Map())),
      settings,
    })

    expect(workerMocks.state.processor).not.toBeNull()
    expect(workerMocks.state.options).toMatchObject({ concurrency: 1 })
  })
})
