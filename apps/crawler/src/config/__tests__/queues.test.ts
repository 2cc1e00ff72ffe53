import { describe, it, expect, vi, beforeEach } from 'vitest'

const { QueueMock, addMock, closeMock } = vi.hoisted(() => {
  const addMock = vi.fn().mockResolvedValue({ id: '1' })
  const closeMock = vi.fn().mockResolvedValue(undefined)
  const QueueMock = vi.fn().mockImplementation(() => ({ add: addMock, close: closeMock }))
  return { QueueMock, addMock, closeMock }
})

vi.mock('bullmq', () => ({ Queue: QueueMock }))

import { closeCrawlQueues, crawlQueueName, enqueueCrawlTarget, type CrawlJobData } from '../queues.js'

const data: CrawlJobData = { targetId: 't-1', workerId: 'worker-1', runId: 'run1', mode: 'full', maxItems: 100 }

describe('enqueueCrawlTarget', () => {
  beforeEach(async () => {
    await closeCrawlQueues()
    vi.clearAllMocks()
  })

  it('queues on the worker queue with a per-run job id', async () => {
    const jobId = await enqueueCrawlTarget(data, 3)

    expect(jobId).toBe('crawl-t-1-run1')
    expect(QueueMock).toHaveBeenCalledWith('crawl-target-worker-1', expect.objectContaining({ connection: expect.any(Object) }))
    expect(addMock).toHaveBeenCalledWith(
      'crawl-target',
      data,
      expect.objectContaining({ jobId: 'crawl-t-1-run1', attempts: 4, backoff: { type: 'genre' } })
    )
  })

  it('always allows one attempt', async () => {
    await enqueueCrawlTarget(data, 0)

    expect(addMock).toHaveBeenCalledWith('crawl-target', data, expect.objectContaining({ attempts: 1 }))
  })

  it('reuses one queue per worker', async () => {
    await enqueueCrawlTarget(data, 3)
    await enqueueCrawlTarget({ ...data, targetId: 't-2' }, 3)
    await enqueueCrawlTarget({ ...data, workerId: 'worker-2' }, 3)

    expect(QueueMock).toHaveBeenCalledTimes(2)
  })

  it('rejects a worker id that cannot name a queue', async () => {
    await expect(enqueueCrawlTarget({ ...data, workerId: 'worker:1' }, 3)).rejects.toThrow()
    expect(addMock).not.toHaveBeenCalled()
  })

  it('closes every queue it opened', async () => {
    await enqueueCrawlTarget(data, 3)
    await enqueueCrawlTarget({ ...data, workerId: 'worker-2' }, 3)

    await closeCrawlQueues()

    expect(closeMock).toHaveBeenCalledTimes(2)
    expect(crawlQueueName('worker-2')).toBe('crawl-target-worker-2')
  })
})
