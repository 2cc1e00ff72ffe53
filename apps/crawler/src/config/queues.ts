import { Queue } from 'bullmq'
import { z } from 'zod'
import { redisConnection } from '@tidemark/redis'

// One queue per worker identity, so a job always lands on the machine holding that login.
export const CRAWL_QUEUE_PREFIX = 'crawl-target'

export function crawlQueueName(workerId: string): string {
  return `${CRAWL_QUEUE_PREFIX}-${workerId}`
}

export const CrawlJobDataSchema = z.object({
  targetId: z.string().min(1),
  workerId: z.string().regex(/^[A-Za-z0-9_-]+$/),
  runId: z.string().min(1),
  mode: z.enum(['light', 'full']),
  maxItems: z.number().int().positive(),
})

export type CrawlJobData = z.infer<typeof CrawlJobDataSchema>

export const CRAWL_JOB_NAME = 'crawl-target'

// Job ids may not contain ':' in BullMQ.
export function crawlJobId(targetId: string, runId: string): string {
  return `crawl-${targetId}-${runId}`
}

const crawlQueues = new Map<string, Queue<CrawlJobData>>()

export function getCrawlQueue(workerId: string): Queue<CrawlJobData> {
  let queue = crawlQueues.get(workerId)
  if (!queue) {
    queue = new Queue<CrawlJobData>(crawlQueueName(workerId), { connection: redisConnection })
    crawlQueues.set(workerId, queue)
  }
  return queue
}

/**
 * Add one target to its worker's queue. The same (target, run) pair is
 * only queued once; attempts bound BullMQ's redelivery, the worker decides
 * per failure whether to use them.
 */
export async function enqueueCrawlTarget(data: CrawlJobData, maxRetries: number): Promise<string> {
  const job = CrawlJobDataSchema.parse(data)
  const jobId = crawlJobId(job.targetId, job.runId)

  await getCrawlQueue(job.workerId).add(CRAWL_JOB_NAME, job, {
    jobId,
    attempts: Math.max(1, maxRetries + 1),
    backoff: { type: 'genre' },
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  })
  return jobId
}

export async function closeCrawlQueues(): Promise<void> {
  await Promise.all([...crawlQueues.values()].map((queue) => queue.close()))
  crawlQueues.clear()
}
