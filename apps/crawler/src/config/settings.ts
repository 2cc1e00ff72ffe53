/**
 * Crawler settings, validated once from the environment.
 */

import { z } from 'zod'

// Blank values in .env files mean "unset".
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankAsUndefined, z.string().optional())

const intWithDefault = (fallback: number, min = 0) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback))

const queueSegment = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "_" and "-"')

export const SettingsSchema = z.object({
  DATABASE_URL: optionalString,

  CRAWL_SITE_ORIGIN: z.preprocess(blankAsUndefined, z.string().url().default('https://www.tiktok.com')),
  CRAWL_BATCH_SIZE: intWithDefault(100, 1),
  CRAWL_MAX_SCROLLS: intWithDefault(10),
  CRAWL_ITEM_TIMEOUT_MS: intWithDefault(30_000),
  CRAWL_TARGET_TIMEOUT_MS: intWithDefault(0),
  CRAWL_RUN_MINUTES: intWithDefault(60),
  CRAWL_COMMENT_LIMIT: intWithDefault(20),
  CRAWL_UTC_OFFSET_MINUTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(-720).max(840).default(0)
  ),
  CRAWL_SCHEDULE_CRON: z.preprocess(blankAsUndefined, z.string().default('0 */6 * * *')),

  EVENT_PROJECT: z.preprocess(blankAsUndefined, queueSegment.optional()),
  ITEM_SYNC_QUEUE: z.preprocess(blankAsUndefined, queueSegment.optional()),

  FANOUT_MAX_RETRIES: intWithDefault(3),
  FANOUT_BLOCK_RETRY_DELAY_MS: intWithDefault(300_000),

  BROWSER_WS_ENDPOINT: optionalString,
  CHROME_EXECUTABLE_PATH: optionalString,
  CHROME_USER_DATA_DIR: optionalString,
})

export interface CrawlerSettings {
  databaseUrl: string | undefined
  siteOrigin: string
  batchSize: number
  maxScrolls: number
  itemTimeoutMs: number
  targetTimeoutMs: number
  runMinutes: number
  commentLimit: number
  utcOffsetMinutes: number
  scheduleCron: string
  eventProject: string | undefined
  itemSyncQueue: string | undefined
  fanoutMaxRetries: number
  blockRetryDelayMs: number
  browserWsEndpoint: string | undefined
  chromeExecutablePath: string | undefined
  chromeUserDataDir: string | undefined
}

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid crawler configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'SettingsError'
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<CrawlerSettings> {
  const parsed = SettingsSchema.safeParse(env)
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const s = parsed.data
  return Object.freeze({
    databaseUrl: s.DATABASE_URL,
    siteOrigin: s.CRAWL_SITE_ORIGIN,
    batchSize: s.CRAWL_BATCH_SIZE,
    maxScrolls: s.CRAWL_MAX_SCROLLS,
    itemTimeoutMs: s.CRAWL_ITEM_TIMEOUT_MS,
    targetTimeoutMs: s.CRAWL_TARGET_TIMEOUT_MS,
    runMinutes: s.CRAWL_RUN_MINUTES,
    commentLimit: s.CRAWL_COMMENT_LIMIT,
    utcOffsetMinutes: s.CRAWL_UTC_OFFSET_MINUTES,
    scheduleCron: s.CRAWL_SCHEDULE_CRON,
    eventProject: s.EVENT_PROJECT,
    itemSyncQueue: s.ITEM_SYNC_QUEUE,
    fanoutMaxRetries: s.FANOUT_MAX_RETRIES,
    blockRetryDelayMs: s.FANOUT_BLOCK_RETRY_DELAY_MS,
    browserWsEndpoint: s.BROWSER_WS_ENDPOINT,
    chromeExecutablePath: s.CHROME_EXECUTABLE_PATH,
    chromeUserDataDir: s.CHROME_USER_DATA_DIR,
  })
}

let cached: Readonly<CrawlerSettings> | null = null

export function getSettings(): Readonly<CrawlerSettings> {
  if (!cached) {
    cached = loadSettings()
  }
  return cached
}
