/**
 * Core crawl domain types.
 */

export type CrawlMode = 'light' | 'full'

/** A crawled account. Created by discovery, only updated here. */
export interface CrawlTarget {
  targetId: string
  handle: string
  workerId: string | null
  displayName: string | null
  isNew: boolean
  isAlive: boolean
  crawlPriority: number
  lastCrawled: Date | null
}

export interface CommentSnapshot {
  author: string
  text: string
  likeCount?: number
}

interface RecordBase {
  targetId: string
  itemId: string
  canonicalUrl: string
  /** Extraction strategy version, stored as crawling_algorithm. */
  algorithm: string
  crawledAt: Date
}

/** Fields readable from the listing without opening the item. */
export interface LightRecord extends RecordBase {
  kind: 'light'
  /** Position on the listing when collected, used for indexed-click navigation. */
  listingIndex?: number
  thumbnailUrl?: string
  thumbnailAlt?: string
  countText?: string
  count?: number
}

/** Fields only readable on the item's own detail view. */
export interface HeavyRecord extends RecordBase {
  kind: 'heavy'
  title?: string
  postedAt?: Date
  postedAtText?: string
  audioTitle?: string
  audioAuthor?: string
  audioText?: string
  likeText?: string
  likeCount?: number
  comments?: CommentSnapshot[]
}

export type ItemRecord = LightRecord | HeavyRecord

/** What the ledger returns for an item still waiting on heavy data. */
export interface ItemRef {
  targetId: string
  itemId: string
  canonicalUrl: string
  listingIndex: number | null
}

export interface TargetProfile {
  displayName?: string
  followerText?: string
  followerCount?: number
}

export interface ParseDiagnostic {
  field: string
  text: string
  reason: string
}

/** A record plus whatever could not be parsed on the way to it. */
export interface Extraction<T> {
  record: T
  diagnostics: ParseDiagnostic[]
}

export type CrawlState =
  | 'NAVIGATING'
  | 'LIGHT_SYNC'
  | 'HEAVY_DECISION'
  | 'HEAVY_SWEEP'
  | 'RECONCILE'
  | 'DONE'
  | 'FAILED'

/**
 * Decided once at HEAVY_DECISION and consumed by HEAVY_SWEEP.
 */
export type HeavyPlan =
  | { kind: 'full-sweep' }
  | { kind: 'targeted'; candidates: ItemRef[] }
  | { kind: 'skip'; reason: 'light-mode' }
