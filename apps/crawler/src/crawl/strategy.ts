/**
 * Extraction Strategy
 *
 * A strategy knows one site's page structure. The orchestrator only drives
 * navigation order and never reads pages itself.
 */

import type { NavResult, RenderingSession } from '../render/session.js'
import type {
  CrawlTarget,
  Extraction,
  HeavyRecord,
  ItemRef,
  LightRecord,
  TargetProfile,
} from './types.js'

export interface CollectLimits {
  /** Stop after this many distinct items. */
  maxItems: number
  /** Stop after this many scroll steps without reaching maxItems. */
  maxScrolls: number
}

/**
 * indexed-click: open the Nth listing card and close it again.
 * direct-url: navigate to each item's own URL.
 */
export type DetailNavigation = 'indexed-click' | 'direct-url'

export interface ExtractionStrategy {
  readonly id: string
  /** Stored on every record as crawling_algorithm. */
  readonly algorithm: string
  readonly navigation: DetailNavigation

  listingUrl(target: CrawlTarget): string
  detailUrl(item: ItemRef): string

  /** True when the loaded listing is the site's "account not found" page. */
  isTargetMissing(session: RenderingSession): Promise<boolean>

  /** Display name and follower count from the loaded listing. */
  collectProfile(session: RenderingSession, target: CrawlTarget): Promise<Extraction<TargetProfile>>

  /**
   * Light records from the loaded listing, scrolling as needed.
   * Never yields one canonical URL twice per call; calling again after a fresh navigation starts over.
   */
  collectLight(
    session: RenderingSession,
    target: CrawlTarget,
    limits: CollectLimits,
    now: Date
  ): AsyncIterable<Extraction<LightRecord>>

  /** Heavy record from an open detail view. */
  collectHeavy(session: RenderingSession, item: ItemRef, now: Date): Promise<Extraction<HeavyRecord>>

  openDetailByIndex(session: RenderingSession, index: number): Promise<NavResult>
  returnToListing(session: RenderingSession): Promise<NavResult>

  /** Login check for login-only runs: is the session signed in? */
  verifySession(session: RenderingSession): Promise<boolean>
}
