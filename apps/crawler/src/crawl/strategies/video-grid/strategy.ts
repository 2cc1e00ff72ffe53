/**
 * Video grid strategy
 *
 * Light pass: one record per grid card (link, thumbnail, view count).
 * Heavy pass: title, posted-at, audio, likes and the first comments of the detail overlay.
 */

import type { CollectLimits, ExtractionStrategy } from '../../strategy.js'
import type { NavResult, RenderingSession } from '../../../render/session.js'
import { navFailed } from '../../../render/session.js'
import { CrawlError } from '../../errors.js'
import { parseAudioInfo, parseCount, parseItemUrl, parsePostedAt } from '../../parse/index.js'
import type {
  CommentSnapshot,
  CrawlTarget,
  Extraction,
  HeavyRecord,
  ItemRef,
  LightRecord,
  ParseDiagnostic,
  TargetProfile,
} from '../../types.js'
import { MISSING_ACCOUNT_TEXT, SELECTORS } from './selectors.js'

export const VIDEO_GRID_ALGORITHM = 'video-grid/1'

export interface VideoGridOptions {
  /** Site origin the listing and detail URLs resolve against. */
  origin: string
  commentLimit: number
  utcOffsetMinutes: number
  /** Scroll steps allowed when a card to click is not loaded yet. */
  maxScrolls: number
  /** Scrolls per step while waiting for more cards. */
  scrollsPerStep?: number
}

export class VideoGridStrategy implements ExtractionStrategy {
  readonly id = 'video-grid'
  readonly algorithm = VIDEO_GRID_ALGORITHM
  readonly navigation = 'indexed-click' as const

  constructor(private readonly options: VideoGridOptions) {}

  listingUrl(target: CrawlTarget): string {
    return new URL(`/@${encodeURIComponent(target.handle)}`, this.options.origin).toString()
  }

  detailUrl(item: ItemRef): string {
    return item.canonicalUrl
  }

  async isTargetMissing(session: RenderingSession): Promise<boolean> {
    if ((await session.countMatches(SELECTORS.userPage)) > 0) {
      return false
    }
    const errorTitle = await session.extractField({ selector: SELECTORS.errorTitle })
    return errorTitle !== undefined && MISSING_ACCOUNT_TEXT.some((text) => errorTitle.includes(text))
  }

  async collectProfile(session: RenderingSession, _target: CrawlTarget): Promise<Extraction<TargetProfile>> {
    const diagnostics: ParseDiagnostic[] = []
    const profile: TargetProfile = {}

    const displayName = (await session.extractField({ selector: SELECTORS.displayName }))?.trim()
    if (displayName) {
      profile.displayName = displayName
    }

    const followerText = (await session.extractField({ selector: SELECTORS.followerCount }))?.trim()
    if (followerText) {
      profile.followerText = followerText
      const followers = parseCount(followerText)
      if (followers.ok) {
        profile.followerCount = followers.value
      } else {
        diagnostics.push({ field: 'followerCount', text: followerText, reason: followers.diagnostic })
      }
    }

    return { record: profile, diagnostics }
  }

  async *collectLight(
    session: RenderingSession,
    target: CrawlTarget,
    limits: CollectLimits,
    now: Date
  ): AsyncGenerator<Extraction<LightRecord>> {
    const seen = new Set<string>()
    const scrollsPerStep = this.options.scrollsPerStep ?? 3
    let index = 0
    let scrolls = 0

    while (seen.size < limits.maxItems) {
      const loaded = await session.countMatches(SELECTORS.card)

      for (; index < loaded && seen.size < limits.maxItems; index++) {
        const extraction = await this.readCard(session, target, index, now)
        if (!extraction || seen.has(extraction.record.canonicalUrl)) continue
        seen.add(extraction.record.canonicalUrl)
        yield extraction
      }

      if (seen.size >= limits.maxItems || scrolls >= limits.maxScrolls) break

      await session.scrollUntil(
        async () => (await session.countMatches(SELECTORS.card)) > loaded,
        scrollsPerStep
      )
      scrolls++

      if ((await session.countMatches(SELECTORS.card)) <= loaded) break
    }
  }

  async collectHeavy(session: RenderingSession, item: ItemRef, now: Date): Promise<Extraction<HeavyRecord>> {
    const diagnostics: ParseDiagnostic[] = []
    const record: HeavyRecord = {
      kind: 'heavy',
      targetId: item.targetId,
      itemId: item.itemId,
      canonicalUrl: item.canonicalUrl,
      algorithm: this.algorithm,
      crawledAt: now,
    }

    const title = (await session.extractField({ selector: SELECTORS.title }))?.trim()
    if (title) record.title = title

    const postedAtText = (await session.extractField({ selector: SELECTORS.postedAt }))?.trim()
    if (postedAtText) {
      record.postedAtText = postedAtText
      const postedAt = parsePostedAt(postedAtText, now, this.options.utcOffsetMinutes)
      if (postedAt.ok) {
        record.postedAt = postedAt.value
      } else {
        diagnostics.push({ field: 'postedAt', text: postedAtText, reason: postedAt.diagnostic })
      }
    }

    const audioText = (await session.extractField({ selector: SELECTORS.audio }))?.trim()
    if (audioText) {
      record.audioText = audioText
      const audio = parseAudioInfo(audioText)
      if (audio.ok) {
        record.audioTitle = audio.value.title
        if (audio.value.author) record.audioAuthor = audio.value.author
      } else {
        diagnostics.push({ field: 'audio', text: audioText, reason: audio.diagnostic })
      }
    }

    const likeText = (await session.extractField({ selector: SELECTORS.likeCount }))?.trim()
    if (likeText) {
      record.likeText = likeText
      const likes = parseCount(likeText)
      if (likes.ok) {
        record.likeCount = likes.value
      } else {
        diagnostics.push({ field: 'likeCount', text: likeText, reason: likes.diagnostic })
      }
    }

    record.comments = await this.readComments(session, diagnostics)

    return { record, diagnostics }
  }

  async openDetailByIndex(session: RenderingSession, index: number): Promise<NavResult> {
    if ((await session.countMatches(SELECTORS.card)) <= index) {
      await session.scrollUntil(
        async () => (await session.countMatches(SELECTORS.card)) > index,
        this.options.maxScrolls
      )
      if ((await session.countMatches(SELECTORS.card)) <= index) {
        return navFailed('failure', `Card ${index} is not loaded`)
      }
    }
    return session.click({ selector: SELECTORS.card, index })
  }

  returnToListing(session: RenderingSession): Promise<NavResult> {
    return session.click({ selector: SELECTORS.close })
  }

  async verifySession(session: RenderingSession): Promise<boolean> {
    const result = await session.navigate(this.options.origin)
    if (!result.ok) {
      if (result.error.kind === 'session-lost') {
        throw new CrawlError('SessionLost', result.error.message)
      }
      return false
    }
    return (await session.countMatches(SELECTORS.profileIcon)) > 0
  }

  private async readCard(
    session: RenderingSession,
    target: CrawlTarget,
    index: number,
    now: Date
  ): Promise<Extraction<LightRecord> | null> {
    const card = { selector: SELECTORS.card, index }

    const href = await session.extractField({ within: card, selector: SELECTORS.cardLink, attribute: 'href' })
    if (!href) return null

    const itemUrl = parseItemUrl(href, this.options.origin)
    if (!itemUrl.ok) return null

    const diagnostics: ParseDiagnostic[] = []
    const record: LightRecord = {
      kind: 'light',
      targetId: target.targetId,
      itemId: itemUrl.value.itemId,
      canonicalUrl: itemUrl.value.canonicalUrl,
      listingIndex: index,
      algorithm: this.algorithm,
      crawledAt: now,
    }

    const thumbnailUrl = await session.extractField({ within: card, selector: SELECTORS.cardThumbnail, attribute: 'src' })
    if (thumbnailUrl) record.thumbnailUrl = thumbnailUrl

    const thumbnailAlt = await session.extractField({ within: card, selector: SELECTORS.cardThumbnail, attribute: 'alt' })
    if (thumbnailAlt) record.thumbnailAlt = thumbnailAlt

    const countText = (await session.extractField({ within: card, selector: SELECTORS.cardViews }))?.trim()
    if (countText) {
      record.countText = countText
      const count = parseCount(countText)
      if (count.ok) {
        record.count = count.value
      } else {
        diagnostics.push({ field: 'count', text: countText, reason: count.diagnostic })
      }
    }

    return { record, diagnostics }
  }

  private async readComments(session: RenderingSession, diagnostics: ParseDiagnostic[]): Promise<CommentSnapshot[]> {
    const total = Math.min(await session.countMatches(SELECTORS.comment), this.options.commentLimit)
    const comments: CommentSnapshot[] = []

    for (let index = 0; index < total; index++) {
      const within = { selector: SELECTORS.comment, index }
      const author = (await session.extractField({ within, selector: SELECTORS.commentAuthor }))?.trim()
      const text = (await session.extractField({ within, selector: SELECTORS.commentText }))?.trim()
      if (!author || !text) continue

      const comment: CommentSnapshot = { author, text }
      const likesText = (await session.extractField({ within, selector: SELECTORS.commentLikes }))?.trim()
      if (likesText) {
        const likes = parseCount(likesText)
        if (likes.ok) {
          comment.likeCount = likes.value
        } else {
          diagnostics.push({ field: `comments[${index}].likeCount`, text: likesText, reason: likes.diagnostic })
        }
      }
      comments.push(comment)
    }

    return comments
  }
}
