/**
 * Detail navigation for the heavy sweep.
 *
 * Starts in the strategy's preferred mode. Indexed clicks need the listing
 * loaded behind the detail view; as soon as the sweep has to leave the
 * listing (no index, wrong item opened, close failed) it switches to
 * direct URLs for the rest of the target.
 */

import type { ILogger } from '@tidemark/logger'
import { navFailed, type NavError, type NavResult, type RenderingSession } from '../render/session.js'
import type { SessionSteps } from '../utils/timeout.js'
import { CrawlError } from './errors.js'
import { parseItemUrl } from './parse/index.js'
import type { DetailNavigation, ExtractionStrategy } from './strategy.js'
import type { ItemRef } from './types.js'

export type DetailOpen = { ok: true; via: DetailNavigation } | { ok: false; error: NavError }

export interface DetailNavigatorOptions {
  steps: SessionSteps
}

export class DetailNavigator {
  private current: DetailNavigation

  constructor(
    private readonly session: RenderingSession,
    private readonly strategy: ExtractionStrategy,
    private readonly log: ILogger,
    private readonly options: DetailNavigatorOptions
  ) {
    this.current = strategy.navigation
  }

  get mode(): DetailNavigation {
    return this.current
  }

  async open(item: ItemRef): Promise<DetailOpen> {
    const listingIndex = item.listingIndex
    if (this.current === 'indexed-click' && listingIndex !== null) {
      const clicked = await this.step('open card', () => this.strategy.openDetailByIndex(this.session, listingIndex))
      if (clicked.ok) {
        const opened = parseItemUrl(this.session.currentUrl())
        if (opened.ok && opened.value.itemId === item.itemId) {
          return { ok: true, via: 'indexed-click' }
        }
        this.log.warn('Listing order changed, opened the wrong item', {
          itemId: item.itemId,
          listingIndex: item.listingIndex,
          openedUrl: this.session.currentUrl(),
        })
      } else if (clicked.error.kind === 'session-lost') {
        return clicked
      } else {
        this.log.warn('Card click failed', { itemId: item.itemId, reason: clicked.error.message })
      }
    }

    this.switchToDirect(item.listingIndex === null ? 'item has no listing index' : 'indexed open failed')
    const navigated = await this.step('open item', () => this.session.navigate(this.strategy.detailUrl(item)))
    return navigated.ok ? { ok: true, via: 'direct-url' } : { ok: false, error: navigated.error }
  }

  /**
   * Close an indexed detail view. A failed close switches to direct URLs;
   * a lost session ends the run.
   */
  async finish(opened: DetailOpen, item: ItemRef): Promise<void> {
    if (!opened.ok || opened.via !== 'indexed-click') return

    const closed = await this.step('return to listing', () => this.strategy.returnToListing(this.session))
    if (closed.ok) return

    if (closed.error.kind === 'session-lost') {
      throw new CrawlError('SessionLost', closed.error.message, { targetId: item.targetId, itemId: item.itemId })
    }
    this.log.warn('Return to listing failed', { itemId: item.itemId, reason: closed.error.message })
    this.switchToDirect('return to listing failed')
  }

  private switchToDirect(reason: string): void {
    if (this.current === 'direct-url') return
    this.current = 'direct-url'
    this.log.info('Switched to direct-url navigation', { reason })
  }

  // Timeouts surface as navigation failures so the caller sees one shape; the deadline still throws.
  private async step(label: string, work: () => Promise<NavResult>): Promise<NavResult> {
    try {
      return await this.options.steps.run(label, work)
    } catch (error) {
      if (error instanceof CrawlError && error.kind === 'NavigationTimeout') {
        return navFailed('timeout', error.message)
      }
      throw error
    }
  }
}
