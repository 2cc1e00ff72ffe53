/**
 * Strategy Registration
 *
 * Strategies are explicitly registered here - no auto-discovery.
 */

import type { CrawlerSettings } from '../../config/settings.js'
import { StrategyRegistry } from './registry.js'
import { VideoGridStrategy } from './video-grid/index.js'

export const DEFAULT_STRATEGY_ID = 'video-grid'

/**
 * Registry with every bundled strategy, configured from settings.
 */
export function createStrategyRegistry(
  settings: Pick<CrawlerSettings, 'siteOrigin' | 'commentLimit' | 'utcOffsetMinutes' | 'maxScrolls'>
): StrategyRegistry {
  const registry = new StrategyRegistry()

  registry.register(
    new VideoGridStrategy({
      origin: settings.siteOrigin,
      commentLimit: settings.commentLimit,
      utcOffsetMinutes: settings.utcOffsetMinutes,
      maxScrolls: settings.maxScrolls,
    })
  )

  return registry
}

export { StrategyRegistry } from './registry.js'
export { VideoGridStrategy } from './video-grid/index.js'
