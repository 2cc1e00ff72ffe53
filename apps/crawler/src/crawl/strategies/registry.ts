/**
 * Strategy Registry
 *
 * Strategies must be explicitly registered; no auto-discovery.
 */

import type { ExtractionStrategy } from '../strategy.js'

export class StrategyRegistry {
  private readonly strategies = new Map<string, ExtractionStrategy>()

  /**
   * @throws Error if a strategy with the same id is already registered
   */
  register(strategy: ExtractionStrategy): void {
    if (this.strategies.has(strategy.id)) {
      throw new Error(`Strategy with ID '${strategy.id}' is already registered`)
    }
    this.strategies.set(strategy.id, strategy)
  }

  get(strategyId: string): ExtractionStrategy | undefined {
    return this.strategies.get(strategyId)
  }

  /**
   * Like get, but a missing id is a configuration error.
   */
  require(strategyId: string): ExtractionStrategy {
    const strategy = this.strategies.get(strategyId)
    if (!strategy) {
      throw new Error(`Strategy '${strategyId}' is not registered (known: ${this.list().join(', ') || 'none'})`)
    }
    return strategy
  }

  list(): string[] {
    return Array.from(this.strategies.keys())
  }

  size(): number {
    return this.strategies.size
  }
}
