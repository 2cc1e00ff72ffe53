/**
 * Crawl Orchestrator
 *
 * Drives one target through
 *   NAVIGATING -> LIGHT_SYNC -> HEAVY_DECISION -> HEAVY_SWEEP -> RECONCILE -> DONE
 * with FAILED reachable from every state. Progress lives in the ledger, so a
 * later invocation picks up whatever this one did not finish.
 */

import type { ILogger } from '@tidemark/logger'
import { loggers } from '../config/logger.js'
import type { NavError, RenderingSession, SessionProvider } from '../render/session.js'
import { SessionSteps } from '../utils/timeout.js'
import { DetailNavigator } from './detail-navigator.js'
import { classifyCrawlError, CrawlError, type ClassifiedCrawlError, type CrawlErrorKind } from './errors.js'
import type { ProgressLedger } from './ledger/types.js'
import { byIdentityDescending } from './parse/index.js'
import type { ExtractionStrategy } from './strategy.js'
import type {
  CrawlMode,
  CrawlState,
  CrawlTarget,
  Extraction,
  HeavyPlan,
  HeavyRecord,
  ItemRef,
  ParseDiagnostic,
  TargetProfile,
} from './types.js'
import type { RecordWriter } from './writer.js'

const log = loggers.orchestrator

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorDeps {
  ledger: ProgressLedger
  writer: RecordWriter
  strategy: ExtractionStrategy
  sessions: SessionProvider
}

export interface OrchestratorOptions {
  mode: CrawlMode
  /** Items per heavy batch; remaining work is re-read from the ledger between batches. */
  batchSize: number
  /** Listing items to collect in LIGHT_SYNC. */
  maxItems: number
  maxScrolls: number
  /** Bound on each navigation and each item's open + extract; 0 disables. */
  itemTimeoutMs: number
  utcOffsetMinutes: number
  now?: () => Date
}

export interface CrawlCallOptions {
  /** Aborting ends the target with DeadlineExceeded at the next step. */
  signal?: AbortSignal
}

export interface CrawlOutcome {
  targetId: string
  state: 'DONE' | 'FAILED'
  failure?: ClassifiedCrawlError
  plan?: HeavyPlan['kind']
  lightCommitted: number
  lightFailed: number
  heavyCommitted: number
  heavyFailed: number
  itemsGone: number
  batches: number
  /** True when this invocation cleared is_new. */
  swept: boolean
  transitions: CrawlState[]
}

type ItemResult = 'committed' | 'failed' | 'gone'

interface TargetRun {
  target: CrawlTarget
  session: RenderingSession
  steps: SessionSteps
  log: ILogger
  signal?: AbortSignal
  outcome: CrawlOutcome
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Follower counts are recorded against the previous local day.
 */
export function followerCollectionDate(now: Date, utcOffsetMinutes: number): string {
  const local = new Date(now.getTime() + utcOffsetMinutes * 60_000 - 86_400_000)
  return local.toISOString().slice(0, 10)
}

function navErrorToCrawlError(error: NavError, targetId: string, itemId?: string): CrawlError {
  const options = { targetId, itemId, status: error.status }
  switch (error.kind) {
    case 'not-found':
      return itemId
        ? new CrawlError('NavigationFailure', error.message, options)
        : new CrawlError('TargetNotFound', error.message, options)
    case 'timeout':
      return new CrawlError('NavigationTimeout', error.message, options)
    case 'session-lost':
      return new CrawlError('SessionLost', error.message, options)
    case 'failure':
      return new CrawlError('NavigationFailure', error.message, options)
  }
}

function logDiagnostics(runLog: ILogger, itemId: string | undefined, diagnostics: ParseDiagnostic[]): void {
  for (const diagnostic of diagnostics) {
    runLog.warn('Unparsed field', { itemId, ...diagnostic })
  }
}

// =============================================================================
// Orchestrator
// =============================================================================

export class CrawlOrchestrator {
  private readonly now: () => Date

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date())
  }

  async crawl(targetId: string, call: CrawlCallOptions = {}): Promise<CrawlOutcome> {
    const { ledger, sessions } = this.deps
    const outcome: CrawlOutcome = {
      targetId,
      state: 'DONE',
      lightCommitted: 0,
      lightFailed: 0,
      heavyCommitted: 0,
      heavyFailed: 0,
      itemsGone: 0,
      batches: 0,
      swept: false,
      transitions: ['NAVIGATING'],
    }
    const targetLog = log.child({ targetId })
    const started = Date.now()

    const target = await ledger.getTarget(targetId)
    if (!target || !target.isAlive) {
      targetLog.warn('Target missing or gone, skipping')
      return this.fail(outcome, new CrawlError('TargetNotFound', `Target ${targetId} is not crawlable`, { targetId }))
    }

    const lease = await sessions.acquire(targetId)
    const steps = new SessionSteps({ timeoutMs: this.options.itemTimeoutMs, signal: call.signal })
    const run: TargetRun = { target, session: lease.session, steps, log: targetLog, signal: call.signal, outcome }

    try {
      await this.navigateToListing(run)
      await ledger.touchLastCrawled(targetId, this.now())

      this.enter(run, 'LIGHT_SYNC')
      await this.syncProfile(run)
      await this.syncLight(run)

      this.enter(run, 'HEAVY_DECISION')
      const plan = await this.decide(run)
      outcome.plan = plan.kind
      targetLog.info('Heavy plan decided', {
        plan: plan.kind,
        candidates: plan.kind === 'targeted' ? plan.candidates.length : undefined,
      })

      this.enter(run, 'HEAVY_SWEEP')
      await this.sweep(run, plan)

      this.enter(run, 'RECONCILE')
      if (plan.kind === 'full-sweep' && outcome.heavyFailed === 0) {
        outcome.swept = await ledger.markSwept(targetId)
      }
      await ledger.touchLastCrawled(targetId, this.now())

      this.enter(run, 'DONE')
      targetLog.info('Target crawled', {
        lightCommitted: outcome.lightCommitted,
        heavyCommitted: outcome.heavyCommitted,
        heavyFailed: outcome.heavyFailed,
        itemsGone: outcome.itemsGone,
        swept: outcome.swept,
        durationMs: Date.now() - started,
      })
      return outcome
    } catch (error) {
      if (isCrawlErrorOfKind(error, 'TargetNotFound')) {
        await this.markTargetGone(run)
      }
      targetLog.error('Target failed', { state: outcome.transitions[outcome.transitions.length - 1] }, error)
      return this.fail(outcome, error)
    } finally {
      await lease.release()
    }
  }

  // ===========================================================================
  // NAVIGATING
  // ===========================================================================

  private async navigateToListing(run: TargetRun): Promise<void> {
    const { strategy } = this.deps
    const { target, session } = run
    const url = strategy.listingUrl(target)

    const result = await run.steps.run('listing navigation', () => session.navigate(url))
    if (!result.ok) {
      throw navErrorToCrawlError(result.error, target.targetId)
    }
    if (await strategy.isTargetMissing(session)) {
      throw new CrawlError('TargetNotFound', `Account ${target.handle} no longer exists`, { targetId: target.targetId })
    }
    run.log.debug('Listing loaded', { url })
  }

  // ===========================================================================
  // LIGHT_SYNC
  // ===========================================================================

  /**
   * Display name and follower snapshot. Each write is independent and none
   * of them can fail the target; only a lost session propagates.
   */
  private async syncProfile(run: TargetRun): Promise<void> {
    const { ledger, strategy } = this.deps
    const { target, session } = run

    let profile: TargetProfile
    try {
      const extraction = await strategy.collectProfile(session, target)
      logDiagnostics(run.log, undefined, extraction.diagnostics)
      profile = extraction.record
    } catch (error) {
      this.rethrowIfWider(error)
      run.log.warn('Profile collection failed', {}, error)
      return
    }

    if (profile.displayName) {
      try {
        await ledger.saveDisplayName(target.targetId, profile.displayName)
      } catch (error) {
        run.log.warn('Display name not saved', {}, error)
      }
    }

    if (profile.followerText) {
      try {
        await ledger.recordFollowerSnapshot({
          targetId: target.targetId,
          collectionDate: followerCollectionDate(this.now(), this.options.utcOffsetMinutes),
          followerText: profile.followerText,
          followerCount: profile.followerCount,
        })
      } catch (error) {
        run.log.warn('Follower snapshot not saved', {}, error)
      }
    }
  }

  private async syncLight(run: TargetRun): Promise<void> {
    const { strategy, writer } = this.deps
    const limits = { maxItems: this.options.maxItems, maxScrolls: this.options.maxScrolls }

    for await (const { record, diagnostics } of strategy.collectLight(run.session, run.target, limits, this.now())) {
      this.checkDeadline(run)
      logDiagnostics(run.log, record.itemId, diagnostics)
      try {
        await writer.commit(record)
        run.outcome.lightCommitted++
      } catch (error) {
        this.rethrowIfWider(error)
        run.outcome.lightFailed++
        run.log.warn('Light record not committed', { itemId: record.itemId }, error)
      }
    }

    run.log.info('Light sync complete', {
      committed: run.outcome.lightCommitted,
      failed: run.outcome.lightFailed,
    })
  }

  // ===========================================================================
  // HEAVY_DECISION / HEAVY_SWEEP
  // ===========================================================================

  private async decide(run: TargetRun): Promise<HeavyPlan> {
    if (this.options.mode === 'light') {
      return { kind: 'skip', reason: 'light-mode' }
    }
    if (run.target.isNew) {
      return { kind: 'full-sweep' }
    }
    const candidates = await this.deps.ledger.itemsNeedingUpdate(run.target.targetId)
    return { kind: 'targeted', candidates: byIdentityDescending(candidates) }
  }

  /**
   * Each batch is re-read from the ledger, so work committed by an earlier
   * (possibly crashed) invocation is never repeated. Items already attempted
   * in this invocation are not retried here.
   */
  private async sweep(run: TargetRun, plan: HeavyPlan): Promise<void> {
    if (plan.kind === 'skip') return

    const { ledger, strategy } = this.deps
    const { target, outcome } = run
    const allowed = plan.kind === 'targeted' ? new Set(plan.candidates.map((item) => item.itemId)) : null
    const attempted = new Set<string>()
    const navigator = new DetailNavigator(run.session, strategy, run.log.child('sweep'), { steps: run.steps })

    for (;;) {
      this.checkDeadline(run)
      const pending = (await ledger.itemsNeedingUpdate(target.targetId)).filter(
        (item) => !attempted.has(item.itemId) && (allowed === null || allowed.has(item.itemId))
      )
      if (pending.length === 0) break

      const batch = byIdentityDescending(pending).slice(0, this.options.batchSize)
      outcome.batches++

      for (const item of batch) {
        this.checkDeadline(run)
        attempted.add(item.itemId)
        const result = await this.processItem(run, navigator, item)
        if (result === 'committed') outcome.heavyCommitted++
        else if (result === 'failed') outcome.heavyFailed++
        else outcome.itemsGone++
      }

      run.log.info('Heavy batch complete', {
        batch: outcome.batches,
        size: batch.length,
        remaining: pending.length - batch.length,
        navigation: navigator.mode,
      })
    }
  }

  private async processItem(run: TargetRun, navigator: DetailNavigator, item: ItemRef): Promise<ItemResult> {
    const { ledger, strategy, writer } = this.deps
    const { session, target } = run

    try {
      const opened = await navigator.open(item)
      if (!opened.ok) {
        if (opened.error.kind === 'not-found') {
          await ledger.markItemGone(target.targetId, item.itemId)
          run.log.info('Item gone', { itemId: item.itemId })
          return 'gone'
        }
        throw navErrorToCrawlError(opened.error, target.targetId, item.itemId)
      }

      let extraction: Extraction<HeavyRecord>
      try {
        extraction = await run.steps.run(`extract item ${item.itemId}`, () =>
          strategy.collectHeavy(session, item, this.now())
        )
      } finally {
        await navigator.finish(opened, item)
      }

      logDiagnostics(run.log, item.itemId, extraction.diagnostics)
      await writer.commit(extraction.record)
      return 'committed'
    } catch (error) {
      this.rethrowIfWider(error)
      run.log.warn('Item failed', { itemId: item.itemId }, error)
      return 'failed'
    }
  }

  // ===========================================================================
  // State bookkeeping
  // ===========================================================================

  private enter(run: TargetRun, state: CrawlState): void {
    run.outcome.transitions.push(state)
    run.log.debug('State entered', { state })
  }

  private checkDeadline(run: TargetRun): void {
    if (run.signal?.aborted) {
      throw new CrawlError('DeadlineExceeded', 'Target deadline reached', { targetId: run.target.targetId })
    }
  }

  /** Errors wider than one item leave the current step untouched. */
  private rethrowIfWider(error: unknown): void {
    if (classifyCrawlError(error, 'item').scope !== 'item') {
      throw error
    }
  }

  private async markTargetGone(run: TargetRun): Promise<void> {
    try {
      await this.deps.ledger.markTargetGone(run.target.targetId)
    } catch (error) {
      run.log.error('Failed to mark target gone', {}, error)
    }
  }

  private fail(outcome: CrawlOutcome, error: unknown): CrawlOutcome {
    outcome.transitions.push('FAILED')
    outcome.state = 'FAILED'
    // Anything that reached the top ends at least this target.
    const classified = classifyCrawlError(error, 'root')
    outcome.failure = classified
    return outcome
  }
}

function isCrawlErrorOfKind(error: unknown, kind: CrawlErrorKind): boolean {
  return error instanceof CrawlError && error.kind === kind
}
