/**
 * Rendering capability consumed by strategies and the orchestrator.
 *
 * Every call may be slow and may fail; failures come back as values
 * (NavResult) so callers decide whether they end an item, a target or the run.
 */

export interface PageHandle {
  url: string
}

export type NavErrorKind = 'not-found' | 'timeout' | 'failure' | 'session-lost'

export interface NavError {
  kind: NavErrorKind
  message: string
  status?: number
}

export type NavResult = { ok: true; page: PageHandle } | { ok: false; error: NavError }

export interface ClickTarget {
  selector: string
  /** Which match to click, zero-based. Defaults to the first. */
  index?: number
}

export interface SelectorSpec {
  selector: string
  /** Read this attribute instead of the text content. */
  attribute?: string
  /** Which match to read, zero-based. Defaults to the first. */
  index?: number
  /** Look inside the index-th match of another selector (one listing card, one comment). */
  within?: ClickTarget
}

export interface RenderingSession {
  navigate(url: string): Promise<NavResult>
  /**
   * Scroll until predicate holds or maxIterations scrolls have happened.
   * Resolves either way; callers re-check what they need.
   */
  scrollUntil(predicate: () => Promise<boolean>, maxIterations: number): Promise<PageHandle>
  click(target: ClickTarget): Promise<NavResult>
  extractField(spec: SelectorSpec): Promise<string | undefined>
  countMatches(selector: string, within?: ClickTarget): Promise<number>
  currentUrl(): string
}

/**
 * A session held by exactly one target crawl. release() is called once, at DONE or FAILED.
 */
export interface SessionLease {
  session: RenderingSession
  release(): Promise<void>
}

export interface SessionProvider {
  acquire(targetId: string): Promise<SessionLease>
  close(): Promise<void>
}

export function navOk(url: string): NavResult {
  return { ok: true, page: { url } }
}

export function navFailed(kind: NavErrorKind, message: string, status?: number): NavResult {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } }
}
