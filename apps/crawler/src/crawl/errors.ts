/**
 * Crawl error taxonomy.
 *
 * Every failure the orchestrator reacts to is a CrawlError with a kind;
 * classifyCrawlError decides how far it propagates.
 */

export type CrawlErrorKind =
  | 'TargetNotFound'
  | 'NavigationTimeout'
  | 'NavigationFailure'
  | 'ExtractionParseFailure'
  | 'PersistenceFailure'
  | 'PublicationFailure'
  | 'SessionLost'
  | 'DeadlineExceeded'

/** How far a failure reaches: one item, the rest of one target, or the whole run. */
export type ErrorScope = 'item' | 'target' | 'run'

export interface CrawlErrorOptions {
  targetId?: string
  itemId?: string
  /** HTTP status behind a navigation failure, when the renderer saw one. */
  status?: number
  cause?: unknown
}

export class CrawlError extends Error {
  readonly kind: CrawlErrorKind
  readonly targetId?: string
  readonly itemId?: string
  readonly status?: number

  constructor(kind: CrawlErrorKind, message: string, options: CrawlErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'CrawlError'
    this.kind = kind
    this.targetId = options.targetId
    this.itemId = options.itemId
    this.status = options.status
  }
}

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError
}

export interface ClassifiedCrawlError {
  kind: CrawlErrorKind
  scope: ErrorScope
  isRetryable: boolean
  message: string
}

/**
 * Where the error surfaced. Navigation errors at the target root end the
 * target; the same errors on an item only skip the item.
 */
export type ErrorStage = 'root' | 'item'

const RETRYABLE: Record<CrawlErrorKind, boolean> = {
  TargetNotFound: false,
  NavigationTimeout: true,
  NavigationFailure: true,
  ExtractionParseFailure: false,
  PersistenceFailure: true,
  PublicationFailure: true,
  SessionLost: true,
  DeadlineExceeded: true,
}

function scopeOf(kind: CrawlErrorKind, stage: ErrorStage): ErrorScope {
  switch (kind) {
    case 'SessionLost':
      return 'run'
    case 'TargetNotFound':
    case 'DeadlineExceeded':
      return 'target'
    case 'NavigationTimeout':
    case 'NavigationFailure':
      return stage === 'root' ? 'target' : 'item'
    case 'ExtractionParseFailure':
    case 'PersistenceFailure':
    case 'PublicationFailure':
      return 'item'
  }
}

export function classifyCrawlError(error: unknown, stage: ErrorStage = 'item'): ClassifiedCrawlError {
  if (isCrawlError(error)) {
    return {
      kind: error.kind,
      scope: scopeOf(error.kind, stage),
      isRetryable: RETRYABLE[error.kind],
      message: error.message,
    }
  }

  // Anything unexpected from the renderer or a strategy is treated as a navigation failure.
  const message = error instanceof Error ? error.message : String(error)
  return {
    kind: 'NavigationFailure',
    scope: scopeOf('NavigationFailure', stage),
    isRetryable: true,
    message,
  }
}
