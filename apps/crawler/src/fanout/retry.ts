/**
 * Retry policy by error genre.
 *
 * Blocks, lock contention and lost sessions usually clear up on their own,
 * so they get the full retry budget after a pause. Anything else is retried
 * once, straight away.
 */

import { classifyCrawlError, isCrawlError, type ClassifiedCrawlError } from '../crawl/errors.js'
import type { ErrorGenre } from '../crawl/ledger/types.js'

export interface RetryPolicy {
  maxRetries: number
  blockDelayMs: number
}

export interface RetryDecision {
  retry: boolean
  delayMs: number
}

const PATIENT_GENRES: ReadonlySet<ErrorGenre> = new Set(['proxy_block', 'target_locked', 'session_lost'])

const BROWSER_VERSION_PATTERNS = [/Executable doesn't exist/i, /browserType\.(launch|connect)/i, /browser version/i]

export function genreOfFailure(failure: ClassifiedCrawlError): ErrorGenre {
  switch (failure.kind) {
    case 'SessionLost':
      return 'session_lost'
    // The listing never loaded: blocked, rate limited or a dead proxy.
    case 'NavigationTimeout':
    case 'NavigationFailure':
      return 'proxy_block'
    default:
      return 'unknown'
  }
}

/**
 * Genre of an error thrown outside the orchestrator (browser start-up, lock, storage).
 */
export function genreOfError(error: unknown): ErrorGenre {
  const message = error instanceof Error ? error.message : String(error)
  if (BROWSER_VERSION_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'browser_version'
  }
  return isCrawlError(error) ? genreOfFailure(classifyCrawlError(error, 'root')) : 'unknown'
}

/**
 * @param retriesSoFar failed attempts before this one
 */
export function decideRetry(genre: ErrorGenre, retriesSoFar: number, policy: RetryPolicy): RetryDecision {
  if (policy.maxRetries <= 0) {
    return { retry: false, delayMs: 0 }
  }

  const patient = PATIENT_GENRES.has(genre)
  const limit = patient ? policy.maxRetries : 1
  if (retriesSoFar >= limit) {
    return { retry: false, delayMs: 0 }
  }
  return { retry: true, delayMs: patient ? policy.blockDelayMs : 0 }
}
