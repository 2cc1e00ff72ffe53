import { describe, it, expect } from 'vitest'
import { CrawlError } from '../../crawl/errors.js'
import { decideRetry, genreOfError, genreOfFailure } from '../retry.js'

const policy = { maxRetries: 3, blockDelayMs: 300_000 }

describe('genreOfFailure', () => {
  it.each([
    ['SessionLost', 'session_lost'],
    ['NavigationTimeout', 'proxy_block'],
    ['NavigationFailure', 'proxy_block'],
    ['PersistenceFailure', 'unknown'],
    ['DeadlineExceeded', 'unknown'],
  ] as const)('maps %s to %s', (kind, genre) => {
    expect(genreOfFailure({ kind, scope: 'target', isRetryable: true, message: 'x' })).toBe(genre)
  })
})

describe('genreOfError', () => {
  it('recognizes a missing or mismatched browser', () => {
    expect(genreOfError(new Error("browserType.launch: Executable doesn't exist at /opt/chrome"))).toBe('browser_version')
  })

  it('maps crawl errors through their kind', () => {
    expect(genreOfError(new CrawlError('SessionLost', 'closed'))).toBe('session_lost')
  })

  it('treats anything else as unknown', () => {
    expect(genreOfError(new Error('connection refused'))).toBe('unknown')
    expect(genreOfError('boom')).toBe('unknown')
  })
})

describe('decideRetry', () => {
  it('retries blocks up to the limit after the block delay', () => {
    expect(decideRetry('proxy_block', 0, policy)).toEqual({ retry: true, delayMs: 300_000 })
    expect(decideRetry('proxy_block', 2, policy)).toEqual({ retry: true, delayMs: 300_000 })
    expect(decideRetry('proxy_block', 3, policy)).toEqual({ retry: false, delayMs: 0 })
  })

  it('treats lock contention and lost sessions like blocks', () => {
    expect(decideRetry('target_locked', 1, policy)).toEqual({ retry: true, delayMs: 300_000 })
    expect(decideRetry('session_lost', 2, policy)).toEqual({ retry: true, delayMs: 300_000 })
  })

  it('retries other genres once, immediately', () => {
    expect(decideRetry('unknown', 0, policy)).toEqual({ retry: true, delayMs: 0 })
    expect(decideRetry('unknown', 1, policy)).toEqual({ retry: false, delayMs: 0 })
    expect(decideRetry('browser_version', 1, policy)).toEqual({ retry: false, delayMs: 0 })
  })

  it('never retries when retries are disabled', () => {
    expect(decideRetry('proxy_block', 0, { maxRetries: 0, blockDelayMs: 1_000 })).toEqual({ retry: false, delayMs: 0 })
  })
})
