import { describe, it, expect } from 'vitest'
import { CrawlError, classifyCrawlError } from '../errors.js'

describe('classifyCrawlError', () => {
  it('ends the run on a lost session wherever it surfaces', () => {
    const error = new CrawlError('SessionLost', 'Browser session closed')

    expect(classifyCrawlError(error, 'item')).toEqual({
      kind: 'SessionLost',
      scope: 'run',
      isRetryable: true,
      message: 'Browser session closed',
    })
    expect(classifyCrawlError(error, 'root').scope).toBe('run')
  })

  it('skips only the item on an item navigation failure', () => {
    const error = new CrawlError('NavigationTimeout', 'detail timed out')

    expect(classifyCrawlError(error, 'item').scope).toBe('item')
    expect(classifyCrawlError(error, 'root').scope).toBe('target')
  })

  it('ends the target when the account is gone, without retry', () => {
    const classified = classifyCrawlError(new CrawlError('TargetNotFound', 'gone'), 'item')

    expect(classified.scope).toBe('target')
    expect(classified.isRetryable).toBe(false)
  })

  it('keeps parse and persistence failures on the item', () => {
    expect(classifyCrawlError(new CrawlError('ExtractionParseFailure', 'bad date')).scope).toBe('item')
    expect(classifyCrawlError(new CrawlError('PersistenceFailure', 'write failed')).scope).toBe('item')
  })

  it('treats unexpected errors as navigation failures', () => {
    expect(classifyCrawlError(new Error('locator detached'), 'root')).toEqual({
      kind: 'NavigationFailure',
      scope: 'target',
      isRetryable: true,
      message: 'locator detached',
    })
    expect(classifyCrawlError('boom').message).toBe('boom')
  })

  it('carries target, item and status on the error', () => {
    const cause = new Error('HTTP 503')
    const error = new CrawlError('NavigationFailure', 'listing failed', { targetId: 't-1', itemId: '7', status: 503, cause })

    expect(error).toMatchObject({ name: 'CrawlError', kind: 'NavigationFailure', targetId: 't-1', itemId: '7', status: 503 })
    expect(error.cause).toBe(cause)
  })
})
