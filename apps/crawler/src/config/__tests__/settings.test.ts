import { describe, it, expect } from 'vitest'
import { SettingsError, loadSettings } from '../settings.js'

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSettings({})

    expect(settings).toMatchObject({
      databaseUrl: undefined,
      batchSize: 100,
      maxScrolls: 10,
      itemTimeoutMs: 30_000,
      targetTimeoutMs: 0,
      runMinutes: 60,
      commentLimit: 20,
      utcOffsetMinutes: 0,
      scheduleCron: '0 */6 * * *',
      eventProject: undefined,
      itemSyncQueue: undefined,
      fanoutMaxRetries: 3,
      blockRetryDelayMs: 300_000,
    })
    expect(Object.isFrozen(settings)).toBe(true)
  })

  it('coerces numbers and treats blank values as unset', () => {
    const settings = loadSettings({
      CRAWL_BATCH_SIZE: '25',
      CRAWL_MAX_SCROLLS: '',
      CRAWL_UTC_OFFSET_MINUTES: '540',
      EVENT_PROJECT: 'analytics',
      ITEM_SYNC_QUEUE: ' ',
    })

    expect(settings.batchSize).toBe(25)
    expect(settings.maxScrolls).toBe(10)
    expect(settings.utcOffsetMinutes).toBe(540)
    expect(settings.eventProject).toBe('analytics')
    expect(settings.itemSyncQueue).toBeUndefined()
  })

  it('lists every invalid variable', () => {
    let caught: unknown
    try {
      loadSettings({ CRAWL_BATCH_SIZE: '0', EVENT_PROJECT: 'has space' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(SettingsError)
    expect(caught).toMatchObject({
      issues: [
        'CRAWL_BATCH_SIZE: Number must be greater than or equal to 1',
        'EVENT_PROJECT: may only contain letters, digits, "_" and "-"',
      ],
    })
  })

  it('rejects a site origin that is not a URL', () => {
    expect(() => loadSettings({ CRAWL_SITE_ORIGIN: 'video.example' })).toThrow(SettingsError)
  })
})
