import { describe, it, expect } from 'vitest'
import { parsePostedAt } from '../time.js'

const base = new Date('2024-03-10T12:34:56.000Z')

function iso(text: string, at = base, offset = 0): string | null {
  const result = parsePostedAt(text, at, offset)
  return result.ok ? result.value.toISOString() : null
}

describe('parsePostedAt', () => {
  describe('relative labels', () => {
    it('subtracts hours for 3時間前', () => {
      const result = parsePostedAt('3時間前', base)
      expect(result).toEqual({ ok: true, value: new Date(base.getTime() - 3 * 60 * 60 * 1000) })
    })

    it.each([
      ['30秒前', '2024-03-10T12:34:26.000Z'],
      ['5分前', '2024-03-10T12:29:56.000Z'],
      ['2日前', '2024-03-08T12:34:56.000Z'],
      ['1週間前', '2024-03-03T12:34:56.000Z'],
      ['10 seconds ago', '2024-03-10T12:34:46.000Z'],
      ['1 hour ago', '2024-03-10T11:34:56.000Z'],
      ['2 Days ago', '2024-03-08T12:34:56.000Z'],
    ])('%s', (text, expected) => {
      expect(iso(text)).toBe(expected)
    })
  })

  describe('absolute dates', () => {
    it('keeps the time of day from base', () => {
      expect(iso('2023年12月25日')).toBe('2023-12-25T12:34:56.000Z')
      expect(iso('2024-01-05')).toBe('2024-01-05T12:34:56.000Z')
    })

    it('rejects impossible dates', () => {
      expect(parsePostedAt('2023-02-30', base)).toEqual({ ok: false, diagnostic: 'invalid calendar date "2023-02-30"' })
    })
  })

  describe('month-day labels', () => {
    it('uses the current year for dates up to base', () => {
      expect(iso('3-5')).toBe('2024-03-05T12:34:56.000Z')
      expect(iso('3-10')).toBe('2024-03-10T12:34:56.000Z')
    })

    it('uses the previous year for dates after base', () => {
      expect(iso('12-31')).toBe('2023-12-31T12:34:56.000Z')
      expect(iso('3-11')).toBe('2023-03-11T12:34:56.000Z')
    })

    it('reads the calendar at the configured offset', () => {
      // 20:00 UTC on the 10th is 05:00 on the 11th at UTC+9
      const evening = new Date('2024-03-10T20:00:00.000Z')
      expect(iso('3-11', evening, 540)).toBe('2024-03-10T20:00:00.000Z')
      expect(iso('3-11', evening, 0)).toBe('2023-03-11T20:00:00.000Z')
    })
  })

  it.each(['', 'yesterday', '3 fortnights ago', '2024/03/05'])('returns a diagnostic for %j', (text) => {
    expect(parsePostedAt(text, base).ok).toBe(false)
  })
})
