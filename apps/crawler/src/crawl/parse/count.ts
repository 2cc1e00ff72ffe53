import { parsed, unparsed, type ParseResult } from './result.js'

/**
 * Multipliers for abbreviated counts.
 * 万 and 億 are the Japanese/Chinese 10^4 and 10^8 units.
 */
const SUFFIX_SCALE: Record<string, bigint> = {
  '万': 10_000n,
  '億': 100_000_000n,
  K: 1_000n,
  M: 1_000_000n,
  B: 1_000_000_000n,
  G: 1_000_000_000n,
}

// Thousands separators (ASCII and full-width) and any whitespace.
const SEPARATORS = /[,，\s]/g

const COUNT_PATTERN = /^(\d+)(?:\.(\d+))?(万|億|[KMBG])?$/

/**
 * Normalize count text such as "1.2万", "3,450" or "15.3K" to an integer.
 *
 * The decimal prefix is scaled exactly (no floating point) and truncated,
 * so "1.2万" is 12000 and "1.23456K" is 1234.
 */
export function parseCount(text: string): ParseResult<number> {
  const compact = text.replace(SEPARATORS, '')
  if (compact === '') {
    return unparsed('empty count text')
  }

  const match = COUNT_PATTERN.exec(normalizeSuffix(compact))
  if (!match) {
    return unparsed(`unrecognized count text "${text}"`)
  }

  const [, whole, fraction = '', suffix] = match
  const scale = suffix ? SUFFIX_SCALE[suffix] : 1n

  const scaledWhole = BigInt(whole) * scale
  const scaledFraction = fraction === '' ? 0n : (BigInt(fraction) * scale) / 10n ** BigInt(fraction.length)
  const total = scaledWhole + scaledFraction

  if (total > BigInt(Number.MAX_SAFE_INTEGER)) {
    return unparsed(`count "${text}" is too large`)
  }
  return parsed(Number(total))
}

// Lowercase k/m/b/g suffixes appear on some locales.
function normalizeSuffix(compact: string): string {
  const last = compact.slice(-1)
  return /[kmbg]/.test(last) ? compact.slice(0, -1) + last.toUpperCase() : compact
}
