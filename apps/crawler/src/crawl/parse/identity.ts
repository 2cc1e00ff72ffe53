const DIGITS = /^\d+$/

/**
 * Total order on item identities.
 *
 * All-digit identities (numeric post ids, often beyond 2^53) compare by
 * value; everything else compares by UTF-16 code units.
 */
export function compareItemIdentity(a: string, b: string): number {
  if (DIGITS.test(a) && DIGITS.test(b)) {
    const left = a.replace(/^0+(?=\d)/, '')
    const right = b.replace(/^0+(?=\d)/, '')
    if (left.length !== right.length) {
      return left.length < right.length ? -1 : 1
    }
    if (left !== right) {
      return left < right ? -1 : 1
    }
  }
  return a < b ? -1 : a > b ? 1 : 0
}

/** Newest-first order for sweep candidates. */
export function byIdentityDescending<T extends { itemId: string }>(items: readonly T[]): T[] {
  return [...items].sort((x, y) => compareItemIdentity(y.itemId, x.itemId))
}
