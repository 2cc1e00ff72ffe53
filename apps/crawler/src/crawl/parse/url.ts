import { parsed, unparsed, type ParseResult } from './result.js'

export interface ItemUrl {
  canonicalUrl: string
  itemId: string
  /** Account handle when the path carries one (/@handle/video/123). */
  ownerHandle?: string
}

/**
 * Canonicalize an item link and derive the item identity from it.
 *
 * Relative links resolve against baseUrl. Query, fragment and trailing
 * slashes are dropped and the host is lowercased, so the same item always
 * yields the same canonicalUrl and itemId (its last path segment).
 */
export function parseItemUrl(href: string, baseUrl?: string): ParseResult<ItemUrl> {
  let url: URL
  try {
    url = new URL(href.trim(), baseUrl)
  } catch {
    return unparsed(`not a URL: "${href}"`)
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return unparsed(`unsupported scheme in "${href}"`)
  }

  const segments = url.pathname.split('/').filter((segment) => segment !== '')
  if (segments.length === 0) {
    return unparsed(`no item path in "${href}"`)
  }

  const itemId = segments[segments.length - 1]
  const ownerHandle = segments.length >= 3 ? segments[0].replace(/^@/, '') : undefined

  return parsed({
    canonicalUrl: `${url.protocol}//${url.host.toLowerCase()}/${segments.join('/')}`,
    itemId,
    ...(ownerHandle ? { ownerHandle } : {}),
  })
}
