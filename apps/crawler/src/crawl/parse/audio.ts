import { parsed, unparsed, type ParseResult } from './result.js'

export interface AudioInfo {
  title: string
  author?: string
}

const SEPARATOR = ' - '

/**
 * Split "title - author" on the last separator; titles may contain " - " themselves.
 */
export function parseAudioInfo(text: string): ParseResult<AudioInfo> {
  const label = text.trim()
  if (label === '') {
    return unparsed('empty audio text')
  }

  const at = label.lastIndexOf(SEPARATOR)
  if (at <= 0) {
    return parsed({ title: label })
  }

  const title = label.slice(0, at).trim()
  const author = label.slice(at + SEPARATOR.length).trim()
  return parsed(author === '' ? { title } : { title, author })
}
