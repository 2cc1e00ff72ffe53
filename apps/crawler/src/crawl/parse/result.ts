export type ParseResult<T> = { ok: true; value: T } | { ok: false; diagnostic: string }

export function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value }
}

export function unparsed<T>(diagnostic: string): ParseResult<T> {
  return { ok: false, diagnostic }
}
