import { parsed, unparsed, type ParseResult } from './result.js'

const SECOND = 1_000
const MINUTE = 60 * SECOND
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR
const WEEK = 7 * DAY

const UNIT_MS: Record<string, number> = {
  '秒': SECOND,
  '分': MINUTE,
  '時間': HOUR,
  '日': DAY,
  '週間': WEEK,
  second: SECOND,
  minute: MINUTE,
  hour: HOUR,
  day: DAY,
  week: WEEK,
}

const RELATIVE_JA = /^(\d+)\s*(秒|分|時間|日|週間)前$/
const RELATIVE_EN = /^(\d+)\s*(second|minute|hour|day|week)s?\s+ago$/i
const ABSOLUTE_JA = /^(\d{4})年(\d{1,2})月(\d{1,2})日$/
const ABSOLUTE_ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})$/
const MONTH_DAY = /^(\d{1,2})-(\d{1,2})$/

/**
 * Resolve a posted-at label against base.
 *
 * Relative labels ("3時間前", "2 days ago") subtract from base. Absolute dates
 * ("2024年3月5日", "2024-03-05") keep base's time of day. Month-day labels
 * ("3-5") fall in base's year, or the year before when that date would be
 * after base. Calendar fields are read at utcOffsetMinutes from UTC.
 */
export function parsePostedAt(text: string, base: Date, utcOffsetMinutes = 0): ParseResult<Date> {
  const label = text.trim()
  if (label === '') {
    return unparsed('empty time text')
  }

  const relative = RELATIVE_JA.exec(label) ?? RELATIVE_EN.exec(label)
  if (relative) {
    const amount = Number(relative[1])
    const unit = UNIT_MS[relative[2].toLowerCase()]
    return parsed(new Date(base.getTime() - amount * unit))
  }

  const absolute = ABSOLUTE_JA.exec(label) ?? ABSOLUTE_ISO.exec(label)
  if (absolute) {
    return atCalendarDate(Number(absolute[1]), Number(absolute[2]), Number(absolute[3]), base, utcOffsetMinutes, text)
  }

  const monthDay = MONTH_DAY.exec(label)
  if (monthDay) {
    const month = Number(monthDay[1])
    const day = Number(monthDay[2])
    const local = toLocal(base, utcOffsetMinutes)
    const baseMonth = local.getUTCMonth() + 1
    const baseDay = local.getUTCDate()
    const afterBase = month > baseMonth || (month === baseMonth && day > baseDay)
    const year = local.getUTCFullYear() - (afterBase ? 1 : 0)
    return atCalendarDate(year, month, day, base, utcOffsetMinutes, text)
  }

  return unparsed(`unrecognized time text "${text}"`)
}

function toLocal(instant: Date, utcOffsetMinutes: number): Date {
  return new Date(instant.getTime() + utcOffsetMinutes * MINUTE)
}

function atCalendarDate(
  year: number,
  month: number,
  day: number,
  base: Date,
  utcOffsetMinutes: number,
  text: string
): ParseResult<Date> {
  const local = toLocal(base, utcOffsetMinutes)
  const wall = new Date(
    Date.UTC(
      year,
      month - 1,
      day,
      local.getUTCHours(),
      local.getUTCMinutes(),
      local.getUTCSeconds(),
      local.getUTCMilliseconds()
    )
  )
  // Date.UTC rolls Feb 30 over into March; reject instead.
  if (wall.getUTCFullYear() !== year || wall.getUTCMonth() !== month - 1 || wall.getUTCDate() !== day) {
    return unparsed(`invalid calendar date "${text}"`)
  }
  return parsed(new Date(wall.getTime() - utcOffsetMinutes * MINUTE))
}
