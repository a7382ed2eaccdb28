/**
 * UTC date helpers for parsing source timestamps, day arithmetic and
 * export formatting. Source timestamps carry no zone and are read as UTC.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const

// Monday first, matching day_of_week 0..6
export const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0
  const sign = zone.startsWith('-') ? -1 : 1
  const digits = zone.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = Number(digits.slice(2, 4))
  return sign * (hours * 60 + minutes)
}

/**
 * Parse `YYYY-MM-DD`, `YYYY-MM-DD HH:mm[:ss[.sss]]` or ISO 8601 with an
 * optional zone. Returns null for anything else, including impossible
 * calendar dates such as 2023-02-30.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim())
  if (!match) return null

  const [, y, mo, d, h, mi, s, ms, zone] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = h === undefined ? 0 : Number(h)
  const minute = mi === undefined ? 0 : Number(mi)
  const second = s === undefined ? 0 : Number(s)
  const millis = ms === undefined ? 0 : Number(ms.padEnd(3, '0'))

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null

  const local = Date.UTC(year, month - 1, day, hour, minute, second, millis)
  const check = new Date(local)
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null
  }

  return new Date(local - offsetMinutes(zone) * 60 * 1000)
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
}

/**
 * Signed whole calendar days from `from` to `to` (UTC).
 * 2023-01-05 23:59 → 2023-01-10 00:01 is 5.
 */
export function diffCalendarDays(to: Date, from: Date): number {
  return Math.round((startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / MS_PER_DAY)
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY)
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
}

export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
}

// YYYYMMDD as an integer key for the calendar dimension
export function dateId(date: Date): number {
  return date.getUTCFullYear() * 10000 + (date.getUTCMonth() + 1) * 100 + date.getUTCDate()
}

// 0 = Monday ... 6 = Sunday
export function dayOfWeek(date: Date): number {
  return (date.getUTCDay() + 6) % 7
}

export function quarterOf(date: Date): number {
  return Math.floor(date.getUTCMonth() / 3) + 1
}
