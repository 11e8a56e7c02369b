/**
 * Calendar Helpers
 *
 * Proleptic Gregorian rules shared by the Date, Time and DateTime modules:
 * leap years, month lengths, signed zero-padding, and calendar normalization.
 * Uses Julian Day Number for all day arithmetic to avoid month-length edge cases.
 */

// ============================================================================
// Calendar Instant
// ============================================================================

/**
 * A calendar/clock reading with every field an instant carries.
 * The shape accepted by `Scan` alongside scalar text.
 */
export type CalendarInstant = {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly nanosecond: number
}

export const MIN_YEAR = 0
export const MAX_YEAR = 9999
export const MAX_NANOSECOND = 999_999_999

const NANOS_PER_MILLI = 1_000_000

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

/** Zero-pads |n| to `width` characters; a minus sign takes one of them. */
export function padInt(n: number, width: number): string {
  const digits = String(Math.abs(n))
  if (n < 0) return '-' + digits.padStart(width - 1, '0')
  return digits.padStart(width, '0')
}

export function inRange(n: number, min: number, max: number): boolean {
  return Number.isSafeInteger(n) && n >= min && n <= max
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

export function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

export function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

/**
 * Brings an arbitrary year/month/day triple onto the calendar.
 * Months outside 1-12 carry into the year; days past the end of the
 * month (or before its start) roll into the neighbouring months.
 */
export function normalizeDate(
  year: number,
  month: number,
  day: number
): { year: number; month: number; day: number } {
  const totalMonths = year * 12 + (month - 1)
  const y = Math.floor(totalMonths / 12)
  const m = totalMonths - y * 12 + 1
  return jdnToDate(dateToJDN(y, m, 1) + day - 1)
}

// ============================================================================
// Instants
// ============================================================================

export function isValidInstant(instant: CalendarInstant): boolean {
  return (
    Number.isSafeInteger(instant.year) &&
    inRange(instant.month, 1, 12) &&
    inRange(instant.day, 1, daysInMonth(instant.year, instant.month)) &&
    inRange(instant.hour, 0, 23) &&
    inRange(instant.minute, 0, 59) &&
    inRange(instant.second, 0, 59) &&
    inRange(instant.nanosecond, 0, MAX_NANOSECOND)
  )
}

/** Reads a JS Date in UTC. */
export function instantFromJsDate(date: Date): CalendarInstant {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    nanosecond: date.getUTCMilliseconds() * NANOS_PER_MILLI,
  }
}

/** Builds a JS Date read in UTC. Sub-millisecond precision is truncated. */
export function instantToJsDate(instant: CalendarInstant): Date {
  const ms = Math.floor(instant.nanosecond / NANOS_PER_MILLI)
  const date = new Date(Date.UTC(2000, 0, 1, instant.hour, instant.minute, instant.second, ms))
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(instant.year, instant.month - 1, instant.day)
  return date
}

// ============================================================================
// Field Checks
// ============================================================================

/** First field that is not a safe integer, as `[name, value]`. */
export function findNonInteger(fields: Record<string, number>): [string, number] | undefined {
  return Object.entries(fields).find(([, value]) => !Number.isSafeInteger(value))
}

export function hasNumericFields<K extends string>(
  value: unknown,
  keys: readonly K[]
): value is Record<K, number> {
  if (typeof value !== 'object' || value === null) return false
  return keys.every((key) => typeof Reflect.get(value, key) === 'number')
}

const INSTANT_FIELDS = ['year', 'month', 'day', 'hour', 'minute', 'second', 'nanosecond'] as const

export function isCalendarInstant(value: unknown): value is CalendarInstant {
  return hasNumericFields(value, INSTANT_FIELDS)
}
