/**
 * Civil Date
 *
 * A year/month/day reading on the proleptic Gregorian calendar.
 * Construction never validates; encoding checks the year only (all fields
 * under `strict`), decoding performs full calendar validation.
 */

import { type Result, Ok, Err } from './result'
import { FieldRangeError, InvalidFieldError, ParseError } from './errors'
import { type CivilConfig, resolveConfig } from './config'
import {
  type CalendarInstant,
  MIN_YEAR, MAX_YEAR,
  daysInMonth, padInt, inRange, findNonInteger, hasNumericFields,
  dateToJDN, jdnToDate, normalizeDate,
} from './calendar'

export type CivilDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): CivilDate {
  return { year, month, day }
}

export const ZERO_DATE: CivilDate = makeDate(0, 0, 0)

/** The date portion of an instant. */
export function dateOf(instant: CalendarInstant): CivilDate {
  return makeDate(instant.year, instant.month, instant.day)
}

// ============================================================================
// Validation
// ============================================================================

export function isCivilDate(value: unknown): value is CivilDate {
  return hasNumericFields(value, ['year', 'month', 'day'])
}

export function isValidDate(date: CivilDate): boolean {
  return (
    inRange(date.year, MIN_YEAR, MAX_YEAR) &&
    inRange(date.month, 1, 12) &&
    inRange(date.day, 1, daysInMonth(date.year, date.month))
  )
}

export function isZeroDate(date: CivilDate): boolean {
  return date.year === 0 && date.month === 0 && date.day === 0
}

// ============================================================================
// Formatting
// ============================================================================

/** `YYYY-MM-DD` with no checks at all; the scalar `Value` form. */
export function dateToString(date: CivilDate): string {
  return `${padInt(date.year, 4)}-${padInt(date.month, 2)}-${padInt(date.day, 2)}`
}

export function formatDate(
  date: CivilDate,
  config?: CivilConfig
): Result<string, FieldRangeError | InvalidFieldError> {
  const { strict } = resolveConfig(config)

  const bad = findNonInteger({ year: date.year, month: date.month, day: date.day })
  if (bad) return Err(new InvalidFieldError(`Date ${bad[0]} '${bad[1]}' is not an integer`))

  if (!inRange(date.year, MIN_YEAR, MAX_YEAR))
    return Err(new FieldRangeError(`Date year '${date.year}' outside of range [${MIN_YEAR},${MAX_YEAR}]`))

  if (strict) {
    if (!inRange(date.month, 1, 12))
      return Err(new FieldRangeError(`Date month '${date.month}' outside of range [1,12]`))
    const last = daysInMonth(date.year, date.month)
    if (!inRange(date.day, 1, last))
      return Err(new FieldRangeError(`Date day '${date.day}' outside of range [1,${last}]`))
  }

  return Ok(dateToString(date))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<CivilDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: CivilDate, n: number): CivilDate {
  const { year, month, day } = jdnToDate(dateToJDN(date.year, date.month, date.day) + n)
  return makeDate(year, month, day)
}

/**
 * Adds calendar months. A day that does not exist in the target month
 * rolls forward into the next one: 2020-01-31 + 1 month is 2020-03-02.
 */
export function addMonths(date: CivilDate, n: number): CivilDate {
  const { year, month, day } = normalizeDate(date.year, date.month + n, date.day)
  return makeDate(year, month, day)
}

/** Adds calendar years; Feb 29 onto a common year becomes Mar 1. */
export function addYears(date: CivilDate, n: number): CivilDate {
  const { year, month, day } = normalizeDate(date.year + n, date.month, date.day)
  return makeDate(year, month, day)
}

/** Days from `a` to `b`; negative when `b` is earlier. */
export function daysBetween(a: CivilDate, b: CivilDate): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: CivilDate, b: CivilDate): number {
  const diff = a.year - b.year || a.month - b.month || a.day - b.day
  return Math.sign(diff)
}

export function dateEquals(a: CivilDate, b: CivilDate): boolean {
  return compareDates(a, b) === 0
}

export function dateBefore(a: CivilDate, b: CivilDate): boolean {
  return compareDates(a, b) < 0
}

export function dateAfter(a: CivilDate, b: CivilDate): boolean {
  return compareDates(a, b) > 0
}
