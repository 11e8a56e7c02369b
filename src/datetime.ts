/**
 * Civil DateTime
 *
 * A Date and a Time read together, with no zone attached.
 * Validation and formatting delegate to the two parts.
 */

import { type Result, Ok, Err } from './result'
import { type FieldRangeError, type InvalidFieldError, ParseError } from './errors'
import type { CivilConfig } from './config'
import type { CalendarInstant } from './calendar'
import {
  type CivilDate,
  dateOf, isCivilDate, isValidDate, dateToString, formatDate, parseDate, compareDates,
} from './date'
import {
  type CivilTime,
  timeOf, isCivilTime, isValidTime, timeToString, formatTime, parseTime, compareTimes,
} from './time'

export type CivilDateTime = {
  readonly date: CivilDate
  readonly time: CivilTime
}

const SEPARATOR = 'T'

// ============================================================================
// Construction
// ============================================================================

export function makeDateTime(date: CivilDate, time: CivilTime): CivilDateTime {
  return { date, time }
}

export function dateTimeOf(instant: CalendarInstant): CivilDateTime {
  return makeDateTime(dateOf(instant), timeOf(instant))
}

export function dateTimeToInstant(dt: CivilDateTime): CalendarInstant {
  return { ...dt.date, ...dt.time }
}

export function isCivilDateTime(value: unknown): value is CivilDateTime {
  if (typeof value !== 'object' || value === null) return false
  return isCivilDate(Reflect.get(value, 'date')) && isCivilTime(Reflect.get(value, 'time'))
}

export function isValidDateTime(dt: CivilDateTime): boolean {
  return isValidDate(dt.date) && isValidTime(dt.time)
}

// ============================================================================
// Formatting
// ============================================================================

export function dateTimeToString(dt: CivilDateTime): string {
  return `${dateToString(dt.date)}${SEPARATOR}${timeToString(dt.time)}`
}

export function formatDateTime(
  dt: CivilDateTime,
  config?: CivilConfig
): Result<string, FieldRangeError | InvalidFieldError> {
  const date = formatDate(dt.date, config)
  if (!date.ok) return date
  const time = formatTime(dt.time, config)
  if (!time.ok) return time
  return Ok(`${date.value}${SEPARATOR}${time.value}`)
}

// ============================================================================
// Parsing
// ============================================================================

/** Splits on the first `T` and decodes each side with its own strict parser. */
export function parseDateTime(str: string): Result<CivilDateTime, ParseError> {
  const idx = str.indexOf(SEPARATOR)
  if (idx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const date = parseDate(str.substring(0, idx))
  if (!date.ok) return Err(new ParseError(`Invalid datetime: '${str}' (${date.error.message})`))

  const time = parseTime(str.substring(idx + 1))
  if (!time.ok) return Err(new ParseError(`Invalid datetime: '${str}' (${time.error.message})`))

  return Ok(makeDateTime(date.value, time.value))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: CivilDateTime, b: CivilDateTime): number {
  return compareDates(a.date, b.date) || compareTimes(a.time, b.time)
}

export function dateTimeEquals(a: CivilDateTime, b: CivilDateTime): boolean {
  return compareDateTimes(a, b) === 0
}

export function dateTimeBefore(a: CivilDateTime, b: CivilDateTime): boolean {
  return compareDateTimes(a, b) < 0
}

export function dateTimeAfter(a: CivilDateTime, b: CivilDateTime): boolean {
  return compareDateTimes(a, b) > 0
}
