/**
 * Civil Time
 *
 * An hour/minute/second/nanosecond clock reading with no date or zone.
 */

import { type Result, Ok, Err } from './result'
import { FieldRangeError, InvalidFieldError, ParseError } from './errors'
import { type CivilConfig, resolveConfig } from './config'
import {
  type CalendarInstant,
  MAX_NANOSECOND,
  padInt, inRange, findNonInteger, hasNumericFields,
} from './calendar'

export type CivilTime = {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly nanosecond: number
}

const FRACTION_DIGITS = 9

// ============================================================================
// Construction
// ============================================================================

export function makeTime(hour: number, minute: number, second?: number, nanosecond?: number): CivilTime {
  return { hour, minute, second: second ?? 0, nanosecond: nanosecond ?? 0 }
}

export const MIDNIGHT: CivilTime = makeTime(0, 0)

/** The clock portion of an instant; the date is discarded. */
export function timeOf(instant: CalendarInstant): CivilTime {
  return makeTime(instant.hour, instant.minute, instant.second, instant.nanosecond)
}

export function isCivilTime(value: unknown): value is CivilTime {
  return hasNumericFields(value, ['hour', 'minute', 'second', 'nanosecond'])
}

export function isValidTime(time: CivilTime): boolean {
  return (
    inRange(time.hour, 0, 23) &&
    inRange(time.minute, 0, 59) &&
    inRange(time.second, 0, 59) &&
    inRange(time.nanosecond, 0, MAX_NANOSECOND)
  )
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * `HH:MM:SS`, or `HH:MM:SS.fffffffff` when the nanosecond is nonzero.
 * The fraction always has 9 digits; trailing zeros are kept.
 */
export function timeToString(time: CivilTime): string {
  const hms = `${padInt(time.hour, 2)}:${padInt(time.minute, 2)}:${padInt(time.second, 2)}`
  if (time.nanosecond === 0) return hms
  return `${hms}.${padInt(time.nanosecond, FRACTION_DIGITS)}`
}

export function formatTime(
  time: CivilTime,
  config?: CivilConfig
): Result<string, FieldRangeError | InvalidFieldError> {
  const { strict } = resolveConfig(config)

  const bad = findNonInteger({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    nanosecond: time.nanosecond,
  })
  if (bad) return Err(new InvalidFieldError(`Time ${bad[0]} '${bad[1]}' is not an integer`))

  if (strict) {
    if (!inRange(time.hour, 0, 23))
      return Err(new FieldRangeError(`Time hour '${time.hour}' outside of range [0,23]`))
    if (!inRange(time.minute, 0, 59))
      return Err(new FieldRangeError(`Time minute '${time.minute}' outside of range [0,59]`))
    if (!inRange(time.second, 0, 59))
      return Err(new FieldRangeError(`Time second '${time.second}' outside of range [0,59]`))
    if (!inRange(time.nanosecond, 0, MAX_NANOSECOND))
      return Err(new FieldRangeError(`Time nanosecond '${time.nanosecond}' outside of range [0,${MAX_NANOSECOND}]`))
  }

  return Ok(timeToString(time))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseTime(str: string): Result<CivilTime, ParseError> {
  const match = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = parseInt(match[3] ?? '', 10)
  const fraction = match[4] ?? ''

  if (fraction.length > FRACTION_DIGITS)
    return Err(new ParseError(`Invalid fractional second in time: '${str}'`))
  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  const nanosecond = fraction ? parseInt(fraction.padEnd(FRACTION_DIGITS, '0'), 10) : 0
  return Ok(makeTime(hour, minute, second, nanosecond))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareTimes(a: CivilTime, b: CivilTime): number {
  const diff =
    a.hour - b.hour ||
    a.minute - b.minute ||
    a.second - b.second ||
    a.nanosecond - b.nanosecond
  return Math.sign(diff)
}

export function timeEquals(a: CivilTime, b: CivilTime): boolean {
  return compareTimes(a, b) === 0
}

export function timeBefore(a: CivilTime, b: CivilTime): boolean {
  return compareTimes(a, b) < 0
}

export function timeAfter(a: CivilTime, b: CivilTime): boolean {
  return compareTimes(a, b) > 0
}
