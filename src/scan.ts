/**
 * Scalar Conversion
 *
 * The storage-adapter contract: `Value` turns a civil value into its scalar
 * text, `Scan` turns a driver value back. Drivers hand back either text or
 * an instant, modelled as the closed ScanInput union.
 */

import { type Result, Ok, Err } from './result'
import { type CivilError, FieldRangeError, ScanError } from './errors'
import {
  type CalendarInstant,
  isCalendarInstant, isValidInstant, instantFromJsDate,
} from './calendar'
import { type CivilDate, dateOf, dateToString, parseDate } from './date'
import { type CivilTime, timeOf, timeToString, parseTime } from './time'
import { type CivilDateTime, dateTimeOf, dateTimeToString, parseDateTime } from './datetime'

export type ScanInput =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'instant'; readonly instant: CalendarInstant }

export function textInput(text: string): ScanInput {
  return { type: 'text', text }
}

export function instantInput(instant: CalendarInstant): ScanInput {
  return { type: 'instant', instant }
}

function describe(raw: unknown): string {
  if (raw === null) return 'null'
  if (Array.isArray(raw)) return 'array'
  if (raw instanceof Uint8Array) return 'bytes'
  return typeof raw
}

/**
 * Classifies a raw driver value. Strings are text; JS Dates (read in UTC)
 * and instant-shaped objects are instants; everything else is refused.
 */
export function toScanInput(raw: unknown, target: string): Result<ScanInput, ScanError> {
  if (typeof raw === 'string') return Ok(textInput(raw))
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) return Err(new ScanError(`cannot scan invalid Date into ${target}`))
    return Ok(instantInput(instantFromJsDate(raw)))
  }
  if (isCalendarInstant(raw)) return Ok(instantInput(raw))
  return Err(new ScanError(`cannot scan ${describe(raw)} into ${target}`))
}

function checkInstant(instant: CalendarInstant): Result<CalendarInstant, FieldRangeError> {
  if (isValidInstant(instant)) return Ok(instant)
  const reading = dateTimeToString(dateTimeOf(instant))
  return Err(new FieldRangeError(`Instant '${reading}' is not a calendar reading`))
}

// ============================================================================
// Value
// ============================================================================

/** Never fails: the zero Date yields `0000-00-00`. */
export function dateValue(date: CivilDate): string {
  return dateToString(date)
}

export function timeValue(time: CivilTime): string {
  return timeToString(time)
}

export function dateTimeValue(dt: CivilDateTime): string {
  return dateTimeToString(dt)
}

// ============================================================================
// Scan
// ============================================================================

export function scanDate(input: ScanInput): Result<CivilDate, CivilError> {
  switch (input.type) {
    case 'text':
      return parseDate(input.text)
    case 'instant': {
      const instant = checkInstant(input.instant)
      return instant.ok ? Ok(dateOf(instant.value)) : instant
    }
  }
}

export function scanTime(input: ScanInput): Result<CivilTime, CivilError> {
  switch (input.type) {
    case 'text':
      return parseTime(input.text)
    case 'instant': {
      const instant = checkInstant(input.instant)
      return instant.ok ? Ok(timeOf(instant.value)) : instant
    }
  }
}

export function scanDateTime(input: ScanInput): Result<CivilDateTime, CivilError> {
  switch (input.type) {
    case 'text':
      return parseDateTime(input.text)
    case 'instant': {
      const instant = checkInstant(input.instant)
      return instant.ok ? Ok(dateTimeOf(instant.value)) : instant
    }
  }
}

// ============================================================================
// Scalar Codecs
// ============================================================================

export interface ScalarCodec<T> {
  readonly name: string
  value(v: T): string
  scan(input: ScanInput): Result<T, CivilError>
  /** Classifies a raw driver value, then scans it. */
  scanRaw(raw: unknown): Result<T, CivilError>
}

function scalar<T>(
  name: string,
  value: (v: T) => string,
  scan: (input: ScanInput) => Result<T, CivilError>
): ScalarCodec<T> {
  return {
    name,
    value,
    scan,
    scanRaw(raw) {
      const input = toScanInput(raw, name)
      return input.ok ? scan(input.value) : input
    },
  }
}

export const dateScalar: ScalarCodec<CivilDate> = scalar('Date', dateValue, scanDate)
export const timeScalar: ScalarCodec<CivilTime> = scalar('Time', timeValue, scanTime)
export const dateTimeScalar: ScalarCodec<CivilDateTime> = scalar('DateTime', dateTimeValue, scanDateTime)
