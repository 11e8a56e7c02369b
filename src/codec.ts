/**
 * Text Codecs
 *
 * The {toText, fromText} capability pair for each civil type, and the JSON
 * boundary built on it: quoted-string marshalling plus replacer/reviver
 * hooks for JSON.stringify and JSON.parse.
 */

import { type Result, Ok, Err, unwrap } from './result'
import { type CivilError, ParseError } from './errors'
import type { CivilConfig } from './config'
import { type CivilDate, isCivilDate, formatDate, parseDate } from './date'
import { type CivilTime, isCivilTime, formatTime, parseTime } from './time'
import { type CivilDateTime, isCivilDateTime, formatDateTime, parseDateTime } from './datetime'

export interface TextCodec<T> {
  readonly name: string
  is(value: unknown): value is T
  toText(value: T): Result<string, CivilError>
  fromText(text: string): Result<T, CivilError>
}

export type Codecs = {
  date: TextCodec<CivilDate>
  time: TextCodec<CivilTime>
  dateTime: TextCodec<CivilDateTime>
}

export function createCodecs(config: CivilConfig = {}): Codecs {
  return {
    date: {
      name: 'Date',
      is: isCivilDate,
      toText: (value) => formatDate(value, config),
      fromText: parseDate,
    },
    time: {
      name: 'Time',
      is: isCivilTime,
      toText: (value) => formatTime(value, config),
      fromText: parseTime,
    },
    dateTime: {
      name: 'DateTime',
      is: isCivilDateTime,
      toText: (value) => formatDateTime(value, config),
      fromText: parseDateTime,
    },
  }
}

/** Permissive codecs: only the Date year is range-checked on encode. */
export const codecs: Codecs = createCodecs()

// ============================================================================
// JSON Strings
// ============================================================================

export function marshalJSON<T>(codec: TextCodec<T>, value: T): Result<string, CivilError> {
  const text = codec.toText(value)
  if (!text.ok) return text
  return Ok(JSON.stringify(text.value))
}

export function unmarshalJSON<T>(codec: TextCodec<T>, json: string): Result<T, CivilError> {
  let payload: unknown
  try {
    payload = JSON.parse(json)
  } catch (e) {
    const cause = e instanceof Error ? e.message : String(e)
    return Err(new ParseError(`Invalid JSON for ${codec.name}: '${json}' (${cause})`))
  }
  if (typeof payload !== 'string')
    return Err(new ParseError(`Expected a JSON string for ${codec.name}: '${json}'`))
  return codec.fromText(payload)
}

// ============================================================================
// JSON.stringify / JSON.parse Hooks
// ============================================================================

/** Property name → codec for the properties that carry civil values. */
export type CodecFields = Readonly<Record<string, TextCodec<unknown>>>

function codecFor(fields: CodecFields, key: string): TextCodec<unknown> | undefined {
  return Object.hasOwn(fields, key) ? fields[key] : undefined
}

/**
 * Replacer that encodes the named properties. Throws the encode error,
 * which JSON.stringify propagates.
 */
export function createJsonReplacer(fields: CodecFields): (key: string, value: unknown) => unknown {
  return (key, value) => {
    const codec = codecFor(fields, key)
    if (!codec || !codec.is(value)) return value
    return unwrap(codec.toText(value))
  }
}

/**
 * Reviver that decodes the named properties. Throws the ParseError,
 * which JSON.parse propagates.
 */
export function createJsonReviver(fields: CodecFields): (key: string, value: unknown) => unknown {
  return (key, value) => {
    const codec = codecFor(fields, key)
    if (!codec || typeof value !== 'string') return value
    return unwrap(codec.fromText(value))
  }
}
