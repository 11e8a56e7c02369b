/**
 * Segment 05: Text Codec & JSON Tests
 *
 * The {toText, fromText} codecs, quoted JSON strings, and the
 * JSON.stringify / JSON.parse hooks built on them.
 */

import { describe, it, expect } from 'vitest'
import {
  codecs,
  createCodecs,
  marshalJSON,
  unmarshalJSON,
  createJsonReplacer,
  createJsonReviver,
} from '../src/codec'
import { makeDate, ZERO_DATE } from '../src/date'
import { makeTime } from '../src/time'
import { makeDateTime, type CivilDateTime } from '../src/datetime'
import { FieldRangeError, ParseError } from '../src/errors'

function dt(
  year: number, month: number, day: number,
  hour = 0, minute = 0, second = 0, nanosecond = 0
): CivilDateTime {
  return makeDateTime(makeDate(year, month, day), makeTime(hour, minute, second, nanosecond))
}

// ============================================================================
// 1. DATE JSON
// ============================================================================

describe('Date JSON', () => {
  it('marshals a leap day', () => {
    expect(marshalJSON(codecs.date, makeDate(2020, 2, 29))).toEqual({ ok: true, value: '"2020-02-29"' })
  })

  it('marshals the zero value', () => {
    expect(marshalJSON(codecs.date, ZERO_DATE)).toEqual({ ok: true, value: '"0000-00-00"' })
  })

  it('refuses a negative year and produces no output', () => {
    const result = marshalJSON(codecs.date, makeDate(-1, 2, 29))
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe("Date year '-1' outside of range [0,9999]")
  })

  it('unmarshals a leap day', () => {
    expect(unmarshalJSON(codecs.date, '"2020-02-29"')).toEqual({ ok: true, value: makeDate(2020, 2, 29) })
  })

  it('rejects an invalid calendar date', () => {
    const result = unmarshalJSON(codecs.date, '"2020-13-40"')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ParseError)
  })

  it('marshals an invalid day but refuses to unmarshal it', () => {
    const json = marshalJSON(codecs.date, makeDate(2020, 2, -1))
    expect(json).toEqual({ ok: true, value: '"2020-02--1"' })
    expect(unmarshalJSON(codecs.date, '"2020-02--1"').ok).toBe(false)
  })

  it('rejects malformed JSON', () => {
    const result = unmarshalJSON(codecs.date, '"2020-02-29')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ParseError)
    expect(result.error.message).toMatch(/^Invalid JSON for Date: '"2020-02-29' \(/)
  })

  it('rejects a non-string payload', () => {
    const result = unmarshalJSON(codecs.date, '20200229')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe("Expected a JSON string for Date: '20200229'")
  })
})

// ============================================================================
// 2. TIME AND DATETIME JSON
// ============================================================================

describe('Time JSON', () => {
  it('marshals nanoseconds', () => {
    expect(marshalJSON(codecs.time, makeTime(3, 42, 31, 876))).toEqual({ ok: true, value: '"03:42:31.000000876"' })
  })

  it('marshals midnight without a fraction', () => {
    expect(marshalJSON(codecs.time, makeTime(0, 0))).toEqual({ ok: true, value: '"00:00:00"' })
  })

  it('unmarshals nanoseconds', () => {
    expect(unmarshalJSON(codecs.time, '"03:42:31.000000876"')).toEqual({ ok: true, value: makeTime(3, 42, 31, 876) })
  })

  it('rejects a negative hour', () => {
    const result = unmarshalJSON(codecs.time, '"-3:42:31.000000876"')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe("Invalid time format: '-3:42:31.000000876'")
  })
})

describe('DateTime JSON', () => {
  it('marshals the leap-day example', () => {
    expect(marshalJSON(codecs.dateTime, dt(2020, 2, 29, 3, 42, 31, 876))).toEqual({
      ok: true,
      value: '"2020-02-29T03:42:31.000000876"',
    })
  })

  it('unmarshals the leap-day example', () => {
    expect(unmarshalJSON(codecs.dateTime, '"2020-02-29T03:42:31.000000876"')).toEqual({
      ok: true,
      value: dt(2020, 2, 29, 3, 42, 31, 876),
    })
  })

  it('marshals values that will not unmarshal', () => {
    const cases: [CivilDateTime, string][] = [
      [dt(2020, 3, -4, 12, 23, 34, 5), '"2020-03--4T12:23:34.000000005"'],
      [dt(2020, 13, 4, 12, 23, 34, 5), '"2020-13-04T12:23:34.000000005"'],
      [dt(2020, 3, 4, 24), '"2020-03-04T24:00:00"'],
      [dt(2020, 3, 4, 0, -1), '"2020-03-04T00:-1:00"'],
      [dt(2020, 3, 4, 1, 0, 75), '"2020-03-04T01:00:75"'],
      [dt(2020, 3, 4, 12, 23, 34, 1_231_231_234), '"2020-03-04T12:23:34.1231231234"'],
    ]
    for (const [value, json] of cases) {
      expect(marshalJSON(codecs.dateTime, value)).toEqual({ ok: true, value: json })
      expect(unmarshalJSON(codecs.dateTime, json).ok).toBe(false)
    }
  })

  it('refuses to marshal a negative year', () => {
    expect(marshalJSON(codecs.dateTime, dt(-2020, 3, 4, 12, 23, 34, 5)).ok).toBe(false)
  })
})

// ============================================================================
// 3. STRICT CODECS
// ============================================================================

describe('createCodecs', () => {
  const strict = createCodecs({ strict: true })

  it('strict date codec checks the month', () => {
    const result = strict.date.toText(makeDate(2020, 13, 1))
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(FieldRangeError)
  })

  it('strict datetime codec checks the clock', () => {
    expect(strict.dateTime.toText(dt(2020, 3, 4, 0, 60)).ok).toBe(false)
  })

  it('default codecs stay permissive', () => {
    expect(codecs.date.toText(makeDate(2020, 13, 1))).toEqual({ ok: true, value: '2020-13-01' })
  })

  it('codec names', () => {
    expect([codecs.date.name, codecs.time.name, codecs.dateTime.name]).toEqual(['Date', 'Time', 'DateTime'])
  })
})

// ============================================================================
// 4. JSON.stringify / JSON.parse HOOKS
// ============================================================================

describe('JSON hooks', () => {
  const replacer = createJsonReplacer({ due: codecs.date, at: codecs.dateTime })
  const reviver = createJsonReviver({ due: codecs.date, at: codecs.dateTime })

  it('replacer encodes the named properties', () => {
    const json = JSON.stringify({ title: 'x', due: makeDate(2020, 2, 29), at: dt(2020, 2, 29, 3, 42, 31, 876) }, replacer)
    expect(json).toBe('{"title":"x","due":"2020-02-29","at":"2020-02-29T03:42:31.000000876"}')
  })

  it('replacer leaves other shapes alone', () => {
    expect(JSON.stringify({ due: 'already text' }, replacer)).toBe('{"due":"already text"}')
  })

  it('replacer throws the encode error', () => {
    expect(() => JSON.stringify({ due: makeDate(-1, 1, 1) }, replacer)).toThrow(FieldRangeError)
  })

  it('reviver decodes the named properties', () => {
    const value: unknown = JSON.parse('{"due":"2020-02-29","note":"2020-02-29"}', reviver)
    expect(value).toEqual({ due: makeDate(2020, 2, 29), note: '2020-02-29' })
  })

  it('reviver round-trips the replacer output', () => {
    const original = { due: makeDate(2345, 12, 25), at: dt(2019, 12, 25, 1, 2, 3, 4) }
    const value: unknown = JSON.parse(JSON.stringify(original, replacer), reviver)
    expect(value).toEqual(original)
  })

  it('reviver throws the ParseError', () => {
    expect(() => JSON.parse('{"due":"2020-02-30"}', reviver)).toThrow(ParseError)
  })
})
