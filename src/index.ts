/**
 * civil-values
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CivilError, CivilErrorCode,
  FieldRangeError, InvalidFieldError, ParseError, ScanError,
  DuplicateKeyError, NotFoundError, InvalidDataError, ValidationError,
} from './errors'
export type { CivilErrorCode as CivilErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Configuration
export type { CivilConfig } from './config'
export { DEFAULT_CONFIG, resolveConfig } from './config'

// Calendar helpers
export type { CalendarInstant } from './calendar'
export {
  MIN_YEAR, MAX_YEAR, MAX_NANOSECOND,
  isLeapYear, daysInMonth, daysInYear, padInt, normalizeDate,
  isCalendarInstant, isValidInstant, instantFromJsDate, instantToJsDate,
} from './calendar'

// Date
export type { CivilDate } from './date'
export {
  makeDate, ZERO_DATE, dateOf,
  isCivilDate, isValidDate, isZeroDate,
  dateToString, formatDate, parseDate,
  addDays, addMonths, addYears, daysBetween,
  compareDates, dateEquals, dateBefore, dateAfter,
} from './date'

// Time
export type { CivilTime } from './time'
export {
  makeTime, MIDNIGHT, timeOf,
  isCivilTime, isValidTime,
  timeToString, formatTime, parseTime,
  compareTimes, timeEquals, timeBefore, timeAfter,
} from './time'

// DateTime
export type { CivilDateTime } from './datetime'
export {
  makeDateTime, dateTimeOf, dateTimeToInstant,
  isCivilDateTime, isValidDateTime,
  dateTimeToString, formatDateTime, parseDateTime,
  compareDateTimes, dateTimeEquals, dateTimeBefore, dateTimeAfter,
} from './datetime'

// Text codecs + JSON boundary
export type { TextCodec, Codecs, CodecFields } from './codec'
export {
  createCodecs, codecs,
  marshalJSON, unmarshalJSON,
  createJsonReplacer, createJsonReviver,
} from './codec'

// Scalar conversion
export type { ScanInput, ScalarCodec } from './scan'
export {
  textInput, instantInput, toScanInput,
  dateValue, timeValue, dateTimeValue,
  scanDate, scanTime, scanDateTime,
  dateScalar, timeScalar, dateTimeScalar,
} from './scan'

// Adapter (persistence interface + in-memory mock)
export type {
  Adapter, AdapterOptions,
  ColumnKind, ColumnValue, Columns, ColumnName,
  Row, RowChanges, TableSchema,
} from './adapter'
export { defineTable, createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteAdapterOptions, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'
