/**
 * Adapter
 *
 * Typed persistence interface for tables of civil-valued columns, plus an
 * in-memory mock implementation. Values are stored as their scalar text
 * (`Value`) and read back through `Scan`, exactly as a SQL driver would.
 * All methods are async so sync and async backends share one interface.
 */

import { type Result, Ok, Err } from './result'
import {
  type CivilError,
  DuplicateKeyError, NotFoundError, InvalidDataError, ValidationError,
} from './errors'
import { type CivilConfig, resolveConfig } from './config'
import { createCodecs } from './codec'
import { type CivilDate, isCivilDate } from './date'
import { type CivilTime, isCivilTime } from './time'
import { type CivilDateTime, isCivilDateTime } from './datetime'
import { dateScalar, timeScalar, dateTimeScalar } from './scan'

export { DuplicateKeyError, NotFoundError, InvalidDataError, ValidationError }

// ============================================================================
// Schema Types
// ============================================================================

export type ColumnKind = 'date' | 'time' | 'datetime'

export type ColumnValue<K> =
  K extends 'date' ? CivilDate :
  K extends 'time' ? CivilTime :
  K extends 'datetime' ? CivilDateTime :
  never

export type Columns = Record<string, ColumnKind>

export type ColumnName<C extends Columns> = Extract<keyof C, string>

export type Row<C extends Columns> = { id: string } & { [K in ColumnName<C>]: ColumnValue<C[K]> }

export type RowChanges<C extends Columns> = Partial<{ [K in ColumnName<C>]: ColumnValue<C[K]> }>

export type TableSchema<C extends Columns> = {
  readonly name: string
  readonly columns: Readonly<C>
  readonly columnNames: readonly ColumnName<C>[]
}

export type AdapterOptions = CivilConfig

export interface Adapter<C extends Columns> {
  readonly table: TableSchema<C>
  transaction<T>(fn: () => Promise<T>): Promise<T>
  insert(row: Row<C>): Promise<void>
  update(id: string, changes: RowChanges<C>): Promise<void>
  get(id: string): Promise<Row<C> | null>
  all(): Promise<Row<C>[]>
  /** Rows whose `column` lies in [from, to], ordered by that column then id. */
  findBetween<K extends ColumnName<C>>(
    column: K,
    from: ColumnValue<C[K]>,
    to: ColumnValue<C[K]>
  ): Promise<Row<C>[]>
  delete(id: string): Promise<void>
  close(): Promise<void>
}

// ============================================================================
// Schema Definition
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

export function defineTable<C extends Columns>(name: string, columns: C): TableSchema<C> {
  if (!IDENTIFIER.test(name)) throw new ValidationError(`Invalid table name: '${name}'`)
  const columnNames = Object.keys(columns) as ColumnName<C>[]
  for (const column of columnNames) {
    if (!IDENTIFIER.test(column)) throw new ValidationError(`Invalid column name: '${column}'`)
    if (column.toLowerCase() === 'id') throw new ValidationError(`Column name 'id' is reserved in '${name}'`)
  }
  return { name, columns, columnNames }
}

// ============================================================================
// Scalar Mapping (shared by every adapter)
// ============================================================================

/** Scalar text for one column value; strict configs encode through the checking codecs. */
export function encodeColumn(
  kind: ColumnKind,
  value: unknown,
  config?: CivilConfig
): Result<string, CivilError> {
  const { strict } = resolveConfig(config)
  const codecs = createCodecs(config)
  switch (kind) {
    case 'date':
      if (!isCivilDate(value)) break
      return strict ? codecs.date.toText(value) : Ok(dateScalar.value(value))
    case 'time':
      if (!isCivilTime(value)) break
      return strict ? codecs.time.toText(value) : Ok(timeScalar.value(value))
    case 'datetime':
      if (!isCivilDateTime(value)) break
      return strict ? codecs.dateTime.toText(value) : Ok(dateTimeScalar.value(value))
  }
  return Err(new InvalidDataError(`Value is not a ${kind}`))
}

export function decodeColumn(kind: ColumnKind, raw: unknown): Result<unknown, CivilError> {
  switch (kind) {
    case 'date':
      return dateScalar.scanRaw(raw)
    case 'time':
      return timeScalar.scanRaw(raw)
    case 'datetime':
      return dateTimeScalar.scanRaw(raw)
  }
}

/** Encodes every column of `row` present in `columns`. Throws InvalidDataError. */
export function encodeRow<C extends Columns>(
  table: TableSchema<C>,
  row: object,
  columns: readonly ColumnName<C>[],
  config?: CivilConfig
): Map<ColumnName<C>, string> {
  const encoded = new Map<ColumnName<C>, string>()
  for (const column of columns) {
    const result = encodeColumn(table.columns[column], Reflect.get(row, column), config)
    if (!result.ok)
      throw new InvalidDataError(`Cannot write ${table.name}.${column}: ${result.error.message}`)
    encoded.set(column, result.value)
  }
  return encoded
}

/** Scans a stored record back into a typed row. Throws InvalidDataError. */
export function decodeRow<C extends Columns>(table: TableSchema<C>, record: object): Row<C> {
  const id: unknown = Reflect.get(record, 'id')
  if (typeof id !== 'string') throw new InvalidDataError(`Row in '${table.name}' has no text id`)

  const row: Record<string, unknown> = { id }
  for (const column of table.columnNames) {
    const result = decodeColumn(table.columns[column], Reflect.get(record, column))
    if (!result.ok)
      throw new InvalidDataError(`Cannot read ${table.name}.${column} for '${id}': ${result.error.message}`)
    row[column] = result.value
  }
  return row as Row<C>
}

/** Column names of `changes` that belong to the table. */
export function changedColumns<C extends Columns>(
  table: TableSchema<C>,
  changes: RowChanges<C>
): ColumnName<C>[] {
  return table.columnNames.filter((column) => Object.hasOwn(changes, column))
}

// ============================================================================
// Mock Adapter
// ============================================================================

type StoredRow = Record<string, string>

export function createMockAdapter<C extends Columns>(
  table: TableSchema<C>,
  options: AdapterOptions = {}
): Adapter<C> {
  // ---- State ----
  let rows = new Map<string, StoredRow>()

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: Map<string, StoredRow> | null = null

  function store(id: string, encoded: Map<ColumnName<C>, string>, base: StoredRow = { id }) {
    const stored: StoredRow = { ...base }
    for (const [column, text] of encoded) stored[column] = text
    rows.set(id, stored)
  }

  // Plain code-unit order, matching SQLite's BINARY collation
  function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0
  }

  function sorted(list: StoredRow[], column?: ColumnName<C>): StoredRow[] {
    return [...list].sort((a, b) =>
      (column ? compareText(a[column] ?? '', b[column] ?? '') : 0) ||
      compareText(a.id ?? '', b.id ?? ''))
  }

  const adapter: Adapter<C> = {
    table,

    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = structuredClone(rows)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          rows = snapshot
          snapshot = null
        }
        throw e
      }
    },

    async insert(row) {
      if (rows.has(row.id)) throw new DuplicateKeyError(`Row '${row.id}' already exists in '${table.name}'`)
      store(row.id, encodeRow(table, row, table.columnNames, options))
    },

    async update(id, changes) {
      const existing = rows.get(id)
      if (!existing) throw new NotFoundError(`Row '${id}' not found in '${table.name}'`)
      store(id, encodeRow(table, changes, changedColumns(table, changes), options), existing)
    },

    async get(id) {
      const stored = rows.get(id)
      return stored ? decodeRow(table, stored) : null
    },

    async all() {
      return sorted([...rows.values()]).map((stored) => decodeRow(table, stored))
    },

    async findBetween(column, from, to) {
      const kind = table.columns[column]
      const lo = encodeColumn(kind, from, options)
      if (!lo.ok) throw new InvalidDataError(`Invalid lower bound for ${table.name}.${column}: ${lo.error.message}`)
      const hi = encodeColumn(kind, to, options)
      if (!hi.ok) throw new InvalidDataError(`Invalid upper bound for ${table.name}.${column}: ${hi.error.message}`)

      const matches = [...rows.values()].filter((stored) => {
        const text = stored[column] ?? ''
        return text >= lo.value && text <= hi.value
      })
      return sorted(matches, column).map((stored) => decodeRow(table, stored))
    },

    async delete(id) {
      rows.delete(id)
    },

    async close() {
      rows.clear()
    },
  }

  return adapter
}
