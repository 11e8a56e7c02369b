/**
 * SQLite Adapter
 *
 * Production implementation of the civil table adapter using better-sqlite3.
 * Every civil column is a TEXT column holding the scalar form, so stored
 * values sort chronologically and compare with plain BETWEEN.
 */
import Database from 'better-sqlite3'
import {
  type Adapter, type AdapterOptions, type Columns, type ColumnName, type TableSchema,
  DuplicateKeyError, InvalidDataError, NotFoundError,
  encodeRow, encodeColumn, decodeRow, changedColumns,
} from './adapter'

export { DuplicateKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  execute(sql: string): Promise<void>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter<C extends Columns> = Adapter<C> & SqliteExtras

export type SqliteAdapterOptions = AdapterOptions & {
  /** Called with each SQL statement better-sqlite3 executes. */
  verbose?: (message: string) => void
}

// ============================================================================
// Schema DDL
// ============================================================================

function quote(identifier: string): string {
  return `"${identifier}"`
}

function schemaSql<C extends Columns>(table: TableSchema<C>): string {
  const columns = table.columnNames.map((column) => `    ${quote(column)} TEXT NOT NULL`)
  const indices = table.columnNames.map((column) =>
    `  CREATE INDEX IF NOT EXISTS ${quote(`idx_${table.name}_${column}`)} ON ${quote(table.name)}(${quote(column)});`)
  return [
    `  CREATE TABLE IF NOT EXISTS ${quote(table.name)} (`,
    ['    id TEXT PRIMARY KEY', ...columns].join(',\n'),
    '  );',
    ...indices,
  ].join('\n')
}

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/NOT NULL constraint|CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

function asRecord(row: unknown): object | undefined {
  return typeof row === 'object' && row !== null ? row : undefined
}

function names(rows: unknown[]): string[] {
  return rows.flatMap((row) => {
    const record = asRecord(row)
    const name: unknown = record ? Reflect.get(record, 'name') : undefined
    return typeof name === 'string' ? [name] : []
  })
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter<C extends Columns>(
  path: string,
  table: TableSchema<C>,
  options: SqliteAdapterOptions = {}
): Promise<SqliteAdapter<C>> {
  const { verbose, ...config } = options
  const db = new Database(path, verbose ? { verbose: (message?: unknown) => verbose(String(message)) } : {})
  try {
    db.exec(schemaSql(table))
  } catch (e) {
    db.close()
    throw e
  }

  const tableName = quote(table.name)
  let _inTx = false

  function decodeAll(rows: unknown[]) {
    return rows.flatMap((row) => {
      const record = asRecord(row)
      return record ? [decodeRow(table, record)] : []
    })
  }

  function bound(column: ColumnName<C>, which: string, value: unknown): string {
    const result = encodeColumn(table.columns[column], value, config)
    if (!result.ok)
      throw new InvalidDataError(`Invalid ${which} bound for ${table.name}.${column}: ${result.error.message}`)
    return result.value
  }

  const adapter: SqliteAdapter<C> = {
    table,

    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      db.exec('BEGIN IMMEDIATE')
      _inTx = true
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Rows
    // ================================================================
    async insert(row) {
      const encoded = encodeRow(table, row, table.columnNames, config)
      const columns = [...encoded.keys()].map(quote)
      const placeholders = ['?', ...columns.map(() => '?')].join(', ')
      safe(() =>
        db.prepare(
          `INSERT INTO ${tableName} (${['id', ...columns].join(', ')}) VALUES (${placeholders})`,
        ).run(row.id, ...encoded.values()),
      )
    },

    async update(id, changes) {
      const encoded = encodeRow(table, changes, changedColumns(table, changes), config)
      if (encoded.size === 0) {
        const exists = db.prepare(`SELECT 1 FROM ${tableName} WHERE id = ?`).get(id)
        if (exists === undefined) throw new NotFoundError(`Row '${id}' not found in '${table.name}'`)
        return
      }
      const assignments = [...encoded.keys()].map((column) => `${quote(column)} = ?`).join(', ')
      const info = safe(() =>
        db.prepare(`UPDATE ${tableName} SET ${assignments} WHERE id = ?`).run(...encoded.values(), id),
      )
      if (info.changes === 0) throw new NotFoundError(`Row '${id}' not found in '${table.name}'`)
    },

    async get(id) {
      const record = asRecord(db.prepare(`SELECT * FROM ${tableName} WHERE id = ?`).get(id))
      return record ? decodeRow(table, record) : null
    },

    async all() {
      return decodeAll(db.prepare(`SELECT * FROM ${tableName} ORDER BY id`).all())
    },

    async findBetween(column, from, to) {
      const lo = bound(column, 'lower', from)
      const hi = bound(column, 'upper', to)
      const col = quote(column)
      return decodeAll(
        db.prepare(`SELECT * FROM ${tableName} WHERE ${col} BETWEEN ? AND ? ORDER BY ${col}, id`).all(lo, hi),
      )
    },

    async delete(id) {
      safe(() => db.prepare(`DELETE FROM ${tableName} WHERE id = ?`).run(id))
    },

    async close() {
      db.close()
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      return names(db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").all())
    },

    async getTableColumns(name: string) {
      return names(db.prepare(`PRAGMA table_info(${quote(name)})`).all())
    },

    async listIndices(name: string) {
      return names(db.prepare(`PRAGMA index_list(${quote(name)})`).all())
    },

    async execute(sql: string) {
      safe(() => db.exec(sql))
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
