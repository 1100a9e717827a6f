/**
 * SQLite Adapter
 *
 * Run-history adapter backed by better-sqlite3. Instants are stored in the
 * default instant pattern, so rows stay readable from the sqlite3 shell.
 */
import Database from 'better-sqlite3'
import type { HistoryAdapter, RunRecord } from './adapter'
import { formatInstant, parseInstant } from './time-format'

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS run_record (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_name TEXT NOT NULL,
    started_at TEXT NOT NULL,
    ok INTEGER NOT NULL CHECK (ok IN (0, 1)),
    error TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_run_record_task ON run_record (task_name, id);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// SQL Row Types
// ============================================================================

type RunRow = {
  id: number
  task_name: string
  started_at: string
  ok: number
  error: string | null
}

type SchemaVersionRow = { v: number | null }

function toRecord(row: RunRow): RunRecord {
  const record: RunRecord = {
    taskName: row.task_name,
    startedAt: parseInstant(row.started_at),
    ok: row.ok === 1,
  }
  if (row.error !== null) record.error = row.error
  return record
}

// ============================================================================
// Factory
// ============================================================================

export type SqliteHistoryAdapter = HistoryAdapter & {
  /** Highest applied schema version. */
  schemaVersion(): Promise<number>
}

export async function createSqliteAdapter(path: string): Promise<SqliteHistoryAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare<[number, string]>('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const insertRun = db.prepare<[string, string, number, string | null]>(
    'INSERT INTO run_record (task_name, started_at, ok, error) VALUES (?, ?, ?, ?)',
  )
  const selectByTask = db.prepare<[string], RunRow>('SELECT * FROM run_record WHERE task_name = ? ORDER BY id')
  const selectAll = db.prepare<[], RunRow>('SELECT * FROM run_record ORDER BY started_at, id')
  const deleteByTask = db.prepare<[string]>('DELETE FROM run_record WHERE task_name = ?')
  const deleteAll = db.prepare<[]>('DELETE FROM run_record')

  return {
    async append(record) {
      insertRun.run(record.taskName, formatInstant(record.startedAt), record.ok ? 1 : 0, record.error ?? null)
    },

    async list(taskName) {
      return selectByTask.all(taskName).map(toRecord)
    },

    async listAll() {
      return selectAll.all().map(toRecord)
    },

    async clear(taskName) {
      if (taskName === undefined) deleteAll.run()
      else deleteByTask.run(taskName)
    },

    async close() {
      if (db.open) db.close()
    },

    async schemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },
  }
}
