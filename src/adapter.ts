/**
 * Adapter
 *
 * Run-history persistence interface + in-memory implementation.
 * All methods are async so the SQLite adapter and future stores share one shape.
 */

import type { Instant } from './time-date'
import { compareInstants } from './time-date'

export type { Instant } from './time-date'

// ============================================================================
// Entity Types
// ============================================================================

/** One execution attempt of a task. */
export type RunRecord = {
  taskName: string
  startedAt: Instant
  ok: boolean
  error?: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export type HistoryAdapter = {
  append(record: RunRecord): Promise<void>
  /** Records of one task, oldest first. */
  list(taskName: string): Promise<RunRecord[]>
  /** Records of every task, ordered by start then insertion. */
  listAll(): Promise<RunRecord[]>
  /** Drops the records of one task, or all records when no name is given. */
  clear(taskName?: string): Promise<void>
  close(): Promise<void>
}

// ============================================================================
// In-Memory Adapter
// ============================================================================

export type MemoryAdapterOptions = {
  /** Keep only the newest N records per task. */
  maxRecordsPerTask?: number
}

export function createMemoryAdapter(options: MemoryAdapterOptions = {}): HistoryAdapter {
  const { maxRecordsPerTask } = options
  if (maxRecordsPerTask !== undefined && (!Number.isInteger(maxRecordsPerTask) || maxRecordsPerTask < 1)) {
    throw new RangeError(`maxRecordsPerTask must be a positive integer, got ${maxRecordsPerTask}`)
  }

  let seq = 0
  const byTask = new Map<string, Array<{ seq: number; record: RunRecord }>>()

  function copy(record: RunRecord): RunRecord {
    return { ...record }
  }

  return {
    async append(record) {
      let rows = byTask.get(record.taskName)
      if (!rows) {
        rows = []
        byTask.set(record.taskName, rows)
      }
      rows.push({ seq: seq++, record: copy(record) })
      if (maxRecordsPerTask !== undefined && rows.length > maxRecordsPerTask) {
        rows.splice(0, rows.length - maxRecordsPerTask)
      }
    },

    async list(taskName) {
      return (byTask.get(taskName) ?? []).map((r) => copy(r.record))
    },

    async listAll() {
      return [...byTask.values()]
        .flat()
        .sort((a, b) => compareInstants(a.record.startedAt, b.record.startedAt) || a.seq - b.seq)
        .map((r) => copy(r.record))
    },

    async clear(taskName) {
      if (taskName === undefined) byTask.clear()
      else byTask.delete(taskName)
    },

    async close() {
      byTask.clear()
    },
  }
}
