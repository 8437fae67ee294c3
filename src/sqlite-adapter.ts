/**
 * SQLite Adapter
 *
 * Production implementation of the weekdraw adapter using better-sqlite3.
 * Served dates are stored as a JSON array per participant; older rosters that
 * kept them as one delimited text column are read tolerantly.
 */
import Database from 'better-sqlite3'
import type { Adapter, ParticipantRecord, AssignmentRecord } from './adapter'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './adapter'

export { DuplicateKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS participant (
    handle TEXT PRIMARY KEY,
    rank TEXT NOT NULL,
    exit_reason TEXT,
    served_dates TEXT NOT NULL DEFAULT '[]'
  );

  CREATE TABLE IF NOT EXISTS assignment (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    draw_date TEXT NOT NULL UNIQUE,
    titular TEXT NOT NULL,
    substitute TEXT NOT NULL,
    week_id TEXT NOT NULL,
    CHECK (titular <> substitute)
  );
  CREATE INDEX IF NOT EXISTS idx_assignment_week ON assignment(week_id);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  if (/NOT NULL constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ParticipantRow = {
  handle: string
  rank: string
  exit_reason: string | null
  served_dates: string
}

type AssignmentRow = {
  draw_date: string
  titular: string
  substitute: string
  week_id: string
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

export function decodeServedDates(text: string): string[] {
  const trimmed = text.trim()
  if (trimmed === '') return []
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed)
      if (Array.isArray(parsed)) {
        return parsed.filter((entry): entry is string => typeof entry === 'string')
      }
    } catch {
      // Not JSON after all; fall through to the delimited form
    }
  }
  return trimmed.split(/[,;]/).map((s) => s.trim()).filter((s) => s !== '')
}

function toParticipant(row: ParticipantRow): ParticipantRecord {
  return {
    handle: row.handle,
    rank: row.rank,
    exitReason: row.exit_reason,
    servedDates: decodeServedDates(row.served_dates),
  }
}

function toAssignment(row: AssignmentRow): AssignmentRecord {
  return {
    date: row.draw_date,
    titular: row.titular,
    substitute: row.substitute,
    week: row.week_id,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
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
    // Roster
    // ================================================================
    async getParticipants() {
      const rows = db.prepare('SELECT * FROM participant ORDER BY handle').all() as ParticipantRow[]
      return rows.map(toParticipant)
    },

    async getParticipant(handle: string) {
      const row = db.prepare('SELECT * FROM participant WHERE handle = ?').get(handle) as ParticipantRow | undefined
      return row ? toParticipant(row) : null
    },

    async upsertParticipant(participant: ParticipantRecord) {
      if (participant.handle.trim() === '') {
        throw new InvalidDataError('Participant handle must not be empty')
      }
      safe(() =>
        db.prepare(`
          INSERT INTO participant (handle, rank, exit_reason, served_dates) VALUES (?, ?, ?, ?)
          ON CONFLICT(handle) DO UPDATE SET
            rank = excluded.rank,
            exit_reason = excluded.exit_reason,
            served_dates = excluded.served_dates
        `).run(
          participant.handle,
          participant.rank,
          participant.exitReason,
          JSON.stringify(participant.servedDates),
        ),
      )
    },

    async setServedDates(handle: string, servedDates: string[]) {
      const result = db.prepare('UPDATE participant SET served_dates = ? WHERE handle = ?')
        .run(JSON.stringify(servedDates), handle)
      if (result.changes === 0) throw new NotFoundError(`Participant '${handle}' not found`)
    },

    // ================================================================
    // Ledger
    // ================================================================
    async getAssignments() {
      const rows = db.prepare('SELECT * FROM assignment ORDER BY draw_date').all() as AssignmentRow[]
      return rows.map(toAssignment)
    },

    async hasWeek(week: string) {
      const row = db.prepare('SELECT 1 AS found FROM assignment WHERE TRIM(week_id) = ? LIMIT 1')
        .get(week.trim()) as { found: number } | undefined
      return row !== undefined
    },

    async insertAssignments(rows: AssignmentRecord[]) {
      const insert = db.prepare(
        'INSERT INTO assignment (draw_date, titular, substitute, week_id) VALUES (?, ?, ?, ?)',
      )
      // Statement-level atomicity even outside an adapter transaction
      const insertAll = db.transaction((batch: AssignmentRecord[]) => {
        for (const r of batch) insert.run(r.date, r.titular, r.substitute, r.week)
      })
      safe(() => insertAll(rows))
    },

    async deleteAssignmentsByWeek(week: string) {
      db.prepare('DELETE FROM assignment WHERE TRIM(week_id) = ?').run(week.trim())
    },

    async deleteAssignmentsByDate(dates: string[]) {
      const del = db.prepare('DELETE FROM assignment WHERE draw_date = ?')
      for (const date of dates) del.run(date)
    },

    async deleteAllAssignments() {
      db.prepare('DELETE FROM assignment').run()
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras (introspection)
    // ================================================================
    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare(`PRAGMA table_info("${table}")`).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
