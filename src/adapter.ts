/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * The roster half is keyed by participant handle, the ledger half by week
 * label. All methods are async so that both embedded and remote stores fit.
 */

import { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

export { DuplicateKeyError, NotFoundError, InvalidDataError }

// ============================================================================
// Entity Types
// ============================================================================

export type ParticipantRecord = {
  handle: string
  rank: string
  exitReason: string | null
  /** Serialized served dates; may hold legacy entries that are not ISO dates. */
  servedDates: string[]
}

export type AssignmentRecord = {
  date: string
  titular: string
  substitute: string
  week: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Roster
  getParticipants(): Promise<ParticipantRecord[]>
  getParticipant(handle: string): Promise<ParticipantRecord | null>
  upsertParticipant(participant: ParticipantRecord): Promise<void>
  setServedDates(handle: string, servedDates: string[]): Promise<void>

  // Ledger
  getAssignments(): Promise<AssignmentRecord[]>
  hasWeek(week: string): Promise<boolean>
  insertAssignments(rows: AssignmentRecord[]): Promise<void>
  deleteAssignmentsByWeek(week: string): Promise<void>
  deleteAssignmentsByDate(dates: string[]): Promise<void>
  deleteAllAssignments(): Promise<void>

  // Lifecycle (optional, for persistent adapters)
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    participants: new Map<string, ParticipantRecord>(),
    // Keyed by date; one assignment per calendar date
    assignments: new Map<string, AssignmentRecord>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function sameWeek(stored: string, week: string): boolean {
    return stored.trim() === week.trim()
  }

  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
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
          restoreState(snapshot)
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Roster
    // ================================================================
    async getParticipants() {
      return [...state.participants.values()].map(clone)
    },

    async getParticipant(handle: string) {
      const p = state.participants.get(handle)
      return p ? clone(p) : null
    },

    async upsertParticipant(participant: ParticipantRecord) {
      if (participant.handle.trim() === '') {
        throw new InvalidDataError('Participant handle must not be empty')
      }
      state.participants.set(participant.handle, clone(participant))
    },

    async setServedDates(handle: string, servedDates: string[]) {
      const existing = state.participants.get(handle)
      if (!existing) throw new NotFoundError(`Participant '${handle}' not found`)
      state.participants.set(handle, { ...existing, servedDates: [...servedDates] })
    },

    // ================================================================
    // Ledger
    // ================================================================
    async getAssignments() {
      return [...state.assignments.values()].map(clone)
    },

    async hasWeek(week: string) {
      for (const a of state.assignments.values()) {
        if (sameWeek(a.week, week)) return true
      }
      return false
    },

    async insertAssignments(rows: AssignmentRecord[]) {
      const seen = new Set<string>()
      for (const row of rows) {
        if (row.titular === row.substitute) {
          throw new InvalidDataError(`Titular and substitute must differ on ${row.date}`)
        }
        if (state.assignments.has(row.date) || seen.has(row.date)) {
          throw new DuplicateKeyError(`Assignment for '${row.date}' already exists`)
        }
        seen.add(row.date)
      }
      for (const row of rows) {
        state.assignments.set(row.date, clone(row))
      }
    },

    async deleteAssignmentsByWeek(week: string) {
      for (const [date, a] of state.assignments) {
        if (sameWeek(a.week, week)) state.assignments.delete(date)
      }
    },

    async deleteAssignmentsByDate(dates: string[]) {
      for (const date of dates) state.assignments.delete(date)
    },

    async deleteAllAssignments() {
      state.assignments.clear()
    },
  }

  return adapter
}
