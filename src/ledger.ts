/**
 * Schedule Ledger
 *
 * Durable record of every week's assignments, one set per week. Week labels
 * are derived from each row's date on the way in and on the way out; stored
 * labels are only trusted for lookups, and then only after trimming.
 */

import { type LocalDate, compareDates, parseDate } from './time-date'
import {
  type WeekId,
  weekId as weekIdOf, formatWeekId, compareWeekIds, isInWeek, mondayOfWeek, weekDates,
} from './week-calendar'
import type { Adapter, AssignmentRecord } from './adapter'
import { AlreadyDrawnError, DuplicateKeyError, MalformedInputError } from './errors'
import type { Logger } from './logger'

export { AlreadyDrawnError, MalformedInputError }

// ============================================================================
// Types
// ============================================================================

export type AssignmentInput = {
  date: LocalDate
  titular: string
  substitute: string
}

export type Assignment = AssignmentInput & {
  weekId: WeekId
}

export type WeekSchedule = {
  weekId: WeekId
  label: string
  assignments: Assignment[]
}

type LedgerDeps = {
  adapter: Adapter
  logger: Logger
}

export type ScheduleLedger = {
  hasWeek(week: WeekId): Promise<boolean>
  appendWeek(week: WeekId, rows: readonly AssignmentInput[]): Promise<Assignment[]>
  replaceWeek(week: WeekId, rows: readonly AssignmentInput[]): Promise<Assignment[]>
  reset(): Promise<void>
  history(): Promise<WeekSchedule[]>
  getWeek(week: WeekId): Promise<Assignment[]>
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks a full week's rows: every date inside the week and present once,
 * titular and substitute distinct, no titular twice.
 */
export function toAssignments(week: WeekId, rows: readonly AssignmentInput[]): Assignment[] {
  const label = formatWeekId(week)
  const dates = new Set<string>()
  const titulars = new Set<string>()

  for (const row of rows) {
    if (!isInWeek(row.date, week)) {
      throw new MalformedInputError(`Date ${row.date} is not in week ${label}`)
    }
    if (dates.has(row.date)) {
      throw new MalformedInputError(`Date ${row.date} appears more than once`)
    }
    if (row.titular === row.substitute) {
      throw new MalformedInputError(`Titular and substitute are both '${row.titular}' on ${row.date}`)
    }
    if (titulars.has(row.titular)) {
      throw new MalformedInputError(`'${row.titular}' is titular more than once in week ${label}`)
    }
    dates.add(row.date)
    titulars.add(row.titular)
  }

  return [...rows]
    .sort((a, b) => compareDates(a.date, b.date))
    .map((row) => ({
      date: row.date,
      titular: row.titular,
      substitute: row.substitute,
      weekId: weekIdOf(row.date),
    }))
}

function toRecord(a: Assignment): AssignmentRecord {
  return {
    date: a.date,
    titular: a.titular,
    substitute: a.substitute,
    week: formatWeekId(a.weekId),
  }
}

// ============================================================================
// Ledger
// ============================================================================

export function createScheduleLedger(deps: LedgerDeps): ScheduleLedger {
  const { adapter, logger } = deps

  function fromRecord(record: AssignmentRecord): Assignment | null {
    const parsed = parseDate(record.date.trim())
    if (!parsed.ok) {
      logger.warn(`Skipping ledger row with unreadable date '${record.date}'`)
      return null
    }
    return {
      date: parsed.value,
      titular: record.titular,
      substitute: record.substitute,
      weekId: weekIdOf(parsed.value),
    }
  }

  async function hasWeek(week: WeekId): Promise<boolean> {
    return adapter.hasWeek(formatWeekId(week))
  }

  async function appendWeek(week: WeekId, rows: readonly AssignmentInput[]): Promise<Assignment[]> {
    const assignments = toAssignments(week, rows)
    const label = formatWeekId(week)

    return adapter.transaction(async () => {
      if (await adapter.hasWeek(label)) throw new AlreadyDrawnError(label)
      try {
        await adapter.insertAssignments(assignments.map(toRecord))
      } catch (e) {
        // Lost a race against another writer for the same dates
        if (e instanceof DuplicateKeyError) throw new AlreadyDrawnError(label)
        throw e
      }
      return assignments
    })
  }

  async function replaceWeek(week: WeekId, rows: readonly AssignmentInput[]): Promise<Assignment[]> {
    const assignments = toAssignments(week, rows)
    const label = formatWeekId(week)

    return adapter.transaction(async () => {
      await adapter.deleteAssignmentsByWeek(label)
      // Rows of this week stored under a stray label
      await adapter.deleteAssignmentsByDate(weekDates(mondayOfWeek(week)))
      await adapter.insertAssignments(assignments.map(toRecord))
      return assignments
    })
  }

  async function reset(): Promise<void> {
    await adapter.transaction(() => adapter.deleteAllAssignments())
  }

  async function history(): Promise<WeekSchedule[]> {
    const byWeek = new Map<string, WeekSchedule>()
    for (const record of await adapter.getAssignments()) {
      const a = fromRecord(record)
      if (!a) continue
      const label = formatWeekId(a.weekId)
      let entry = byWeek.get(label)
      if (!entry) {
        entry = { weekId: a.weekId, label, assignments: [] }
        byWeek.set(label, entry)
      }
      entry.assignments.push(a)
    }

    const weeks = [...byWeek.values()].sort((a, b) => compareWeekIds(a.weekId, b.weekId))
    for (const w of weeks) {
      w.assignments.sort((a, b) => compareDates(a.date, b.date))
    }
    return weeks
  }

  async function getWeek(week: WeekId): Promise<Assignment[]> {
    const label = formatWeekId(week)
    const found = (await history()).find((w) => w.label === label)
    return found ? found.assignments : []
  }

  return {
    hasWeek,
    appendWeek,
    replaceWeek,
    reset,
    history,
    getWeek,
  }
}
