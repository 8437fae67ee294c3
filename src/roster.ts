/**
 * Roster Model
 *
 * Participants, their eligibility, and the dates on which they served as
 * titular. All operations are pure: they take a roster and return a new one.
 *
 * Served dates are kept as strings because rosters may carry legacy entries
 * written before dates were stored as ISO values. Such entries are preserved
 * as-is and never matched against a week.
 */

import { type LocalDate, compareDates, parseDate } from './time-date'
import { type WeekId, isInWeek } from './week-calendar'
import type { ParticipantRecord } from './adapter'
import {
  ConfigurationError, DuplicateHandleError, InvalidDataError, NotFoundError,
} from './errors'

export { ConfigurationError, DuplicateHandleError }

// ============================================================================
// Types
// ============================================================================

export type Participant = {
  readonly handle: string
  readonly rank: string
  /** Non-empty means the participant cannot currently be drawn. */
  readonly exitReason: string | null
  readonly servedDates: readonly string[]
}

export type Roster = readonly Participant[]

export type EligibilityOptions = {
  excludedRank?: string
}

/** Source field names for each participant attribute. */
export type RosterFieldMap = {
  handle: string
  rank: string
  exitReason: string
  servedDates: string
}

export const DEFAULT_ROSTER_FIELDS: RosterFieldMap = {
  handle: 'handle',
  rank: 'rank',
  exitReason: 'exitReason',
  servedDates: 'servedDates',
}

// ============================================================================
// Served Dates
// ============================================================================

function asServedDate(entry: string): LocalDate | null {
  const parsed = parseDate(entry.trim())
  return parsed.ok ? parsed.value : null
}

/**
 * Deduplicate and order served dates: legacy entries first in their original
 * order, then ISO dates ascending.
 */
export function normalizeServedDates(entries: readonly string[]): string[] {
  const legacy: string[] = []
  const dates = new Set<LocalDate>()
  for (const entry of entries) {
    const date = asServedDate(entry)
    if (date) {
      dates.add(date)
    } else if (!legacy.includes(entry)) {
      legacy.push(entry)
    }
  }
  return [...legacy, ...[...dates].sort(compareDates)]
}

export function servedDatesEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((entry, i) => entry === b[i])
}

// ============================================================================
// Eligibility
// ============================================================================

export function isEligible(participant: Participant, options: EligibilityOptions = {}): boolean {
  if (participant.exitReason != null && participant.exitReason.trim() !== '') return false
  if (options.excludedRank != null && participant.rank === options.excludedRank) return false
  return true
}

export function eligible(roster: Roster, options: EligibilityOptions = {}): Participant[] {
  return roster.filter((p) => isEligible(p, options))
}

export function assertUniqueHandles(roster: Roster): void {
  const seen = new Set<string>()
  for (const p of roster) {
    if (seen.has(p.handle)) throw new DuplicateHandleError(p.handle)
    seen.add(p.handle)
  }
}

// ============================================================================
// Service Tracking
// ============================================================================

export function recordService(roster: Roster, handle: string, date: LocalDate): Participant[] {
  let found = false
  const next = roster.map((p) => {
    if (p.handle !== handle) return p
    found = true
    if (p.servedDates.some((entry) => asServedDate(entry) === date)) return p
    return { ...p, servedDates: normalizeServedDates([...p.servedDates, date]) }
  })
  if (!found) throw new NotFoundError(`Participant '${handle}' not found in roster`)
  return next
}

export function clearServiceInWeek(roster: Roster, week: WeekId): Participant[] {
  return roster.map((p) => {
    const kept = p.servedDates.filter((entry) => {
      const date = asServedDate(entry)
      return date === null || !isInWeek(date, week)
    })
    return kept.length === p.servedDates.length ? p : { ...p, servedDates: kept }
  })
}

export function clearAllService(roster: Roster): Participant[] {
  return roster.map((p) => (p.servedDates.length === 0 ? p : { ...p, servedDates: [] }))
}

// ============================================================================
// Record Boundary
// ============================================================================

export function fromRecord(record: ParticipantRecord): Participant {
  return {
    handle: record.handle,
    rank: record.rank,
    exitReason: record.exitReason,
    servedDates: normalizeServedDates(record.servedDates),
  }
}

export function toRecord(participant: Participant): ParticipantRecord {
  return {
    handle: participant.handle,
    rank: participant.rank,
    exitReason: participant.exitReason,
    servedDates: [...participant.servedDates],
  }
}

function readServedDates(value: unknown, handle: string): string[] {
  if (value == null) return []
  if (Array.isArray(value)) {
    return value.map((entry) => {
      if (typeof entry !== 'string') {
        throw new InvalidDataError(`Served dates of '${handle}' must be strings`)
      }
      return entry
    })
  }
  if (typeof value === 'string') {
    // Legacy delimited column
    return value.split(/[,;]/).map((s) => s.trim()).filter((s) => s !== '')
  }
  throw new InvalidDataError(`Served dates of '${handle}' must be a list or a delimited string`)
}

/**
 * Validate one raw roster row from an import source.
 * A missing required field is a configuration problem with the source itself.
 */
export function toParticipant(
  record: Readonly<Record<string, unknown>>,
  fields: RosterFieldMap = DEFAULT_ROSTER_FIELDS,
): Participant {
  for (const required of [fields.handle, fields.rank]) {
    if (!(required in record)) {
      throw new ConfigurationError(`Roster source is missing required field '${required}'`)
    }
  }

  const rawHandle = record[fields.handle]
  if (typeof rawHandle !== 'string' || rawHandle.trim() === '') {
    throw new InvalidDataError(`Participant handle must be a non-empty string`)
  }
  const handle = rawHandle.trim()

  const rawRank = record[fields.rank]
  if (typeof rawRank !== 'string' && typeof rawRank !== 'number') {
    throw new InvalidDataError(`Rank of '${handle}' must be a string or number`)
  }

  const rawExit = record[fields.exitReason]
  const exitReason = rawExit == null ? '' : String(rawExit).trim()

  return {
    handle,
    rank: String(rawRank).trim(),
    exitReason: exitReason === '' ? null : exitReason,
    servedDates: normalizeServedDates(readServedDates(record[fields.servedDates], handle)),
  }
}
