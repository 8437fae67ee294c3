/**
 * Public API Module
 *
 * Consumer-facing interface that ties the calendar, roster, draw engine,
 * ledger and eligibility tracker together. Handles config validation, the
 * write queue, and event emission.
 */

import { type LocalDate, dateAfter, parseDate, todayLocal } from './time-date'
import {
  type WeekId,
  formatWeekId, mondayOfWeek, parseWeekId, resolveWeekId, upcomingMondays, weekDates, weekId as weekIdOf,
} from './week-calendar'
import type { Adapter } from './adapter'
import { drawAssignments } from './draw-engine'
import {
  type Assignment, type AssignmentInput, type WeekSchedule,
  createScheduleLedger,
} from './ledger'
import { createEligibilityTracker } from './eligibility'
import {
  type Participant, type RosterFieldMap,
  DEFAULT_ROSTER_FIELDS, assertUniqueHandles, toParticipant, toRecord,
} from './roster'
import { type Result, Ok, Err } from './result'
import { type Logger, consoleLogger } from './logger'

// ============================================================================
// Error Classes
// ============================================================================

export {
  ConfigurationError, InsufficientPoolError, AlreadyDrawnError,
  WeekNotDrawableError, MalformedInputError,
} from './errors'
import {
  ConfigurationError, InsufficientPoolError, AlreadyDrawnError,
  WeekNotDrawableError, MalformedInputError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'

export const DEFAULT_HORIZON_WEEKS = 4
export const DEFAULT_RESET_CONFIRMATION = 'RESET'

export type WeekDrawConfig = {
  adapter: Adapter
  /** Participants of this rank are never drawn. */
  excludedRank?: string
  horizonWeeks?: number
  /** Literal value `resetAll` must receive before it clears anything. */
  resetConfirmation?: string
  rosterFields?: Partial<RosterFieldMap>
  today?: () => LocalDate
  random?: () => number
  logger?: Logger
}

export type DrawFailure = InsufficientPoolError | AlreadyDrawnError | WeekNotDrawableError

/** One row of a manual edit, as typed by a user. */
export type EditedAssignment = {
  date: string
  titular: string
  substitute: string
}

export type WeekDrawEvents = {
  drawn: { week: WeekId; assignments: Assignment[] }
  edited: { week: WeekId; assignments: Assignment[] }
  reset: Record<string, never>
}

export type WeekDrawEvent = keyof WeekDrawEvents

export type WeekDraw = {
  listDrawableWeeks(horizonWeeks?: number): Promise<WeekId[]>
  drawWeek(week: WeekId | string): Promise<Result<Assignment[], DrawFailure>>
  editWeek(
    week: WeekId | string,
    rows: readonly EditedAssignment[],
  ): Promise<Result<Assignment[], MalformedInputError>>
  resetAll(confirmation: string): Promise<Result<{ performed: boolean }, never>>
  getHistory(): Promise<WeekSchedule[]>
  getWeek(week: WeekId | string): Promise<Assignment[]>
  importRoster(records: readonly Readonly<Record<string, unknown>>[]): Promise<Participant[]>
  getRoster(): Promise<Participant[]>
  on<E extends WeekDrawEvent>(event: E, handler: (payload: WeekDrawEvents[E]) => void): void
}

// ============================================================================
// Implementation
// ============================================================================

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`)
  }
}

export function createWeekDraw(config: WeekDrawConfig): WeekDraw {
  if (!config || typeof config.adapter !== 'object' || config.adapter === null) {
    throw new ConfigurationError('Adapter is required')
  }
  const horizonWeeks = config.horizonWeeks ?? DEFAULT_HORIZON_WEEKS
  assertPositiveInteger(horizonWeeks, 'horizonWeeks')
  const resetConfirmation = config.resetConfirmation ?? DEFAULT_RESET_CONFIRMATION
  if (resetConfirmation === '') {
    throw new ConfigurationError('resetConfirmation must not be empty')
  }

  const adapter = config.adapter
  const logger = config.logger ?? consoleLogger
  const today = config.today ?? todayLocal
  const random = config.random ?? Math.random
  const rosterFields: RosterFieldMap = { ...DEFAULT_ROSTER_FIELDS, ...config.rosterFields }

  const ledger = createScheduleLedger({ adapter, logger })
  const tracker = createEligibilityTracker({
    adapter,
    eligibility: config.excludedRank != null ? { excludedRank: config.excludedRank } : {},
  })

  // ========== Write Queue ==========
  // Every ledger read and write runs here, one at a time, so check-then-write
  // is a critical section and readers never see a half-written week.
  let queue: Promise<unknown> = Promise.resolve()

  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task)
    // Failures reach the caller through `run`; the queue itself moves on
    queue = run.catch(() => undefined)
    return run
  }

  // ========== Events ==========
  const handlers: { [E in WeekDrawEvent]: ((payload: WeekDrawEvents[E]) => void)[] } = {
    drawn: [],
    edited: [],
    reset: [],
  }

  function emit<E extends WeekDrawEvent>(event: E, payload: WeekDrawEvents[E]): boolean {
    let hadErrors = false
    for (const handler of handlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; logger.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  /** A fresh copy per emit; never the array returned to the caller. */
  function payloadOf(week: WeekId, assignments: readonly Assignment[]): WeekDrawEvents['drawn'] {
    return {
      week: { ...week },
      assignments: assignments.map((a) => ({ ...a, weekId: { ...a.weekId } })),
    }
  }

  function on<E extends WeekDrawEvent>(event: E, handler: (payload: WeekDrawEvents[E]) => void): void {
    handlers[event].push(handler)
  }

  // ========== Queries ==========

  async function listDrawableWeeks(horizon: number = horizonWeeks): Promise<WeekId[]> {
    if (!Number.isInteger(horizon) || horizon < 1) {
      throw new MalformedInputError(`Horizon must be a positive number of weeks, got ${horizon}`)
    }
    return serialize(async () => {
      const weeks: WeekId[] = []
      for (const monday of upcomingMondays(horizon, today())) {
        const id = weekIdOf(monday)
        if (!(await ledger.hasWeek(id))) weeks.push(id)
      }
      return weeks
    })
  }

  function getHistory(): Promise<WeekSchedule[]> {
    return serialize(() => ledger.history())
  }

  async function getWeek(week: WeekId | string): Promise<Assignment[]> {
    const id = resolveWeekId(week)
    return serialize(() => ledger.getWeek(id))
  }

  function getRoster(): Promise<Participant[]> {
    return serialize(() => tracker.loadRoster())
  }

  // ========== Draw ==========

  async function drawWeek(week: WeekId | string): Promise<Result<Assignment[], DrawFailure>> {
    const id = resolveWeekId(week)
    const label = formatWeekId(id)

    return serialize(async (): Promise<Result<Assignment[], DrawFailure>> => {
      const monday = mondayOfWeek(id)
      if (!dateAfter(monday, today())) {
        return Err(new WeekNotDrawableError(label, `Week ${label} has already started`))
      }
      if (await ledger.hasWeek(id)) return Err(new AlreadyDrawnError(label))

      const pool = await tracker.eligiblePool()
      let drawn: AssignmentInput[]
      try {
        drawn = drawAssignments(pool.map((p) => p.handle), weekDates(monday), { random })
      } catch (e) {
        if (e instanceof InsufficientPoolError) return Err(e)
        throw e
      }

      let assignments: Assignment[]
      try {
        assignments = await adapter.transaction(async () => {
          const saved = await ledger.appendWeek(id, drawn)
          await tracker.afterAppend(saved)
          return saved
        })
      } catch (e) {
        if (e instanceof AlreadyDrawnError) return Err(e)
        throw e
      }

      emit('drawn', payloadOf(id, assignments))
      return Ok(assignments)
    })
  }

  // ========== Edit ==========

  function parseEditedRows(
    week: WeekId,
    rows: readonly EditedAssignment[],
    known: ReadonlySet<string>,
  ): AssignmentInput[] {
    const label = formatWeekId(week)
    if (rows.length === 0) {
      throw new MalformedInputError(`Edit of week ${label} has no rows`)
    }
    return rows.map((row, i) => {
      const date = parseDate(row.date.trim())
      if (!date.ok) {
        throw new MalformedInputError(`Row ${i + 1}: invalid date '${row.date}'`)
      }
      const titular = row.titular.trim()
      const substitute = row.substitute.trim()
      for (const [role, handle] of [['titular', titular], ['substitute', substitute]] as const) {
        if (handle === '') {
          throw new MalformedInputError(`Row ${i + 1}: ${role} is empty`)
        }
        if (!known.has(handle)) {
          throw new MalformedInputError(`Row ${i + 1}: unknown ${role} '${handle}'`)
        }
      }
      return { date: date.value, titular, substitute }
    })
  }

  async function editWeek(
    week: WeekId | string,
    rows: readonly EditedAssignment[],
  ): Promise<Result<Assignment[], MalformedInputError>> {
    return serialize(async (): Promise<Result<Assignment[], MalformedInputError>> => {
      const parsed = parseWeekId(typeof week === 'string' ? week : formatWeekId(week))
      if (!parsed.ok) return Err(new MalformedInputError(parsed.error.message))
      const id = parsed.value

      try {
        const roster = await tracker.loadRoster()
        const inputs = parseEditedRows(id, rows, new Set(roster.map((p) => p.handle)))
        const assignments = await adapter.transaction(async () => {
          const saved = await ledger.replaceWeek(id, inputs)
          await tracker.afterReplace(id, saved)
          return saved
        })
        emit('edited', payloadOf(id, assignments))
        return Ok(assignments)
      } catch (e) {
        if (e instanceof MalformedInputError) return Err(e)
        throw e
      }
    })
  }

  // ========== Reset ==========

  async function resetAll(confirmation: string): Promise<Result<{ performed: boolean }, never>> {
    if (confirmation !== resetConfirmation) return Ok({ performed: false })
    return serialize(async () => {
      await adapter.transaction(async () => {
        await ledger.reset()
        await tracker.afterReset()
      })
      emit('reset', {})
      return Ok({ performed: true })
    })
  }

  // ========== Roster Import ==========

  async function importRoster(records: readonly Readonly<Record<string, unknown>>[]): Promise<Participant[]> {
    const imported = records.map((r) => toParticipant(r, rosterFields))
    assertUniqueHandles(imported)

    return serialize(async () => {
      await adapter.transaction(async () => {
        for (let i = 0; i < imported.length; i++) {
          const participant = imported[i]
          if (!participant) continue
          const hasServedDates = records[i]?.[rosterFields.servedDates] != null
          const existing = await adapter.getParticipant(participant.handle)
          await adapter.upsertParticipant({
            ...toRecord(participant),
            servedDates: hasServedDates || !existing
              ? [...participant.servedDates]
              : existing.servedDates,
          })
        }
      })
      return tracker.loadRoster()
    })
  }

  return {
    listDrawableWeeks,
    drawWeek,
    editWeek,
    resetAll,
    getHistory,
    getWeek,
    importRoster,
    getRoster,
    on,
  }
}
