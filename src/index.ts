/**
 * weekdraw
 *
 * Public API exports
 */

// Error system
export {
  WeekdrawError, WeekdrawErrorCode,
  DuplicateKeyError, NotFoundError, InvalidDataError,
  ConfigurationError, DuplicateHandleError,
  InsufficientPoolError, AlreadyDrawnError, WeekNotDrawableError, MalformedInputError,
  PoolExhaustedError, ParseError,
} from './errors'
export type { WeekdrawErrorCode as WeekdrawErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Logging
export type { Logger } from './logger'
export { consoleLogger, silentLogger } from './logger'

// Time & Date
export type { LocalDate } from './time-date'
export {
  daysInMonth,
  parseDate, isLocalDate, makeDate, todayLocal,
  yearOf, monthOf, dayOf,
  addDays, daysBetween,
  isoWeekdayIndex,
  compareDates, dateAfter,
} from './time-date'

// Week calendar
export type { WeekId } from './week-calendar'
export {
  weekId, weeksInYear, formatWeekId, parseWeekId, resolveWeekId,
  weekIdEquals, compareWeekIds,
  mondayOf, mondayOfWeek, weekDates, isInWeek, upcomingMondays,
} from './week-calendar'

// Roster
export type {
  Participant, Roster, EligibilityOptions, RosterFieldMap,
} from './roster'
export {
  DEFAULT_ROSTER_FIELDS,
  normalizeServedDates, isEligible, eligible, assertUniqueHandles,
  recordService, clearServiceInWeek, clearAllService,
  toParticipant,
} from './roster'

// Draw engine
export type { DrawnDay, DrawOptions } from './draw-engine'
export { drawAssignments, shuffle, requiredPoolSize } from './draw-engine'

// Ledger
export type {
  Assignment, AssignmentInput, WeekSchedule, ScheduleLedger,
} from './ledger'
export { createScheduleLedger, toAssignments } from './ledger'

// Eligibility tracker
export type { EligibilityTracker } from './eligibility'
export { createEligibilityTracker } from './eligibility'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, ParticipantRecord, AssignmentRecord } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// High-level API
export type {
  WeekDraw, WeekDrawConfig, DrawFailure, EditedAssignment,
  WeekDrawEvents, WeekDrawEvent,
} from './week-draw'
export {
  createWeekDraw, DEFAULT_HORIZON_WEEKS, DEFAULT_RESET_CONFIRMATION,
} from './week-draw'
