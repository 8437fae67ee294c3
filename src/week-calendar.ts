/**
 * Week Calendar
 *
 * ISO-8601 week-date arithmetic. A week runs Monday through Sunday and belongs
 * to the ISO year of its Thursday, so the last days of December can fall in
 * week 1 of the next year and the first days of January in week 52/53 of the
 * previous one.
 *
 * WeekId is structured internally; the `YYYY-Www` label only exists at the
 * storage and display boundary.
 */

import {
  type LocalDate,
  addDays, daysBetween, isoWeekdayIndex, makeDate, yearOf,
} from './time-date'
import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export type { LocalDate } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type WeekId = {
  readonly year: number
  readonly week: number
}

// ============================================================================
// Week Identifiers
// ============================================================================

export function weekId(date: LocalDate): WeekId {
  const thursday = addDays(date, 3 - isoWeekdayIndex(date))
  const year = yearOf(thursday)
  const ordinal = daysBetween(makeDate(year, 1, 1), thursday)
  return { year, week: Math.floor(ordinal / 7) + 1 }
}

export function weeksInYear(year: number): number {
  // Dec 28 is always in the last ISO week of its year
  return weekId(makeDate(year, 12, 28)).week
}

export function formatWeekId(id: WeekId): string {
  const w = id.week < 10 ? '0' + id.week : '' + id.week
  return `${id.year}-W${w}`
}

/**
 * Parse a `YYYY-Www` label. Surrounding whitespace is trimmed; the `W` is
 * case-sensitive.
 */
export function parseWeekId(label: string): Result<WeekId, ParseError> {
  const trimmed = label.trim()
  const match = /^(\d{4})-W(\d{2})$/.exec(trimmed)
  if (!match) return Err(new ParseError(`Invalid week identifier: '${label}'`))

  const year = parseInt(match[1] ?? '', 10)
  const week = parseInt(match[2] ?? '', 10)
  if (week < 1 || week > weeksInYear(year)) {
    return Err(new ParseError(`Week ${week} does not exist in ${year}: '${label}'`))
  }
  return Ok({ year, week })
}

/** Accepts either a structured WeekId or its label; throws ParseError on a bad label. */
export function resolveWeekId(week: WeekId | string): WeekId {
  if (typeof week !== 'string') return { year: week.year, week: week.week }
  const parsed = parseWeekId(week)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export function weekIdEquals(a: WeekId, b: WeekId): boolean {
  return a.year === b.year && a.week === b.week
}

export function compareWeekIds(a: WeekId, b: WeekId): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.week !== b.week) return a.week < b.week ? -1 : 1
  return 0
}

// ============================================================================
// Week Boundaries
// ============================================================================

export function mondayOf(date: LocalDate): LocalDate {
  return addDays(date, -isoWeekdayIndex(date))
}

export function mondayOfWeek(id: WeekId): LocalDate {
  // Jan 4 is always in week 1
  const firstMonday = mondayOf(makeDate(id.year, 1, 4))
  return addDays(firstMonday, (id.week - 1) * 7)
}

export function weekDates(monday: LocalDate): LocalDate[] {
  const dates: LocalDate[] = []
  for (let i = 0; i < 7; i++) dates.push(addDays(monday, i))
  return dates
}

export function isInWeek(date: LocalDate, id: WeekId): boolean {
  return weekIdEquals(weekId(date), id)
}

/**
 * `count` Mondays, one week apart, starting from the first Monday strictly
 * after `today + 7 days`.
 */
export function upcomingMondays(count: number, today: LocalDate): LocalDate[] {
  const horizon = addDays(today, 7)
  const first = addDays(horizon, 7 - isoWeekdayIndex(horizon))
  const mondays: LocalDate[] = []
  for (let i = 0; i < count; i++) mondays.push(addDays(first, i * 7))
  return mondays
}
