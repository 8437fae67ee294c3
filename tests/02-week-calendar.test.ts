/**
 * Segment 02: Week Calendar Tests
 *
 * ISO-8601 week identifiers, week boundaries and the drawable horizon.
 *
 * Dependencies: Segment 1 (Time & Date)
 */

import { describe, it, expect } from 'vitest'
import { type LocalDate } from '../src/time-date'
import {
  weekId,
  weeksInYear,
  formatWeekId,
  parseWeekId,
  resolveWeekId,
  weekIdEquals,
  compareWeekIds,
  mondayOf,
  mondayOfWeek,
  weekDates,
  isInWeek,
  upcomingMondays,
} from '../src/week-calendar'
import { ParseError } from '../src/errors'

function date(iso: string): LocalDate {
  return iso as LocalDate
}

describe('Segment 02: Week Calendar', () => {
  // ========================================================================
  // Week Identifiers
  // ========================================================================

  describe('weekId', () => {
    it('identifies a mid-year week', () => {
      expect(weekId(date('2025-03-03'))).toEqual({ year: 2025, week: 10 })
      expect(weekId(date('2025-03-09'))).toEqual({ year: 2025, week: 10 })
      expect(weekId(date('2025-03-10'))).toEqual({ year: 2025, week: 11 })
    })

    it('puts late-December days into week 1 of the next year', () => {
      expect(weekId(date('2024-12-30'))).toEqual({ year: 2025, week: 1 })
    })

    it('puts early-January days into the last week of the previous year', () => {
      expect(weekId(date('2021-01-03'))).toEqual({ year: 2020, week: 53 })
      expect(weekId(date('2027-01-01'))).toEqual({ year: 2026, week: 53 })
    })
  })

  describe('weeksInYear', () => {
    it('counts 52 or 53 weeks', () => {
      expect(weeksInYear(2020)).toBe(53)
      expect(weeksInYear(2021)).toBe(52)
      expect(weeksInYear(2025)).toBe(52)
      expect(weeksInYear(2026)).toBe(53)
    })
  })

  describe('formatWeekId / parseWeekId', () => {
    it('zero-pads the week number', () => {
      expect(formatWeekId({ year: 2025, week: 3 })).toBe('2025-W03')
      expect(formatWeekId({ year: 2025, week: 10 })).toBe('2025-W10')
    })

    it('trims surrounding whitespace', () => {
      const result = parseWeekId(' 2025-W10 ')
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value).toEqual({ year: 2025, week: 10 })
    })

    it('rejects a lowercase marker', () => {
      const result = parseWeekId('2025-w10')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid week identifier: '2025-w10'")
    })

    it('rejects week 0', () => {
      expect(parseWeekId('2025-W00').ok).toBe(false)
    })

    it('rejects week 53 in a 52-week year', () => {
      const result = parseWeekId('2021-W53')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Week 53 does not exist in 2021: '2021-W53'")
    })

    it('accepts week 53 in a 53-week year', () => {
      expect(parseWeekId('2020-W53').ok).toBe(true)
    })
  })

  describe('resolveWeekId', () => {
    it('accepts a structured id', () => {
      expect(resolveWeekId({ year: 2025, week: 10 })).toEqual({ year: 2025, week: 10 })
    })

    it('throws ParseError for a bad label', () => {
      expect(() => resolveWeekId('next week')).toThrow(ParseError)
    })
  })

  describe('comparison', () => {
    it('orders by year then week', () => {
      expect(compareWeekIds({ year: 2024, week: 52 }, { year: 2025, week: 1 })).toBe(-1)
      expect(compareWeekIds({ year: 2025, week: 11 }, { year: 2025, week: 10 })).toBe(1)
      expect(weekIdEquals({ year: 2025, week: 10 }, { year: 2025, week: 10 })).toBe(true)
    })
  })

  // ========================================================================
  // Week Boundaries
  // ========================================================================

  describe('mondayOf / mondayOfWeek', () => {
    it('maps any day to its Monday', () => {
      expect(mondayOf(date('2025-03-06'))).toBe('2025-03-03')
      expect(mondayOf(date('2025-03-09'))).toBe('2025-03-03')
      expect(mondayOf(date('2025-03-03'))).toBe('2025-03-03')
    })

    it('finds the Monday of a week id', () => {
      expect(mondayOfWeek({ year: 2025, week: 10 })).toBe('2025-03-03')
      expect(mondayOfWeek({ year: 2025, week: 1 })).toBe('2024-12-30')
      expect(mondayOfWeek({ year: 2026, week: 1 })).toBe('2025-12-29')
      expect(mondayOfWeek({ year: 2020, week: 53 })).toBe('2020-12-28')
    })
  })

  describe('weekDates', () => {
    it('lists Monday through Sunday', () => {
      expect(weekDates(date('2025-03-03'))).toEqual([
        '2025-03-03', '2025-03-04', '2025-03-05', '2025-03-06',
        '2025-03-07', '2025-03-08', '2025-03-09',
      ])
    })

    it('spans a year boundary', () => {
      const dates = weekDates(date('2024-12-30'))
      expect(dates[0]).toBe('2024-12-30')
      expect(dates[6]).toBe('2025-01-05')
    })
  })

  describe('isInWeek', () => {
    it('matches by ISO week, not calendar year', () => {
      expect(isInWeek(date('2024-12-31'), { year: 2025, week: 1 })).toBe(true)
      expect(isInWeek(date('2024-12-29'), { year: 2025, week: 1 })).toBe(false)
    })
  })

  // ========================================================================
  // Drawable Horizon
  // ========================================================================

  describe('upcomingMondays', () => {
    it('starts at the first Monday after a full week from a Thursday', () => {
      expect(upcomingMondays(3, date('2025-02-20'))).toEqual([
        '2025-03-03', '2025-03-10', '2025-03-17',
      ])
    })

    it('skips the Monday exactly seven days out', () => {
      expect(upcomingMondays(1, date('2025-02-24'))).toEqual(['2025-03-10'])
    })

    it('starts the day after the horizon when that is a Monday', () => {
      expect(upcomingMondays(1, date('2025-03-02'))).toEqual(['2025-03-10'])
    })

    it('returns nothing for a zero count', () => {
      expect(upcomingMondays(0, date('2025-02-20'))).toEqual([])
    })
  })
})
