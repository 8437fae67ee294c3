/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Pure calendar-date helpers: parsing, arithmetic, weekday resolution.
 */

import { describe, it, expect } from 'vitest'
import {
  type LocalDate,
  parseDate,
  isLocalDate,
  makeDate,
  addDays,
  daysBetween,
  isoWeekdayIndex,
  daysInMonth,
  yearOf,
  monthOf,
  dayOf,
  compareDates,
  dateAfter,
  ParseError,
} from '../src/time-date'

function date(iso: string): LocalDate {
  return iso as LocalDate
}

describe('Segment 01: Time & Date', () => {
  // ========================================================================
  // Parsing
  // ========================================================================

  describe('parseDate', () => {
    it('parses a valid date', () => {
      const result = parseDate('2025-03-05')
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value).toBe('2025-03-05')
    })

    it('parses a leap day', () => {
      expect(parseDate('2024-02-29').ok).toBe(true)
    })

    it('rejects Feb 29 in a common year', () => {
      const result = parseDate('2025-02-29')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError)
        expect(result.error.message).toBe("Invalid day in date: '2025-02-29'")
      }
    })

    it('rejects month 13', () => {
      const result = parseDate('2025-13-01')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid month in date: '2025-13-01'")
    })

    it('rejects unpadded components', () => {
      const result = parseDate('2025-3-5')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid date format: '2025-3-5'")
    })

    it('rejects a day-first legacy format', () => {
      expect(parseDate('05/03/2025').ok).toBe(false)
    })

    it('does not trim', () => {
      expect(parseDate(' 2025-03-05').ok).toBe(false)
    })

    it('isLocalDate mirrors parseDate', () => {
      expect(isLocalDate('2025-04-30')).toBe(true)
      expect(isLocalDate('2025-04-31')).toBe(false)
    })
  })

  describe('makeDate', () => {
    it('zero-pads every component', () => {
      expect(makeDate(987, 1, 2)).toBe('0987-01-02')
    })

    it('extracts components back', () => {
      const d = makeDate(2025, 3, 9)
      expect(yearOf(d)).toBe(2025)
      expect(monthOf(d)).toBe(3)
      expect(dayOf(d)).toBe(9)
    })
  })

  // ========================================================================
  // Calendar Facts
  // ========================================================================

  describe('month lengths', () => {
    it('applies the Gregorian leap rule to February', () => {
      expect(daysInMonth(1900, 2)).toBe(28)
      expect(daysInMonth(2000, 2)).toBe(29)
    })

    it('knows February in both kinds of year', () => {
      expect(daysInMonth(2024, 2)).toBe(29)
      expect(daysInMonth(2025, 2)).toBe(28)
      expect(daysInMonth(2025, 4)).toBe(30)
      expect(daysInMonth(2025, 12)).toBe(31)
    })
  })

  // ========================================================================
  // Arithmetic
  // ========================================================================

  describe('addDays', () => {
    it('crosses a month end', () => {
      expect(addDays(date('2025-02-27'), 4)).toBe('2025-03-03')
    })

    it('crosses a leap day', () => {
      expect(addDays(date('2024-02-28'), 1)).toBe('2024-02-29')
      expect(addDays(date('2024-02-28'), 2)).toBe('2024-03-01')
    })

    it('crosses a year end in both directions', () => {
      expect(addDays(date('2024-12-30'), 3)).toBe('2025-01-02')
      expect(addDays(date('2025-01-02'), -3)).toBe('2024-12-30')
    })

    it('returns the same date for zero', () => {
      expect(addDays(date('2025-03-05'), 0)).toBe('2025-03-05')
    })
  })

  describe('daysBetween', () => {
    it('counts forward', () => {
      expect(daysBetween(date('2025-01-01'), date('2025-03-01'))).toBe(59)
    })

    it('is negative backward', () => {
      expect(daysBetween(date('2025-03-09'), date('2025-03-03'))).toBe(-6)
    })
  })

  // ========================================================================
  // Day of Week
  // ========================================================================

  describe('isoWeekdayIndex', () => {
    it('resolves known dates', () => {
      expect(isoWeekdayIndex(date('2025-03-05'))).toBe(2)
      expect(isoWeekdayIndex(date('1970-01-01'))).toBe(3)
      expect(isoWeekdayIndex(date('2024-02-29'))).toBe(3)
    })

    it('indexes Monday as 0 and Sunday as 6', () => {
      expect(isoWeekdayIndex(date('2025-03-03'))).toBe(0)
      expect(isoWeekdayIndex(date('2025-03-09'))).toBe(6)
    })
  })

  // ========================================================================
  // Comparison
  // ========================================================================

  describe('comparison', () => {
    it('orders dates lexically', () => {
      expect(compareDates(date('2025-03-03'), date('2025-03-04'))).toBe(-1)
      expect(compareDates(date('2025-03-04'), date('2025-03-03'))).toBe(1)
      expect(compareDates(date('2025-03-03'), date('2025-03-03'))).toBe(0)
    })

    it('dateAfter is strict', () => {
      expect(dateAfter(date('2025-03-03'), date('2025-03-03'))).toBe(false)
      expect(dateAfter(date('2025-03-04'), date('2025-03-03'))).toBe(true)
    })
  })
})
