/**
 * Property-based tests for the draw engine.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { drawAssignments, InsufficientPoolError } from '../../../src/draw-engine'
import { weekDates } from '../../../src/week-calendar'
import { handlePoolGen, mondayGen, randomSourceGen } from '../generators'

describe('Draw engine properties', () => {
  it('every draw from a large enough pool holds the week invariants', () => {
    fc.assert(
      fc.property(
        handlePoolGen({ minLength: 14, maxLength: 40 }),
        mondayGen(),
        randomSourceGen(),
        (pool, monday, random) => {
          const dates = weekDates(monday)
          const drawn = drawAssignments(pool, dates, { random })
          const members = new Set(pool)

          expect(drawn.map((d) => d.date)).toEqual(dates)
          expect(new Set(drawn.map((d) => d.titular)).size).toBe(7)
          for (const d of drawn) {
            expect(d.titular).not.toBe(d.substitute)
            expect(members.has(d.titular)).toBe(true)
            expect(members.has(d.substitute)).toBe(true)
          }
        },
      ),
    )
  })

  it('a pool of exactly two per date uses every member once', () => {
    fc.assert(
      fc.property(handlePoolGen({ minLength: 14, maxLength: 14 }), mondayGen(), randomSourceGen(), (pool, monday, random) => {
        const drawn = drawAssignments(pool, weekDates(monday), { random })
        const used = drawn.flatMap((d) => [d.titular, d.substitute])
        expect([...used].sort()).toEqual([...pool].sort())
      }),
    )
  })

  it('a pool below two per date always fails up front', () => {
    fc.assert(
      fc.property(handlePoolGen({ minLength: 0, maxLength: 13 }), mondayGen(), (pool, monday) => {
        expect(() => drawAssignments(pool, weekDates(monday))).toThrow(InsufficientPoolError)
      }),
    )
  })
})
