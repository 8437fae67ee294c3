/**
 * Draw Engine
 *
 * Assigns one titular and one substitute per date from a shuffled pool.
 *
 * A single cursor walks the shuffled pool across the whole batch. Whoever the
 * cursor passes is never reconsidered for titular later in the batch. Nobody
 * is titular twice, and titular and substitute always differ on a date.
 * Substitutes may repeat across dates.
 */

import { type LocalDate, compareDates } from './time-date'
import { InsufficientPoolError, PoolExhaustedError } from './errors'

export { InsufficientPoolError, PoolExhaustedError }

// ============================================================================
// Types
// ============================================================================

export type DrawnDay = {
  date: LocalDate
  titular: string
  substitute: string
}

export type DrawOptions = {
  /** Uniform [0, 1) source. Defaults to Math.random; not seeded. */
  random?: () => number
}

// ============================================================================
// Shuffle
// ============================================================================

/** Fisher-Yates; returns a new array. */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    ;[result[i], result[j]] = [result[j]!, result[i]!]
  }
  return result
}

export function requiredPoolSize(dateCount: number): number {
  return 2 * dateCount
}

// ============================================================================
// Draw
// ============================================================================

export function drawAssignments(
  pool: readonly string[],
  dates: readonly LocalDate[],
  options: DrawOptions = {},
): DrawnDay[] {
  const required = requiredPoolSize(dates.length)
  if (pool.length < required) {
    throw new InsufficientPoolError(required, pool.length)
  }

  const shuffled = shuffle(pool, options.random)
  const ordered = [...dates].sort(compareDates)
  const usedAsTitular = new Set<string>()
  const drawn: DrawnDay[] = []
  let cursor = 0

  function take(accept: (handle: string) => boolean, role: string, date: LocalDate): string {
    while (cursor < shuffled.length) {
      const candidate = shuffled[cursor++]
      if (candidate !== undefined && accept(candidate)) return candidate
    }
    throw new PoolExhaustedError(`Pool exhausted while drawing ${role} for ${date}`)
  }

  for (const date of ordered) {
    const titular = take((h) => !usedAsTitular.has(h), 'titular', date)
    usedAsTitular.add(titular)
    const substitute = take((h) => h !== titular, 'substitute', date)
    drawn.push({ date, titular, substitute })
  }

  return drawn
}
