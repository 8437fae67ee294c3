/**
 * Eligibility Tracker
 *
 * Bridges the roster and the ledger: builds the eligible pool for a draw and
 * keeps each participant's served dates in step with ledger writes. Only
 * titular service is recorded.
 */

import type { Adapter } from './adapter'
import type { Assignment } from './ledger'
import type { WeekId } from './week-calendar'
import {
  type Participant, type Roster, type EligibilityOptions,
  assertUniqueHandles, clearAllService, clearServiceInWeek, eligible,
  fromRecord, recordService, servedDatesEqual,
} from './roster'

type EligibilityTrackerDeps = {
  adapter: Adapter
  eligibility: EligibilityOptions
}

export type EligibilityTracker = {
  loadRoster(): Promise<Participant[]>
  eligiblePool(): Promise<Participant[]>
  afterAppend(assignments: readonly Assignment[]): Promise<void>
  afterReplace(week: WeekId, assignments: readonly Assignment[]): Promise<void>
  afterReset(): Promise<void>
}

export function createEligibilityTracker(deps: EligibilityTrackerDeps): EligibilityTracker {
  const { adapter, eligibility } = deps

  async function loadRoster(): Promise<Participant[]> {
    const roster = (await adapter.getParticipants()).map(fromRecord)
    assertUniqueHandles(roster)
    return roster
  }

  async function eligiblePool(): Promise<Participant[]> {
    return eligible(await loadRoster(), eligibility)
  }

  function applyService(roster: Roster, assignments: readonly Assignment[]): Participant[] {
    let next: Participant[] = [...roster]
    for (const a of assignments) {
      next = recordService(next, a.titular, a.date)
    }
    return next
  }

  async function persistChanges(before: Roster, after: Roster): Promise<void> {
    const previous = new Map(before.map((p) => [p.handle, p.servedDates]))
    for (const p of after) {
      const old = previous.get(p.handle)
      if (old && servedDatesEqual(old, p.servedDates)) continue
      await adapter.setServedDates(p.handle, [...p.servedDates])
    }
  }

  async function afterAppend(assignments: readonly Assignment[]): Promise<void> {
    const roster = await loadRoster()
    await persistChanges(roster, applyService(roster, assignments))
  }

  async function afterReplace(week: WeekId, assignments: readonly Assignment[]): Promise<void> {
    const roster = await loadRoster()
    await persistChanges(roster, applyService(clearServiceInWeek(roster, week), assignments))
  }

  async function afterReset(): Promise<void> {
    const roster = await loadRoster()
    await persistChanges(roster, clearAllService(roster))
  }

  return {
    loadRoster,
    eligiblePool,
    afterAppend,
    afterReplace,
    afterReset,
  }
}
