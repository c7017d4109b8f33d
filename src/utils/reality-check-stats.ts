import type { DailyLog } from '../types/dream'
import type { RealityCheckDay, RealityCheckSummary } from '../types/stats'

type PreferCandidate = (candidate: RealityCheckDay, current: RealityCheckDay) => boolean

function pickDay(logs: readonly DailyLog[], prefer: PreferCandidate): RealityCheckDay | null {
  let picked: RealityCheckDay | null = null
  for (const log of logs) {
    const candidate = { date: log.date, count: log.realityChecks }
    if (
      picked === null ||
      prefer(candidate, picked) ||
      (candidate.count === picked.count && candidate.date < picked.date)
    ) {
      picked = candidate
    }
  }
  return picked
}

/**
 * Only days with a log count: a date missing from the log is unknown, not
 * a zero-check day.
 */
export function buildRealityCheckStats(logs: readonly DailyLog[]): RealityCheckSummary {
  const total = logs.reduce((sum, log) => sum + log.realityChecks, 0)

  return {
    total,
    loggedDays: logs.length,
    averagePerDay: logs.length > 0 ? total / logs.length : 0,
    mostActive: pickDay(logs, (candidate, current) => candidate.count > current.count),
    leastActive: pickDay(logs, (candidate, current) => candidate.count < current.count),
  }
}
