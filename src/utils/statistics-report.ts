import type { ReportOptions } from '../types/config'
import type { DreamSnapshot } from '../types/dream'
import type { StatisticsReport } from '../types/stats'
import { formatDateKey } from './date'
import { buildDreamCalendarMonth } from './dream-calendar'
import { buildDreamStats } from './dream-stats'
import { buildRealityCheckStats } from './reality-check-stats'
import { resolveReportConfig } from './report-config'
import { buildSleepStats } from './sleep-stats'
import { assertValidSnapshot } from './snapshot-validation'
import { buildTechniqueEffectiveness } from './technique-stats'
import { buildWordFrequency } from './text-analyzer'

/**
 * Builds the full statistics report from one snapshot.
 *
 * Options are checked first, then the snapshot; either failure throws an
 * `AnalyticsError` and no partial report is produced. The snapshot is only
 * read, so concurrent calls over the same snapshot do not interfere.
 */
export function buildStatisticsReport(snapshot: DreamSnapshot, options: ReportOptions = {}): StatisticsReport {
  const config = resolveReportConfig(options)
  assertValidSnapshot(snapshot)

  const { dreams, dailyLogs } = snapshot

  return {
    referenceDate: formatDateKey(config.now),
    config: {
      topN: config.topN,
      calendarMonth: { ...config.calendarMonth },
      includeTitles: config.includeTitles,
    },
    wordFrequency: buildWordFrequency(dreams, config),
    dreams: buildDreamStats(dreams, config),
    sleep: buildSleepStats(dailyLogs, dreams),
    realityChecks: buildRealityCheckStats(dailyLogs),
    calendar: buildDreamCalendarMonth(dreams, config.calendarMonth),
    techniques: buildTechniqueEffectiveness(snapshot.techniquePractices),
  }
}
