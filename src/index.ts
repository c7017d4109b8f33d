export type * from './types/config'
export type * from './types/dream'
export type * from './types/export'
export type * from './types/stats'
export { AnalyticsError, isAnalyticsError } from './utils/errors'
export { buildStatisticsReport } from './utils/statistics-report'
export { resolveReportConfig, DEFAULT_TOP_N } from './utils/report-config'
export { assertValidSnapshot } from './utils/snapshot-validation'
export { buildWordFrequency, tokenizeText, rankByFrequency, DEFAULT_STOP_WORDS } from './utils/text-analyzer'
export { buildDreamStats, computeLucidPercentage } from './utils/dream-stats'
export { buildSleepStats, computeSleepDurationHours, buildQualityLucidityTable } from './utils/sleep-stats'
export { buildRealityCheckStats } from './utils/reality-check-stats'
export { buildDreamCalendarMonth } from './utils/dream-calendar'
export { buildTechniqueEffectiveness } from './utils/technique-stats'
export { searchDreamRecords } from './utils/dream-search'
export { loadSnapshotFromDirectory, SnapshotLoadError, DEFAULT_SNAPSHOT_FILE_NAMES } from './services/snapshot-loader'
export { exportStatisticsReport } from './services/export'
