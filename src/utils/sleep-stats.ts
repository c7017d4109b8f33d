import type { DailyLog, DreamRecord } from '../types/dream'
import type { QualityLucidityRow, SleepStatsSummary } from '../types/stats'
import { MINUTES_PER_DAY, parseTimeOfDay } from './date'
import { indexDreamsByDate } from './dream-stats'

const QUALITY_LEVELS = [1, 2, 3, 4, 5] as const
const MINUTES_PER_HOUR = 60

interface DreamDayFlags {
  lucid: boolean
}

/** Minutes slept between bedtime and wake time, wrapping past midnight. */
export function computeSleepDurationMinutes(bedtime: string, wakeTime: string): number | null {
  const bedMinutes = parseTimeOfDay(bedtime)
  const wakeMinutes = parseTimeOfDay(wakeTime)
  if (bedMinutes === null || wakeMinutes === null) {
    return null
  }
  return (((wakeMinutes - bedMinutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
}

export function computeSleepDurationHours(bedtime: string, wakeTime: string): number | null {
  const minutes = computeSleepDurationMinutes(bedtime, wakeTime)
  return minutes === null ? null : minutes / MINUTES_PER_HOUR
}

// Inputs are integers, so the sum does not depend on input order.
function mean(values: number[]): number | null {
  if (values.length === 0) {
    return null
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

function toHours(minutes: number | null): number | null {
  return minutes === null ? null : minutes / MINUTES_PER_HOUR
}

function collectDreamDays(dreams: readonly DreamRecord[]): Map<string, DreamDayFlags> {
  const dreamDays = new Map<string, DreamDayFlags>()
  for (const { dream, dateKey } of indexDreamsByDate(dreams)) {
    const flags = dreamDays.get(dateKey) ?? { lucid: false }
    flags.lucid = flags.lucid || dream.isLucid
    dreamDays.set(dateKey, flags)
  }
  return dreamDays
}

/**
 * Lucid rate per sleep quality level, over log dates that also have at
 * least one dream. Levels without such dates report `null`.
 */
export function buildQualityLucidityTable(
  logs: readonly DailyLog[],
  dreams: readonly DreamRecord[],
): QualityLucidityRow[] {
  const dreamDays = collectDreamDays(dreams)
  const rows: QualityLucidityRow[] = QUALITY_LEVELS.map((quality) => ({
    quality,
    dreamDays: 0,
    lucidDays: 0,
    lucidityRate: null,
  }))

  for (const log of logs) {
    const flags = dreamDays.get(log.date)
    const row = rows.find((item) => item.quality === log.quality)
    if (!flags || !row) {
      continue
    }
    row.dreamDays += 1
    if (flags.lucid) {
      row.lucidDays += 1
    }
  }

  for (const row of rows) {
    row.lucidityRate = row.dreamDays > 0 ? row.lucidDays / row.dreamDays : null
  }
  return rows
}

export function buildSleepStats(logs: readonly DailyLog[], dreams: readonly DreamRecord[]): SleepStatsSummary {
  const durations = logs
    .map((log) => computeSleepDurationMinutes(log.bedtime, log.wakeTime))
    .filter((value): value is number => value !== null)
  const dreamDays = collectDreamDays(dreams)
  const lucidNightQualities = logs
    .filter((log) => dreamDays.get(log.date)?.lucid === true)
    .map((log) => log.quality)

  return {
    nightsTracked: logs.length,
    averageDurationHours: toHours(mean(durations)),
    minDurationHours: toHours(durations.length > 0 ? Math.min(...durations) : null),
    maxDurationHours: toHours(durations.length > 0 ? Math.max(...durations) : null),
    averageQuality: mean(logs.map((log) => log.quality)),
    qualityLucidity: buildQualityLucidityTable(logs, dreams),
    lucidNightShare: logs.length > 0 ? lucidNightQualities.length / logs.length : null,
    averageQualityOnLucidNights: mean(lucidNightQualities),
  }
}
