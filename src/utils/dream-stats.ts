import type { DateString, DreamRecord } from '../types/dream'
import type {
  DreamPeriodBucket,
  DreamStatsSummary,
  DreamStreakSummary,
  RankedItem,
  WeeklyDreamSummary,
} from '../types/stats'
import {
  diffDays,
  formatDateKey,
  getIsoWeekKey,
  getMonthKey,
  getTimestampDateKey,
  parseDateKey,
  shiftDateByDays,
  startOfLocalDay,
} from './date'
import { hasDreamSign } from './snapshot-validation'
import { countWords, rankByFrequency, type RankableEntry } from './text-analyzer'

export const WEEKLY_WINDOW_DAYS = 7

export interface DatedDream {
  dream: DreamRecord
  dateKey: DateString
}

export interface DreamStatsOptions {
  topN: number
  now: Date
}

interface PeriodAccumulator {
  dreamCount: number
  lucidCount: number
}

export function indexDreamsByDate(dreams: readonly DreamRecord[]): DatedDream[] {
  const dated: DatedDream[] = []
  for (const dream of dreams) {
    const dateKey = getTimestampDateKey(dream.createdAt)
    if (dateKey) {
      dated.push({ dream, dateKey })
    }
  }
  return dated
}

export function computeLucidPercentage(lucidCount: number, totalCount: number): number {
  if (totalCount <= 0) {
    return 0
  }
  return (lucidCount / totalCount) * 100
}

function averageWordCount(dreams: DatedDream[]): number | null {
  if (dreams.length === 0) {
    return null
  }
  const totalWords = dreams.reduce((sum, item) => sum + countWords(item.dream.content), 0)
  return totalWords / dreams.length
}

function groupByPeriod(dreams: DatedDream[], resolveKey: (dateKey: DateString) => string): DreamPeriodBucket[] {
  const buckets = new Map<string, PeriodAccumulator>()

  for (const { dream, dateKey } of dreams) {
    const key = resolveKey(dateKey)
    const bucket = buckets.get(key) ?? { dreamCount: 0, lucidCount: 0 }
    bucket.dreamCount += 1
    if (dream.isLucid) {
      bucket.lucidCount += 1
    }
    buckets.set(key, bucket)
  }

  return [...buckets.entries()]
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, bucket]) => ({ key, dreamCount: bucket.dreamCount, lucidCount: bucket.lucidCount }))
}

function toWeekKey(dateKey: DateString): string {
  const parsed = parseDateKey(dateKey)
  return parsed ? getIsoWeekKey(parsed) : dateKey
}

function* collectDreamSigns(dreams: DatedDream[]): Generator<RankableEntry> {
  for (const { dream } of dreams) {
    if (!dream.isLucid || !hasDreamSign(dream)) {
      continue
    }
    const label = (dream.dreamSign ?? '').trim()
    yield { key: label.toLowerCase(), label }
  }
}

function* collectTags(dreams: DatedDream[]): Generator<RankableEntry> {
  for (const { dream } of dreams) {
    const seenInDream = new Set<string>()
    for (const tag of dream.tags) {
      const label = tag.trim()
      const key = label.toLowerCase()
      if (!key || seenInDream.has(key)) {
        continue
      }
      seenInDream.add(key)
      yield { key, label }
    }
  }
}

export function rankDreamSigns(dreams: DatedDream[]): RankedItem[] {
  return rankByFrequency(collectDreamSigns(dreams))
}

function computeLongestStreak(dateKeys: string[]): number {
  if (dateKeys.length === 0) {
    return 0
  }

  const ascending = [...dateKeys].sort((left, right) => left.localeCompare(right))
  let longest = 1
  let current = 1

  for (let index = 1; index < ascending.length; index += 1) {
    const prev = parseDateKey(ascending[index - 1])
    const next = parseDateKey(ascending[index])
    if (prev && next && diffDays(next, prev) === 1) {
      current += 1
      longest = Math.max(longest, current)
      continue
    }
    current = 1
  }

  return longest
}

function computeAnchorStreak(anchorDate: Date, dateSet: Set<string>): number {
  let cursor = anchorDate
  let count = 0

  while (dateSet.has(formatDateKey(cursor))) {
    count += 1
    cursor = shiftDateByDays(cursor, -1)
  }

  return count
}

/**
 * Journaling streak relative to `now`. A streak stays `active` only while
 * today has a dream; otherwise the latest run is reported as `broken`.
 */
export function buildDreamStreak(dreams: DatedDream[], now: Date): DreamStreakSummary {
  const dateSet = new Set(dreams.map((item) => item.dateKey))
  const dateKeys = [...dateSet]
  const todayDate = startOfLocalDay(now)
  const todayKey = formatDateKey(todayDate)
  const pastKeys = dateKeys.filter((key) => key <= todayKey)
  const latestDateKey = pastKeys.sort((left, right) => right.localeCompare(left))[0] ?? null
  const hasTodayRecord = dateSet.has(todayKey)
  const anchorKey = hasTodayRecord ? todayKey : latestDateKey
  const anchorDate = anchorKey ? parseDateKey(anchorKey) : null

  let currentStreakDays = 0
  let streakStatus: DreamStreakSummary['streakStatus'] = 'none'
  let streakGapDays: number | null = null

  if (anchorDate) {
    currentStreakDays = computeAnchorStreak(anchorDate, dateSet)
    if (hasTodayRecord) {
      streakStatus = 'active'
      streakGapDays = 0
    } else {
      streakStatus = 'broken'
      streakGapDays = diffDays(todayDate, anchorDate)
    }
  }

  return {
    currentStreakDays,
    longestStreakDays: computeLongestStreak(dateKeys),
    streakStatus,
    streakLastDate: anchorKey,
    streakGapDays,
  }
}

export function buildWeeklyDreamSummary(dreams: DatedDream[], now: Date): WeeklyDreamSummary {
  const endDate = startOfLocalDay(now)
  const startDate = shiftDateByDays(endDate, -(WEEKLY_WINDOW_DAYS - 1))
  const startKey = formatDateKey(startDate)
  const endKey = formatDateKey(endDate)
  const inWindow = dreams.filter((item) => item.dateKey >= startKey && item.dateKey <= endKey)

  return {
    startDate: startKey,
    endDate: endKey,
    dreamCount: inWindow.length,
    lucidCount: inWindow.filter((item) => item.dream.isLucid).length,
    dreamsPerDay: inWindow.length / WEEKLY_WINDOW_DAYS,
    averageWordCount: averageWordCount(inWindow),
  }
}

export function buildDreamStats(dreams: readonly DreamRecord[], options: DreamStatsOptions): DreamStatsSummary {
  const dated = indexDreamsByDate(dreams)
  const totalCount = dated.length
  const lucidCount = dated.filter((item) => item.dream.isLucid).length

  return {
    totalCount,
    lucidCount,
    lucidPercentage: computeLucidPercentage(lucidCount, totalCount),
    averageWordCount: averageWordCount(dated),
    byDay: groupByPeriod(dated, (dateKey) => dateKey),
    byWeek: groupByPeriod(dated, toWeekKey),
    byMonth: groupByPeriod(dated, getMonthKey),
    dreamSigns: rankDreamSigns(dated),
    topTags: rankByFrequency(collectTags(dated)).slice(0, options.topN),
    streak: buildDreamStreak(dated, options.now),
    weekly: buildWeeklyDreamSummary(dated, options.now),
  }
}
