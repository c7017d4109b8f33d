import type { DateString } from './dream'

export type StreakStatus = 'none' | 'active' | 'broken'

export type CalendarDayStatus = 'none' | 'dream' | 'lucid'

export type TechniqueRecommendation = 'primary' | 'combine' | 'adjust'

export interface WordFrequencyItem {
  word: string
  count: number
}

export interface RankedItem {
  key: string
  label: string
  count: number
}

export interface DreamPeriodBucket {
  key: string
  dreamCount: number
  lucidCount: number
}

export interface DreamStreakSummary {
  currentStreakDays: number
  longestStreakDays: number
  streakStatus: StreakStatus
  streakLastDate: string | null
  streakGapDays: number | null
}

export interface WeeklyDreamSummary {
  startDate: DateString
  endDate: DateString
  dreamCount: number
  lucidCount: number
  dreamsPerDay: number
  averageWordCount: number | null
}

export interface DreamStatsSummary {
  totalCount: number
  lucidCount: number
  lucidPercentage: number
  averageWordCount: number | null
  byDay: DreamPeriodBucket[]
  byWeek: DreamPeriodBucket[]
  byMonth: DreamPeriodBucket[]
  dreamSigns: RankedItem[]
  topTags: RankedItem[]
  streak: DreamStreakSummary
  weekly: WeeklyDreamSummary
}

export interface QualityLucidityRow {
  quality: 1 | 2 | 3 | 4 | 5
  dreamDays: number
  lucidDays: number
  lucidityRate: number | null
}

export interface SleepStatsSummary {
  nightsTracked: number
  averageDurationHours: number | null
  minDurationHours: number | null
  maxDurationHours: number | null
  averageQuality: number | null
  qualityLucidity: QualityLucidityRow[]
  lucidNightShare: number | null
  averageQualityOnLucidNights: number | null
}

export interface RealityCheckDay {
  date: string
  count: number
}

export interface RealityCheckSummary {
  total: number
  loggedDays: number
  averagePerDay: number
  mostActive: RealityCheckDay | null
  leastActive: RealityCheckDay | null
}

export interface DreamCalendarDay {
  dateKey: DateString
  day: number
  weekday: number
  status: CalendarDayStatus
  dreamCount: number
}

export interface DreamCalendarMonth {
  year: number
  month: number
  label: string
  days: DreamCalendarDay[]
  dreamDayCount: number
  lucidDayCount: number
}

export interface TechniqueStatsItem {
  technique: string
  attempts: number
  successes: number
  successRate: number
  lastPracticed: string
  totalMinutes: number
  averageControlLevel: number | null
  recommendation: TechniqueRecommendation
}

export interface TechniqueEffectivenessSummary {
  items: TechniqueStatsItem[]
  mostEffective: string | null
  leastEffective: string | null
}

export interface StatisticsReport {
  referenceDate: DateString
  config: {
    topN: number
    calendarMonth: { year: number; month: number }
    includeTitles: boolean
  }
  wordFrequency: WordFrequencyItem[]
  dreams: DreamStatsSummary
  sleep: SleepStatsSummary
  realityChecks: RealityCheckSummary
  calendar: DreamCalendarMonth
  techniques: TechniqueEffectivenessSummary
}
