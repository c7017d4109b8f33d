/** Calendar date `YYYY-MM-DD` in local time. */
export type DateString = string

export interface DreamRecord {
  id: number
  createdAt: string
  title: string
  content: string
  tags: readonly string[]
  isLucid: boolean
  dreamSign?: string
}

export interface DailyLog {
  date: string
  bedtime: string
  wakeTime: string
  quality: number
  wakeFeeling?: string
  realityChecks: number
  note?: string
  dreamIds?: readonly number[]
  wbtbAlarmId?: number
}

export type TechniqueOutcome =
  | { type: 'unattempted' }
  | { type: 'failed' }
  | { type: 'partial_lucid' }
  | { type: 'full_lucid'; controlLevel: number }

export interface TechniquePractice {
  technique: string
  date: string
  durationMinutes: number
  outcome: TechniqueOutcome
}

export interface DreamSnapshot {
  readonly dreams: readonly DreamRecord[]
  readonly dailyLogs: readonly DailyLog[]
  readonly techniquePractices?: readonly TechniquePractice[]
}

export interface DreamSearchQuery {
  keyword: string
  normalizedKeyword: string
  limit: number
}

export type DreamSearchField = 'title' | 'content' | 'tags'

export interface DreamSearchResultItem {
  dreamId: number
  date: DateString
  title: string
  matchedField: DreamSearchField
  snippet: string
  matchIndex: number
}

export interface DreamSearchResult {
  query: DreamSearchQuery
  totalMatched: number
  returnedCount: number
  truncated: boolean
  items: DreamSearchResultItem[]
}
