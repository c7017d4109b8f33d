export interface CalendarMonthOption {
  year: number
  month: number
}

export interface ReportOptions {
  topN?: number
  calendarMonth?: CalendarMonthOption
  stopWords?: Iterable<string>
  includeTitles?: boolean
  now?: Date
}

export interface ResolvedReportConfig {
  topN: number
  calendarMonth: CalendarMonthOption
  stopWords: ReadonlySet<string>
  includeTitles: boolean
  now: Date
}

export interface SnapshotFileNames {
  dreams: string
  dailyLogs: string
  techniqueHistory: string
}
