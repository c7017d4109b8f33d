import { z } from 'zod'
import type { ReportOptions, ResolvedReportConfig } from '../types/config'
import { configurationError } from './errors'
import { buildStopWordSet, DEFAULT_STOP_WORDS } from './text-analyzer'

export const DEFAULT_TOP_N = 10
const YEAR_RANGE_MIN = 1970
const YEAR_RANGE_MAX = 9999

const ReportOptionsSchema = z.object({
  topN: z.number().int().positive().default(DEFAULT_TOP_N),
  calendarMonth: z
    .object({
      year: z.number().int().min(YEAR_RANGE_MIN).max(YEAR_RANGE_MAX),
      month: z.number().int().min(1).max(12),
    })
    .optional(),
  includeTitles: z.boolean().default(false),
})

/**
 * Validates report options and fills in defaults. Throws a configuration
 * error before any statistics are computed.
 */
export function resolveReportConfig(options: ReportOptions = {}): ResolvedReportConfig {
  const now = options.now ?? new Date()
  if (Number.isNaN(now.getTime())) {
    throw configurationError('invalid_reference_date', '报告参考日期无效')
  }

  const result = ReportOptionsSchema.safeParse({
    topN: options.topN,
    calendarMonth: options.calendarMonth,
    includeTitles: options.includeTitles,
  })
  if (!result.success) {
    const issue = result.error.issues[0]
    if (issue?.path[0] === 'topN') {
      throw configurationError('invalid_top_n', `高频词数量需为正整数：${String(options.topN)}`)
    }
    const month = options.calendarMonth
    throw configurationError(
      'invalid_calendar_month',
      `日历月份无效：${month ? `${month.year}-${month.month}` : String(month)}`,
    )
  }

  return {
    topN: result.data.topN,
    calendarMonth: result.data.calendarMonth ?? { year: now.getFullYear(), month: now.getMonth() + 1 },
    stopWords: options.stopWords ? buildStopWordSet(options.stopWords) : DEFAULT_STOP_WORDS,
    includeTitles: result.data.includeTitles,
    now,
  }
}
