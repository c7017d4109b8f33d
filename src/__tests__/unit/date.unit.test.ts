import { describe, expect, it } from 'vitest'
import {
  daysInMonth,
  diffDays,
  formatDateKey,
  getIsoWeekKey,
  getTimestampDateKey,
  parseDateKey,
  parseTimeOfDay,
  weekdayIndexMondayStart,
} from '../../utils/date'

describe('date utils', () => {
  it('formatDateKey 应输出补零的本地日期', () => {
    expect(formatDateKey(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05')
  })

  it('parseDateKey 应拒绝不存在的日期', () => {
    expect(parseDateKey('2023-02-29')).toBeNull()
    expect(parseDateKey('2024-2-01')).toBeNull()
    expect(parseDateKey('2024-02-29')?.getDate()).toBe(29)
  })

  it('getTimestampDateKey 应提取日期部分并校验时间', () => {
    expect(getTimestampDateKey('2024-03-09T23:59:59')).toBe('2024-03-09')
    expect(getTimestampDateKey('2024-03-09 07:15')).toBe('2024-03-09')
    expect(getTimestampDateKey('2024-03-09')).toBe('2024-03-09')
    expect(getTimestampDateKey('2024-03-09T24:00')).toBeNull()
    expect(getTimestampDateKey('yesterday')).toBeNull()
  })

  it('parseTimeOfDay 应返回分钟数', () => {
    expect(parseTimeOfDay('7:05')).toBe(425)
    expect(parseTimeOfDay('00:00')).toBe(0)
    expect(parseTimeOfDay('23:60')).toBeNull()
    expect(parseTimeOfDay('24:00')).toBeNull()
  })

  it('日历计算应按本地日期进行', () => {
    expect(diffDays(new Date(2024, 2, 31, 1), new Date(2024, 2, 1, 23))).toBe(30)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(weekdayIndexMondayStart(new Date(2024, 0, 1))).toBe(0)
    expect(weekdayIndexMondayStart(new Date(2024, 0, 7))).toBe(6)
    expect(getIsoWeekKey(new Date(2024, 0, 1))).toBe('2024-W01')
  })
})
