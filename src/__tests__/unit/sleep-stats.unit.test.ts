import { describe, expect, it } from 'vitest'
import type { DailyLog, DreamRecord } from '../../types/dream'
import { buildSleepStats, computeSleepDurationHours } from '../../utils/sleep-stats'

function buildLog(date: string, bedtime: string, wakeTime: string, quality: number): DailyLog {
  return {
    date,
    bedtime,
    wakeTime,
    quality,
    realityChecks: 0,
  }
}

function buildDream(id: number, date: string, isLucid: boolean): DreamRecord {
  return {
    id,
    createdAt: `${date}T06:45:00`,
    title: '',
    content: '',
    tags: [],
    isLucid,
    ...(isLucid ? { dreamSign: 'mirror' } : {}),
  }
}

describe('computeSleepDurationHours', () => {
  it('跨午夜时应按 24 小时取模计算', () => {
    expect(computeSleepDurationHours('23:00', '07:00')).toBe(8)
    expect(computeSleepDurationHours('22:30', '06:15')).toBe(7.75)
  })

  it('同一天内入睡与起床时应直接相减', () => {
    expect(computeSleepDurationHours('01:00', '09:30')).toBe(8.5)
    expect(computeSleepDurationHours('07:00', '07:00')).toBe(0)
  })

  it('时间格式无效时应返回 null', () => {
    expect(computeSleepDurationHours('24:00', '07:00')).toBeNull()
    expect(computeSleepDurationHours('23:00', 'seven')).toBeNull()
  })
})

describe('buildSleepStats', () => {
  it('空集合时所有平均值都应为 null', () => {
    const stats = buildSleepStats([], [])

    expect(stats.nightsTracked).toBe(0)
    expect(stats.averageDurationHours).toBeNull()
    expect(stats.minDurationHours).toBeNull()
    expect(stats.maxDurationHours).toBeNull()
    expect(stats.averageQuality).toBeNull()
    expect(stats.lucidNightShare).toBeNull()
    expect(stats.averageQualityOnLucidNights).toBeNull()
    expect(stats.qualityLucidity.map((row) => row.lucidityRate)).toEqual([null, null, null, null, null])
  })

  it('应计算平均、最短与最长睡眠时长', () => {
    const logs = [
      buildLog('2024-02-01', '23:00', '07:00', 4),
      buildLog('2024-02-02', '22:30', '06:15', 2),
      buildLog('2024-02-03', '00:00', '09:00', 3),
    ]

    const stats = buildSleepStats(logs, [])

    expect(stats.nightsTracked).toBe(3)
    expect(stats.averageDurationHours).toBe(8.25)
    expect(stats.minDurationHours).toBe(7.75)
    expect(stats.maxDurationHours).toBe(9)
    expect(stats.averageQuality).toBe(3)
  })

  it('输入顺序变化不应影响结果', () => {
    const logs = [
      buildLog('2024-02-01', '23:10', '07:05', 4),
      buildLog('2024-02-02', '22:47', '06:13', 2),
      buildLog('2024-02-03', '00:21', '09:02', 5),
      buildLog('2024-02-04', '01:33', '08:59', 1),
    ]
    const dreams = [buildDream(1, '2024-02-01', true), buildDream(2, '2024-02-03', false)]

    expect(buildSleepStats([...logs].reverse(), dreams)).toEqual(buildSleepStats(logs, dreams))
    expect(buildSleepStats([logs[2], logs[0], logs[3], logs[1]], dreams)).toEqual(buildSleepStats(logs, dreams))
  })

  it('应按睡眠质量分组统计有梦日的清醒率', () => {
    const logs = [
      buildLog('2024-01-01', '23:00', '07:00', 4),
      buildLog('2024-01-02', '23:00', '07:00', 4),
      buildLog('2024-01-03', '23:00', '07:00', 2),
      buildLog('2024-01-04', '23:00', '07:00', 5),
    ]
    const dreams = [
      buildDream(1, '2024-01-01', true),
      buildDream(2, '2024-01-01', false),
      buildDream(3, '2024-01-02', false),
      buildDream(4, '2024-01-03', true),
      buildDream(5, '2024-01-05', true),
    ]

    const stats = buildSleepStats(logs, dreams)

    expect(stats.qualityLucidity).toEqual([
      { quality: 1, dreamDays: 0, lucidDays: 0, lucidityRate: null },
      { quality: 2, dreamDays: 1, lucidDays: 1, lucidityRate: 1 },
      { quality: 3, dreamDays: 0, lucidDays: 0, lucidityRate: null },
      { quality: 4, dreamDays: 2, lucidDays: 1, lucidityRate: 0.5 },
      { quality: 5, dreamDays: 0, lucidDays: 0, lucidityRate: null },
    ])
    expect(stats.lucidNightShare).toBe(0.5)
    expect(stats.averageQualityOnLucidNights).toBe(3)
  })
})
