import type { DailyLog, DreamRecord, DreamSnapshot, TechniquePractice } from '../types/dream'
import { getTimestampDateKey, isValidDateKey, parseTimeOfDay } from './date'
import { malformedInput } from './errors'

export const MIN_SLEEP_QUALITY = 1
export const MAX_SLEEP_QUALITY = 5
export const MIN_CONTROL_LEVEL = 1
export const MAX_CONTROL_LEVEL = 5

export function hasDreamSign(dream: DreamRecord): boolean {
  return typeof dream.dreamSign === 'string' && dream.dreamSign.trim().length > 0
}

function assertDreamRecord(dream: DreamRecord, seenIds: Set<number>): void {
  if (!Number.isSafeInteger(dream.id) || dream.id <= 0) {
    throw malformedInput('invalid_dream_id', `梦境 ID 无效：${String(dream.id)}`, dream.id)
  }
  if (seenIds.has(dream.id)) {
    throw malformedInput('duplicate_dream_id', `梦境 #${dream.id} 重复出现`, dream.id)
  }
  seenIds.add(dream.id)

  if (getTimestampDateKey(dream.createdAt) === null) {
    throw malformedInput('invalid_created_at', `梦境 #${dream.id} 的创建时间无效：${dream.createdAt}`, dream.id)
  }

  const signed = hasDreamSign(dream)
  if (dream.isLucid && !signed) {
    throw malformedInput('lucid_without_dream_sign', `清醒梦 #${dream.id} 缺少梦境征兆`, dream.id)
  }
  if (!dream.isLucid && signed) {
    throw malformedInput('dream_sign_without_lucid', `非清醒梦 #${dream.id} 不应记录梦境征兆`, dream.id)
  }
}

function assertDailyLog(log: DailyLog, seenDates: Set<string>): void {
  if (!isValidDateKey(log.date)) {
    throw malformedInput('invalid_log_date', `每日记录日期格式无效，需为 YYYY-MM-DD：${log.date}`, log.date)
  }
  if (seenDates.has(log.date)) {
    throw malformedInput('duplicate_log_date', `${log.date} 存在多条每日记录`, log.date)
  }
  seenDates.add(log.date)

  if (parseTimeOfDay(log.bedtime) === null || parseTimeOfDay(log.wakeTime) === null) {
    throw malformedInput(
      'invalid_sleep_time',
      `${log.date} 的入睡或起床时间无效，需为 HH:MM：${log.bedtime} / ${log.wakeTime}`,
      log.date,
    )
  }
  if (!Number.isInteger(log.quality) || log.quality < MIN_SLEEP_QUALITY || log.quality > MAX_SLEEP_QUALITY) {
    throw malformedInput(
      'quality_out_of_range',
      `${log.date} 的睡眠质量需为 ${MIN_SLEEP_QUALITY}-${MAX_SLEEP_QUALITY} 的整数：${log.quality}`,
      log.date,
    )
  }
  if (!Number.isInteger(log.realityChecks) || log.realityChecks < 0) {
    throw malformedInput(
      'negative_reality_checks',
      `${log.date} 的现实检查次数需为非负整数：${log.realityChecks}`,
      log.date,
    )
  }
}

function assertTechniquePractice(practice: TechniquePractice, index: number): void {
  const subject = `${practice.technique || '?'}@${practice.date}`
  if (!practice.technique.trim()) {
    throw malformedInput('invalid_technique_practice', `第 ${index + 1} 条练习记录缺少技巧名称`, subject)
  }
  if (!isValidDateKey(practice.date)) {
    throw malformedInput('invalid_technique_practice', `练习记录 ${subject} 的日期无效`, subject)
  }
  if (!Number.isInteger(practice.durationMinutes) || practice.durationMinutes < 0) {
    throw malformedInput('invalid_technique_practice', `练习记录 ${subject} 的时长无效`, subject)
  }
  if (practice.outcome.type === 'full_lucid') {
    const level = practice.outcome.controlLevel
    if (!Number.isInteger(level) || level < MIN_CONTROL_LEVEL || level > MAX_CONTROL_LEVEL) {
      throw malformedInput(
        'invalid_technique_practice',
        `练习记录 ${subject} 的控制等级需为 ${MIN_CONTROL_LEVEL}-${MAX_CONTROL_LEVEL}：${level}`,
        subject,
      )
    }
  }
}

/**
 * Checks every snapshot invariant and throws on the first violation.
 * Nothing is dropped or coerced.
 */
export function assertValidSnapshot(snapshot: DreamSnapshot): void {
  const seenIds = new Set<number>()
  for (const dream of snapshot.dreams) {
    assertDreamRecord(dream, seenIds)
  }

  const seenDates = new Set<string>()
  for (const log of snapshot.dailyLogs) {
    assertDailyLog(log, seenDates)
  }

  snapshot.techniquePractices?.forEach((practice, index) => {
    assertTechniquePractice(practice, index)
  })
}
