import type { DateString } from '../types/dream'

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/

export const MINUTES_PER_DAY = 24 * 60

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

export function formatDateKey(date: Date): DateString {
  const year = date.getFullYear()
  const month = pad2(date.getMonth() + 1)
  const day = pad2(date.getDate())

  return `${year}-${month}-${day}`
}

export function formatMonthKey(year: number, month: number): string {
  return `${year}-${pad2(month)}`
}

export function parseDateKey(dateKey: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(dateKey)
  if (!match) {
    return null
  }
  const year = Number.parseInt(match[1], 10)
  const month = Number.parseInt(match[2], 10)
  const day = Number.parseInt(match[3], 10)

  // Noon avoids DST edges when shifting by whole days.
  const candidate = new Date(year, month - 1, day, 12)
  if (
    candidate.getFullYear() !== year ||
    candidate.getMonth() !== month - 1 ||
    candidate.getDate() !== day
  ) {
    return null
  }
  return candidate
}

export function isValidDateKey(value: string): boolean {
  return parseDateKey(value) !== null
}

/**
 * Returns the calendar date component of a creation timestamp, or `null`
 * when the value is not a valid `YYYY-MM-DD[THH:mm[:ss]]` string.
 */
export function getTimestampDateKey(timestamp: string): DateString | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp.trim())
  if (!match) {
    return null
  }
  const parsedDate = parseDateKey(match[1])
  if (!parsedDate) {
    return null
  }
  if (match[2] !== undefined) {
    const hours = Number.parseInt(match[2], 10)
    const minutes = Number.parseInt(match[3], 10)
    const seconds = match[4] === undefined ? 0 : Number.parseInt(match[4], 10)
    if (hours > 23 || minutes > 59 || seconds > 59) {
      return null
    }
  }
  return formatDateKey(parsedDate)
}

export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim())
  if (!match) {
    return null
  }
  const hours = Number.parseInt(match[1], 10)
  const minutes = Number.parseInt(match[2], 10)
  if (hours > 23 || minutes > 59) {
    return null
  }
  return hours * 60 + minutes
}

export function diffDays(left: Date, right: Date): number {
  const leftAtNoon = new Date(left.getFullYear(), left.getMonth(), left.getDate(), 12)
  const rightAtNoon = new Date(right.getFullYear(), right.getMonth(), right.getDate(), 12)
  return Math.round((leftAtNoon.getTime() - rightAtNoon.getTime()) / 86_400_000)
}

export function shiftDateByDays(base: Date, days: number): Date {
  return new Date(base.getFullYear(), base.getMonth(), base.getDate() + days, 12)
}

export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 12)
}

export function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate()
}

export function weekdayIndexMondayStart(date: Date): number {
  return (date.getDay() + 6) % 7
}

export function getMonthKey(dateKey: string): string {
  return dateKey.slice(0, 7)
}

/** ISO 8601 week key, e.g. `2024-W01`. Weeks start on Monday. */
export function getIsoWeekKey(date: Date): string {
  const thursday = shiftDateByDays(date, 3 - weekdayIndexMondayStart(date))
  const weekYear = thursday.getFullYear()
  const dayOfYear = diffDays(thursday, new Date(weekYear, 0, 1, 12))
  const week = Math.floor(dayOfYear / 7) + 1
  return `${weekYear}-W${pad2(week)}`
}
