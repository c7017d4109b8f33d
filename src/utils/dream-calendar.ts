import type { DreamRecord } from '../types/dream'
import type { CalendarDayStatus, DreamCalendarDay, DreamCalendarMonth } from '../types/stats'
import type { CalendarMonthOption } from '../types/config'
import { daysInMonth, formatDateKey, formatMonthKey, weekdayIndexMondayStart } from './date'
import { indexDreamsByDate } from './dream-stats'

interface DayAccumulator {
  dreamCount: number
  lucid: boolean
}

function resolveStatus(accumulator: DayAccumulator | undefined): CalendarDayStatus {
  if (!accumulator || accumulator.dreamCount === 0) {
    return 'none'
  }
  return accumulator.lucid ? 'lucid' : 'dream'
}

/**
 * One cell per day of the month, without leading or trailing padding.
 * A day with any lucid dream is tagged `lucid`.
 */
export function buildDreamCalendarMonth(
  dreams: readonly DreamRecord[],
  { year, month }: CalendarMonthOption,
): DreamCalendarMonth {
  const monthKey = formatMonthKey(year, month)
  const dayMap = new Map<string, DayAccumulator>()

  for (const { dream, dateKey } of indexDreamsByDate(dreams)) {
    if (!dateKey.startsWith(`${monthKey}-`)) {
      continue
    }
    const accumulator = dayMap.get(dateKey) ?? { dreamCount: 0, lucid: false }
    accumulator.dreamCount += 1
    accumulator.lucid = accumulator.lucid || dream.isLucid
    dayMap.set(dateKey, accumulator)
  }

  const days: DreamCalendarDay[] = Array.from({ length: daysInMonth(year, month) }, (_, index) => {
    const date = new Date(year, month - 1, index + 1, 12)
    const dateKey = formatDateKey(date)
    const accumulator = dayMap.get(dateKey)

    return {
      dateKey,
      day: index + 1,
      weekday: weekdayIndexMondayStart(date),
      status: resolveStatus(accumulator),
      dreamCount: accumulator?.dreamCount ?? 0,
    }
  })

  return {
    year,
    month,
    label: monthKey,
    days,
    dreamDayCount: days.filter((day) => day.status !== 'none').length,
    lucidDayCount: days.filter((day) => day.status === 'lucid').length,
  }
}
