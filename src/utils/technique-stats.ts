import type { TechniqueOutcome, TechniquePractice } from '../types/dream'
import type { TechniqueEffectivenessSummary, TechniqueRecommendation, TechniqueStatsItem } from '../types/stats'

const PRIMARY_THRESHOLD = 70
const COMBINE_THRESHOLD = 40

interface TechniqueAccumulator {
  technique: string
  attempts: number
  successes: number
  lastPracticed: string
  totalMinutes: number
  controlLevels: number[]
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

export function isSuccessfulOutcome(outcome: TechniqueOutcome): boolean {
  return outcome.type === 'partial_lucid' || outcome.type === 'full_lucid'
}

export function resolveRecommendation(successRate: number): TechniqueRecommendation {
  if (successRate > PRIMARY_THRESHOLD) {
    return 'primary'
  }
  if (successRate > COMBINE_THRESHOLD) {
    return 'combine'
  }
  return 'adjust'
}

function toStatsItem(accumulator: TechniqueAccumulator): TechniqueStatsItem {
  const successRate = accumulator.attempts > 0 ? (accumulator.successes / accumulator.attempts) * 100 : 0
  const { controlLevels } = accumulator

  return {
    technique: accumulator.technique,
    attempts: accumulator.attempts,
    successes: accumulator.successes,
    successRate,
    lastPracticed: accumulator.lastPracticed,
    totalMinutes: accumulator.totalMinutes,
    averageControlLevel:
      controlLevels.length > 0 ? controlLevels.reduce((sum, level) => sum + level, 0) / controlLevels.length : null,
    recommendation: resolveRecommendation(successRate),
  }
}

export function buildTechniqueEffectiveness(
  practices: readonly TechniquePractice[] = [],
): TechniqueEffectivenessSummary {
  const techniqueMap = new Map<string, TechniqueAccumulator>()

  for (const practice of practices) {
    const technique = practice.technique.trim()
    const accumulator = techniqueMap.get(technique) ?? {
      technique,
      attempts: 0,
      successes: 0,
      lastPracticed: practice.date,
      totalMinutes: 0,
      controlLevels: [],
    }

    accumulator.attempts += 1
    accumulator.totalMinutes += practice.durationMinutes
    if (practice.date > accumulator.lastPracticed) {
      accumulator.lastPracticed = practice.date
    }
    if (isSuccessfulOutcome(practice.outcome)) {
      accumulator.successes += 1
    }
    if (practice.outcome.type === 'full_lucid') {
      accumulator.controlLevels.push(practice.outcome.controlLevel)
    }
    techniqueMap.set(technique, accumulator)
  }

  const items = [...techniqueMap.values()]
    .map(toStatsItem)
    .sort((left, right) => right.successRate - left.successRate || compareNames(left.technique, right.technique))
  const hasComparison = items.length > 1

  return {
    items,
    mostEffective: hasComparison ? items[0].technique : null,
    leastEffective: hasComparison ? items[items.length - 1].technique : null,
  }
}
