import defaultStopWords from '../data/stop-words.json'
import type { DreamRecord } from '../types/dream'
import type { RankedItem, WordFrequencyItem } from '../types/stats'

export const MIN_TOKEN_LENGTH = 3

const PUNCTUATION_PATTERN = /[\p{P}\p{S}]/gu
const WHITESPACE_PATTERN = /\s+/u

export interface RankableEntry {
  key: string
  label: string
}

export interface WordFrequencyOptions {
  topN: number
  stopWords: ReadonlySet<string>
  includeTitles: boolean
}

interface RankAccumulator {
  label: string
  count: number
  firstSeen: number
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(PUNCTUATION_PATTERN, '')
}

export function buildStopWordSet(words: Iterable<string>): Set<string> {
  const stopWordSet = new Set<string>()
  for (const word of words) {
    const normalized = normalizeText(word).trim()
    if (normalized) {
      stopWordSet.add(normalized)
    }
  }
  return stopWordSet
}

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = buildStopWordSet(defaultStopWords)

export function tokenizeText(text: string, stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS): string[] {
  return normalizeText(text)
    .split(WHITESPACE_PATTERN)
    .filter((token) => [...token].length >= MIN_TOKEN_LENGTH && !stopWords.has(token))
}

export function countWords(content: string): number {
  const normalized = content.trim()
  if (!normalized) {
    return 0
  }
  return normalized.split(WHITESPACE_PATTERN).length
}

/**
 * Counts entries by key and orders them by count, highest first. Equal
 * counts keep the order in which their key was first seen.
 */
export function rankByFrequency(entries: Iterable<RankableEntry>): RankedItem[] {
  const accumulators = new Map<string, RankAccumulator>()
  let index = 0

  for (const entry of entries) {
    const existed = accumulators.get(entry.key)
    if (existed) {
      existed.count += 1
    } else {
      accumulators.set(entry.key, { label: entry.label, count: 1, firstSeen: index })
    }
    index += 1
  }

  return [...accumulators.entries()]
    .sort(([, left], [, right]) => right.count - left.count || left.firstSeen - right.firstSeen)
    .map(([key, item]) => ({ key, label: item.label, count: item.count }))
}

function* collectDreamTokens(dreams: readonly DreamRecord[], options: WordFrequencyOptions): Generator<RankableEntry> {
  for (const dream of dreams) {
    const texts = options.includeTitles ? [dream.title, dream.content] : [dream.content]
    for (const text of texts) {
      for (const token of tokenizeText(text, options.stopWords)) {
        yield { key: token, label: token }
      }
    }
  }
}

export function buildWordFrequency(dreams: readonly DreamRecord[], options: WordFrequencyOptions): WordFrequencyItem[] {
  return rankByFrequency(collectDreamTokens(dreams, options))
    .slice(0, options.topN)
    .map((item) => ({ word: item.key, count: item.count }))
}
