import type {
  DreamRecord,
  DreamSearchField,
  DreamSearchResult,
  DreamSearchResultItem,
} from '../types/dream'
import { getTimestampDateKey } from './date'

const DEFAULT_SEARCH_LIMIT = 50
const DEFAULT_SNIPPET_RADIUS = 24
const TAG_SEPARATOR = ', '

interface SearchDreamRecordsOptions {
  limit?: number
  snippetRadius?: number
}

interface SearchableField {
  field: DreamSearchField
  text: string
}

function normalizeLimit(limit?: number): number {
  if (typeof limit !== 'number' || !Number.isFinite(limit)) {
    return DEFAULT_SEARCH_LIMIT
  }
  return Math.max(0, Math.floor(limit))
}

function normalizeSnippetRadius(snippetRadius?: number): number {
  if (typeof snippetRadius !== 'number' || !Number.isFinite(snippetRadius)) {
    return DEFAULT_SNIPPET_RADIUS
  }
  return Math.max(0, Math.floor(snippetRadius))
}

function toSnippetContent(content: string): string {
  return content.replace(/\s+/g, ' ').trim()
}

export function buildMatchSnippet(text: string, matchIndex: number, radius: number, matchLength = 1): string {
  if (!text) {
    return ''
  }

  const safeRadius = Math.max(0, radius)
  const safeMatchIndex = Math.min(Math.max(0, matchIndex), text.length - 1)
  const start = Math.max(0, safeMatchIndex - safeRadius)
  const end = Math.min(text.length, safeMatchIndex + Math.max(1, matchLength) + safeRadius)
  const snippet = toSnippetContent(text.slice(start, end))
  if (!snippet) {
    return ''
  }

  const prefix = start > 0 ? '...' : ''
  const suffix = end < text.length ? '...' : ''
  return `${prefix}${snippet}${suffix}`
}

function toSearchItem(
  dream: DreamRecord,
  normalizedKeyword: string,
  snippetRadius: number,
): DreamSearchResultItem | null {
  const date = getTimestampDateKey(dream.createdAt)
  if (!date) {
    return null
  }

  const fields: SearchableField[] = [
    { field: 'title', text: dream.title },
    { field: 'content', text: dream.content },
    { field: 'tags', text: dream.tags.join(TAG_SEPARATOR) },
  ]

  for (const { field, text } of fields) {
    const matchIndex = text.toLowerCase().indexOf(normalizedKeyword)
    if (matchIndex < 0) {
      continue
    }
    return {
      dreamId: dream.id,
      date,
      title: dream.title,
      matchedField: field,
      snippet: buildMatchSnippet(text, matchIndex, snippetRadius, normalizedKeyword.length),
      matchIndex,
    }
  }

  return null
}

export function searchDreamRecords(
  dreams: readonly DreamRecord[],
  keyword: string,
  options: SearchDreamRecordsOptions = {},
): DreamSearchResult {
  const normalizedKeyword = keyword.trim().toLowerCase()
  const limit = normalizeLimit(options.limit)
  const query = { keyword, normalizedKeyword, limit }
  if (!normalizedKeyword) {
    return { query, totalMatched: 0, returnedCount: 0, truncated: false, items: [] }
  }

  const snippetRadius = normalizeSnippetRadius(options.snippetRadius)
  const allMatchedItems = dreams
    .map((dream) => toSearchItem(dream, normalizedKeyword, snippetRadius))
    .filter((item): item is DreamSearchResultItem => item !== null)
    .sort((a, b) => b.date.localeCompare(a.date) || b.dreamId - a.dreamId)

  const items = allMatchedItems.slice(0, limit)
  return {
    query,
    totalMatched: allMatchedItems.length,
    returnedCount: items.length,
    truncated: allMatchedItems.length > items.length,
    items,
  }
}
