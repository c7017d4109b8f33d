import { describe, expect, it } from 'vitest'
import type { DreamRecord } from '../../types/dream'
import { buildMatchSnippet, searchDreamRecords } from '../../utils/dream-search'

function buildDream(id: number, date: string, title: string, content: string, tags: string[]): DreamRecord {
  return {
    id,
    createdAt: `${date}T07:00:00`,
    title,
    content,
    tags,
    isLucid: false,
  }
}

const dreams: DreamRecord[] = [
  buildDream(1, '2024-01-01', 'Flying over the sea', 'I was flying above waves', ['ocean']),
  buildDream(2, '2024-01-03', 'School', 'A test in the old school', ['anxiety']),
  buildDream(3, '2024-01-02', 'Beach', 'Walking by the sea at night', ['Ocean']),
]

describe('searchDreamRecords', () => {
  it('空关键词应返回空结果', () => {
    const result = searchDreamRecords(dreams, '   ')

    expect(result.query.normalizedKeyword).toBe('')
    expect(result.totalMatched).toBe(0)
    expect(result.items).toEqual([])
  })

  it('应忽略大小写并按日期倒序返回', () => {
    const result = searchDreamRecords(dreams, 'SEA', { snippetRadius: 4 })

    expect(result.totalMatched).toBe(2)
    expect(result.items.map((item) => item.dreamId)).toEqual([3, 1])
    expect(result.items[0]).toEqual({
      dreamId: 3,
      date: '2024-01-02',
      title: 'Beach',
      matchedField: 'content',
      snippet: '...the sea at...',
      matchIndex: 15,
    })
    expect(result.items[1].matchedField).toBe('title')
    expect(result.items[1].matchIndex).toBe(16)
  })

  it('应匹配标签', () => {
    const result = searchDreamRecords(dreams, 'anxiety')

    expect(result.items).toHaveLength(1)
    expect(result.items[0]).toMatchObject({ dreamId: 2, matchedField: 'tags', snippet: 'anxiety' })
  })

  it('命中超过上限时应截断并标记 truncated', () => {
    const result = searchDreamRecords(dreams, 'ocean', { limit: 1 })

    expect(result.totalMatched).toBe(2)
    expect(result.returnedCount).toBe(1)
    expect(result.truncated).toBe(true)
    expect(result.items[0].dreamId).toBe(3)
  })
})

describe('buildMatchSnippet', () => {
  it('命中位于中间时应追加前后省略号', () => {
    expect(buildMatchSnippet('0123456789ABCDEFGHIJ', 10, 3, 2)).toBe('...789ABCDE...')
  })

  it('命中位于开头或结尾时省略号应按边界处理', () => {
    expect(buildMatchSnippet('hello world', 0, 4, 5)).toBe('hello wor...')
    expect(buildMatchSnippet('hello world', 10, 4, 1)).toBe('...world')
  })
})
