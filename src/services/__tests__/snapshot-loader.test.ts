import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { describe, expect, it, vi } from 'vitest'
import { loadSnapshotFromDirectory, SnapshotLoadError } from '../snapshot-loader'

const DATA_DIR = '/journal'

function createReader(files: Record<string, string>) {
  return async (filePath: string): Promise<string> => {
    const content = files[filePath]
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: ${filePath}`), { code: 'ENOENT' })
    }
    return content
  }
}

const storedDreams = [
  {
    id: 1,
    date: '2024-01-01',
    title: ' Sea ',
    content: 'waves everywhere ',
    tags: ['ocean', 'ocean', ' night '],
    lucid: true,
    dream_sign: 'water',
  },
  {
    id: 2,
    date: '2024-01-02',
    title: 'School',
    content: 'an exam',
    tags: [],
    lucid: null,
    dream_sign: null,
  },
]

const storedLogs = [
  {
    date: '2024-01-01',
    dream: storedDreams[0],
    sleep: { date: '2024-01-01', bedtime: '23:00', wake_time: '07:00', quality: 4, notes: '' },
    wake_feeling: 'rested',
    reality_checks: 6,
    notes: '',
    technique_practice: null,
    wbtb_alarm_used: 2,
  },
  {
    date: '2024-01-02',
    dream: null,
    sleep: null,
    wake_feeling: null,
    reality_checks: 1,
    notes: 'travel day',
    technique_practice: null,
    wbtb_alarm_used: null,
  },
]

const storedPractices = [
  { technique: 'MILD', date: '2024-01-01', duration_minutes: 12, outcome: { type: 'Failed' } },
  { technique: 'WBTB', date: '2024-01-02', duration_minutes: 30, outcome: { type: 'FullLucid', data: { control_level: 4 } } },
]

describe('loadSnapshotFromDirectory', () => {
  it('应把日记文件映射为快照', async () => {
    const warn = vi.fn()
    const result = await loadSnapshotFromDirectory(DATA_DIR, {
      readText: createReader({
        [path.join(DATA_DIR, 'dreams.json')]: JSON.stringify(storedDreams),
        [path.join(DATA_DIR, 'daily_logs.json')]: JSON.stringify(storedLogs),
        [path.join(DATA_DIR, 'technique_history.json')]: JSON.stringify(storedPractices),
      }),
      warn,
    })

    expect(result.snapshot.dreams).toEqual([
      {
        id: 1,
        createdAt: '2024-01-01',
        title: 'Sea',
        content: 'waves everywhere',
        tags: ['ocean', 'night'],
        isLucid: true,
        dreamSign: 'water',
      },
      {
        id: 2,
        createdAt: '2024-01-02',
        title: 'School',
        content: 'an exam',
        tags: [],
        isLucid: false,
      },
    ])
    expect(result.snapshot.dailyLogs).toEqual([
      {
        date: '2024-01-01',
        bedtime: '23:00',
        wakeTime: '07:00',
        quality: 4,
        realityChecks: 6,
        wakeFeeling: 'rested',
        dreamIds: [1],
        wbtbAlarmId: 2,
      },
    ])
    expect(result.snapshot.techniquePractices).toEqual([
      { technique: 'MILD', date: '2024-01-01', durationMinutes: 12, outcome: { type: 'failed' } },
      { technique: 'WBTB', date: '2024-01-02', durationMinutes: 30, outcome: { type: 'full_lucid', controlLevel: 4 } },
    ])
    expect(result.skipped).toEqual([{ file: 'daily_logs.json', entry: '2024-01-02', reason: '缺少睡眠记录' }])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('已跳过 1 条无法映射的每日记录：2024-01-02')
  })

  it('文件不存在时应返回空集合', async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'dream-journal-'))
    try {
      const result = await loadSnapshotFromDirectory(directory)

      expect(result.snapshot).toEqual({ dreams: [], dailyLogs: [], techniquePractices: [] })
      expect(result.skipped).toEqual([])
    } finally {
      await rm(directory, { recursive: true, force: true })
    }
  })

  it('应从磁盘读取自定义文件名', async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'dream-journal-'))
    try {
      await writeFile(path.join(directory, 'my-dreams.json'), JSON.stringify([storedDreams[1]]), 'utf-8')

      const result = await loadSnapshotFromDirectory(directory, { fileNames: { dreams: 'my-dreams.json' } })

      expect(result.snapshot.dreams.map((dream) => dream.id)).toEqual([2])
    } finally {
      await rm(directory, { recursive: true, force: true })
    }
  })

  it('JSON 无效时应抛出 SnapshotLoadError', async () => {
    const dreamsPath = path.join(DATA_DIR, 'dreams.json')
    const loading = loadSnapshotFromDirectory(DATA_DIR, {
      readText: createReader({ [dreamsPath]: '{ not json' }),
    })

    await expect(loading).rejects.toBeInstanceOf(SnapshotLoadError)
    await expect(loading).rejects.toMatchObject({ file: dreamsPath })
  })

  it('结构不符时应抛出 SnapshotLoadError', async () => {
    const logsPath = path.join(DATA_DIR, 'daily_logs.json')
    const loading = loadSnapshotFromDirectory(DATA_DIR, {
      readText: createReader({ [logsPath]: JSON.stringify([{ date: '2024-01-01', reality_checks: 'many' }]) }),
    })

    await expect(loading).rejects.toMatchObject({ name: 'SnapshotLoadError', file: logsPath })
  })

  it('其他读取错误不应被吞掉', async () => {
    const loading = loadSnapshotFromDirectory(DATA_DIR, {
      readText: async () => {
        throw Object.assign(new Error('permission denied'), { code: 'EACCES' })
      },
    })

    await expect(loading).rejects.toBeInstanceOf(SnapshotLoadError)
  })
})
