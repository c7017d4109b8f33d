import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { SnapshotFileNames } from '../types/config'
import type { DailyLog, DreamRecord, DreamSnapshot, TechniqueOutcome, TechniquePractice } from '../types/dream'
import { toErrorMessage } from '../utils/errors'

export const DEFAULT_SNAPSHOT_FILE_NAMES: SnapshotFileNames = {
  dreams: 'dreams.json',
  dailyLogs: 'daily_logs.json',
  techniqueHistory: 'technique_history.json',
}

const StoredDreamSchema = z.object({
  id: z.number().int(),
  date: z.string(),
  title: z.string().default(''),
  content: z.string().default(''),
  tags: z.array(z.string()).default([]),
  lucid: z.boolean().nullish(),
  dream_sign: z.string().nullish(),
})

const StoredSleepSchema = z.object({
  date: z.string().optional(),
  bedtime: z.string(),
  wake_time: z.string(),
  quality: z.number().int(),
  notes: z.string().optional(),
})

const StoredDailyLogSchema = z.object({
  date: z.string(),
  dream: StoredDreamSchema.nullish(),
  sleep: StoredSleepSchema.nullish(),
  wake_feeling: z.string().nullish(),
  reality_checks: z.number().int().default(0),
  notes: z.string().default(''),
  wbtb_alarm_used: z.number().int().nullish(),
})

const StoredTechniqueOutcomeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Unattempted') }),
  z.object({ type: z.literal('Failed') }),
  z.object({ type: z.literal('PartialLucid') }),
  z.object({ type: z.literal('FullLucid'), data: z.object({ control_level: z.number().int() }) }),
])

const StoredTechniquePracticeSchema = z.object({
  technique: z.string(),
  date: z.string(),
  duration_minutes: z.number().int(),
  outcome: StoredTechniqueOutcomeSchema,
})

type StoredDream = z.infer<typeof StoredDreamSchema>
type StoredDailyLog = z.infer<typeof StoredDailyLogSchema>
type StoredTechniquePractice = z.infer<typeof StoredTechniquePracticeSchema>

export interface SkippedSnapshotEntry {
  file: string
  entry: string
  reason: string
}

export interface LoadSnapshotOptions {
  fileNames?: Partial<SnapshotFileNames>
  readText?: (filePath: string) => Promise<string>
  warn?: (message: string) => void
}

export interface LoadSnapshotResult {
  snapshot: DreamSnapshot
  skipped: SkippedSnapshotEntry[]
}

export class SnapshotLoadError extends Error {
  readonly file: string
  override readonly cause?: unknown

  constructor(file: string, message: string, cause?: unknown) {
    super(message)
    this.name = 'SnapshotLoadError'
    this.file = file
    this.cause = cause
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readJsonArray<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  readText: (filePath: string) => Promise<string>,
): Promise<T[]> {
  let rawText: string
  try {
    rawText = await readText(filePath)
  } catch (error) {
    if (isMissingFileError(error)) {
      return []
    }
    throw new SnapshotLoadError(filePath, `读取 ${filePath} 失败：${toErrorMessage(error, '未知错误')}`, error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawText)
  } catch (error) {
    throw new SnapshotLoadError(filePath, `${filePath} 不是有效的 JSON：${toErrorMessage(error, '解析失败')}`, error)
  }

  const result = z.array(schema).safeParse(parsed)
  if (!result.success) {
    throw new SnapshotLoadError(filePath, `${filePath} 内容格式无效：${result.error.message}`, result.error)
  }
  return result.data
}

function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>()
  for (const tag of tags) {
    const trimmed = tag.trim()
    if (trimmed) {
      seen.add(trimmed)
    }
  }
  return [...seen]
}

export function toDreamRecord(stored: StoredDream): DreamRecord {
  const dreamSign = stored.dream_sign?.trim()
  return {
    id: stored.id,
    createdAt: stored.date,
    title: stored.title.trim(),
    content: stored.content.trim(),
    tags: normalizeTags(stored.tags),
    isLucid: stored.lucid === true,
    ...(dreamSign ? { dreamSign } : {}),
  }
}

export function toDailyLog(stored: StoredDailyLog): DailyLog | null {
  if (!stored.sleep) {
    return null
  }

  const log: DailyLog = {
    date: stored.date,
    bedtime: stored.sleep.bedtime.trim(),
    wakeTime: stored.sleep.wake_time.trim(),
    quality: stored.sleep.quality,
    realityChecks: stored.reality_checks,
  }
  if (stored.wake_feeling?.trim()) {
    log.wakeFeeling = stored.wake_feeling.trim()
  }
  if (stored.notes.trim()) {
    log.note = stored.notes.trim()
  }
  if (stored.dream) {
    log.dreamIds = [stored.dream.id]
  }
  if (typeof stored.wbtb_alarm_used === 'number') {
    log.wbtbAlarmId = stored.wbtb_alarm_used
  }
  return log
}

function toTechniqueOutcome(outcome: StoredTechniquePractice['outcome']): TechniqueOutcome {
  switch (outcome.type) {
    case 'Unattempted':
      return { type: 'unattempted' }
    case 'Failed':
      return { type: 'failed' }
    case 'PartialLucid':
      return { type: 'partial_lucid' }
    case 'FullLucid':
      return { type: 'full_lucid', controlLevel: outcome.data.control_level }
  }
}

export function toTechniquePractice(stored: StoredTechniquePractice): TechniquePractice {
  return {
    technique: stored.technique.trim(),
    date: stored.date,
    durationMinutes: stored.duration_minutes,
    outcome: toTechniqueOutcome(stored.outcome),
  }
}

/**
 * Reads the journal files from `directory` and maps them onto a snapshot.
 * Missing files are empty collections. Daily logs without a sleep section
 * cannot be represented and are returned in `skipped`.
 */
export async function loadSnapshotFromDirectory(
  directory: string,
  options: LoadSnapshotOptions = {},
): Promise<LoadSnapshotResult> {
  const fileNames = { ...DEFAULT_SNAPSHOT_FILE_NAMES, ...options.fileNames }
  const readText = options.readText ?? ((filePath: string) => readFile(filePath, 'utf-8'))
  const warn = options.warn ?? ((message: string) => console.warn(message))

  const [storedDreams, storedLogs, storedPractices] = await Promise.all([
    readJsonArray(path.join(directory, fileNames.dreams), StoredDreamSchema, readText),
    readJsonArray(path.join(directory, fileNames.dailyLogs), StoredDailyLogSchema, readText),
    readJsonArray(path.join(directory, fileNames.techniqueHistory), StoredTechniquePracticeSchema, readText),
  ])

  const skipped: SkippedSnapshotEntry[] = []
  const dailyLogs: DailyLog[] = []
  for (const stored of storedLogs) {
    const log = toDailyLog(stored)
    if (log) {
      dailyLogs.push(log)
      continue
    }
    skipped.push({ file: fileNames.dailyLogs, entry: stored.date, reason: '缺少睡眠记录' })
  }

  if (skipped.length > 0) {
    warn(`已跳过 ${skipped.length} 条无法映射的每日记录：${skipped.map((item) => item.entry).join(', ')}`)
  }

  return {
    snapshot: {
      dreams: storedDreams.map(toDreamRecord),
      dailyLogs,
      techniquePractices: storedPractices.map(toTechniquePractice),
    },
    skipped,
  }
}
