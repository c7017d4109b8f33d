import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import JSZip from 'jszip'
import type { ReportOptions } from '../types/config'
import type { DreamRecord, DreamSnapshot } from '../types/dream'
import type { ExportFileItem, ExportManifest, ExportResult } from '../types/export'
import type { StatisticsReport } from '../types/stats'
import { getTimestampDateKey } from '../utils/date'
import { toErrorMessage } from '../utils/errors'
import { buildStatisticsReport } from '../utils/statistics-report'

const NO_DATA_LABEL = '暂无数据'

export type ExportOutcome = 'success' | 'no_data' | 'blocked'

export interface ExportExecutionResult extends ExportResult {
  outcome: ExportOutcome
  exportedAt: string
  message: string
  manifest?: ExportManifest
}

export interface ExportStatisticsReportOptions {
  now?: () => Date
  reportOptions?: Omit<ReportOptions, 'now'>
  loadSnapshot: () => Promise<DreamSnapshot>
  outputDirectory?: string
  writeArchive?: (archive: Uint8Array, archiveName: string) => Promise<void>
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

function formatDecimal(value: number | null, suffix = ''): string {
  return value === null ? NO_DATA_LABEL : `${value.toFixed(1)}${suffix}`
}

function formatRate(value: number | null): string {
  return value === null ? NO_DATA_LABEL : `${(value * 100).toFixed(1)}%`
}

export function buildArchiveName(now: Date): string {
  const year = now.getFullYear()
  const month = pad2(now.getMonth() + 1)
  const day = pad2(now.getDate())
  const hour = pad2(now.getHours())
  const minute = pad2(now.getMinutes())
  const second = pad2(now.getSeconds())
  return `dream-journal-report-${year}${month}${day}-${hour}${minute}${second}.zip`
}

export function renderSummaryMarkdown(report: StatisticsReport): string {
  const { dreams, sleep, realityChecks, techniques } = report
  const lines = [
    `# 梦境统计报告 ${report.referenceDate}`,
    '',
    '## 梦境',
    `- 总数：${dreams.totalCount}`,
    `- 清醒梦：${dreams.lucidCount}（${dreams.lucidPercentage.toFixed(1)}%）`,
    `- 平均字数：${formatDecimal(dreams.averageWordCount)}`,
    `- 当前连续记录：${dreams.streak.currentStreakDays} 天，最长 ${dreams.streak.longestStreakDays} 天`,
    `- 近 7 天：${dreams.weekly.dreamCount} 个梦境，其中清醒梦 ${dreams.weekly.lucidCount} 个`,
    '',
    '## 高频词',
    ...(report.wordFrequency.length > 0
      ? report.wordFrequency.map((item, index) => `${index + 1}. ${item.word}（${item.count}）`)
      : [NO_DATA_LABEL]),
    '',
    '## 睡眠',
    `- 记录天数：${sleep.nightsTracked}`,
    `- 平均时长：${formatDecimal(sleep.averageDurationHours, 'h')}`,
    `- 平均质量：${formatDecimal(sleep.averageQuality, '/5')}`,
    '',
    '| 睡眠质量 | 有梦天数 | 清醒梦天数 | 清醒率 |',
    '| --- | --- | --- | --- |',
    ...sleep.qualityLucidity.map(
      (row) => `| ${row.quality} | ${row.dreamDays} | ${row.lucidDays} | ${formatRate(row.lucidityRate)} |`,
    ),
    '',
    '## 现实检查',
    `- 总次数：${realityChecks.total}`,
    `- 日均：${realityChecks.averagePerDay.toFixed(1)}`,
    `- 最活跃：${realityChecks.mostActive ? `${realityChecks.mostActive.date}（${realityChecks.mostActive.count}）` : NO_DATA_LABEL}`,
    `- 最不活跃：${realityChecks.leastActive ? `${realityChecks.leastActive.date}（${realityChecks.leastActive.count}）` : NO_DATA_LABEL}`,
  ]

  if (techniques.items.length > 0) {
    lines.push('', '## 技巧效果')
    for (const item of techniques.items) {
      lines.push(`- ${item.technique}：${item.successRate.toFixed(1)}%（${item.successes}/${item.attempts}）`)
    }
  }

  return `${lines.join('\n')}\n`
}

export function renderDreamMarkdown(dream: DreamRecord): string {
  const lines = [`# ${dream.title || `梦境 #${dream.id}`}`, '', `- 日期：${dream.createdAt}`]
  if (dream.tags.length > 0) {
    lines.push(`- 标签：${dream.tags.join(', ')}`)
  }
  lines.push(`- 清醒梦：${dream.isLucid ? '是' : '否'}`)
  if (dream.dreamSign) {
    lines.push(`- 梦境征兆：${dream.dreamSign}`)
  }
  lines.push('', dream.content)
  return `${lines.join('\n')}\n`
}

export function toDreamExportFileItem(dream: DreamRecord): ExportFileItem {
  const date = getTimestampDateKey(dream.createdAt) ?? 'undated'
  return {
    entryId: `dream:${dream.id}`,
    type: 'dream',
    path: `dreams/${date}-${dream.id}.md`,
    content: renderDreamMarkdown(dream),
  }
}

export function buildExportManifest(
  items: ExportFileItem[],
  snapshot: DreamSnapshot,
  report: StatisticsReport,
  archiveName: string,
  exportedAt: string,
): ExportManifest {
  return {
    version: '1.0',
    exportedAt,
    archiveName,
    referenceDate: report.referenceDate,
    dreamCount: snapshot.dreams.length,
    dailyLogCount: snapshot.dailyLogs.length,
    techniquePracticeCount: snapshot.techniquePractices?.length ?? 0,
    files: items.map((item) => ({
      entryId: item.entryId,
      path: item.path,
      bytes: Buffer.byteLength(item.content, 'utf8'),
    })),
  }
}

export async function createExportArchive(items: ExportFileItem[], manifest: ExportManifest): Promise<Uint8Array> {
  const zip = new JSZip()

  for (const item of items) {
    zip.file(item.path, item.content)
  }
  zip.file('manifest.json', `${JSON.stringify(manifest, null, 2)}\n`)

  return zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  })
}

function createDirectoryWriter(directory: string): (archive: Uint8Array, archiveName: string) => Promise<void> {
  return async (archive, archiveName) => {
    await mkdir(directory, { recursive: true })
    await writeFile(path.join(directory, archiveName), archive)
  }
}

function isEmptySnapshot(snapshot: DreamSnapshot): boolean {
  return (
    snapshot.dreams.length === 0 &&
    snapshot.dailyLogs.length === 0 &&
    (snapshot.techniquePractices?.length ?? 0) === 0
  )
}

function blocked(exportedAt: string, message: string): ExportExecutionResult {
  return {
    outcome: 'blocked',
    archiveName: '',
    exportedAt,
    success: [],
    message,
  }
}

export async function exportStatisticsReport(options: ExportStatisticsReportOptions): Promise<ExportExecutionResult> {
  const now = options.now?.() ?? new Date()
  const exportedAt = now.toISOString()
  const archiveName = buildArchiveName(now)
  const writeArchive = options.writeArchive ?? createDirectoryWriter(options.outputDirectory ?? process.cwd())

  let snapshot: DreamSnapshot
  try {
    snapshot = await options.loadSnapshot()
  } catch (error) {
    return blocked(exportedAt, `导出失败：${toErrorMessage(error, '读取数据失败')}`)
  }

  if (isEmptySnapshot(snapshot)) {
    return {
      outcome: 'no_data',
      archiveName: '',
      exportedAt,
      success: [],
      message: '暂无可导出的梦境数据',
    }
  }

  let report: StatisticsReport
  try {
    report = buildStatisticsReport(snapshot, { ...options.reportOptions, now })
  } catch (error) {
    return blocked(exportedAt, `导出失败：${toErrorMessage(error, '统计生成失败')}`)
  }

  const files: ExportFileItem[] = [
    { entryId: 'report', type: 'report', path: 'report.json', content: `${JSON.stringify(report, null, 2)}\n` },
    { entryId: 'summary', type: 'summary', path: 'summary.md', content: renderSummaryMarkdown(report) },
    ...snapshot.dreams.map(toDreamExportFileItem),
  ]
  const manifest = buildExportManifest(files, snapshot, report, archiveName, exportedAt)

  try {
    const archive = await createExportArchive(files, manifest)
    await writeArchive(archive, archiveName)
  } catch (error) {
    return blocked(exportedAt, `导出失败：${toErrorMessage(error, '压缩包生成失败')}`)
  }

  return {
    outcome: 'success',
    archiveName,
    exportedAt,
    success: files.map((item) => item.entryId),
    manifest,
    message: `导出完成，共 ${snapshot.dreams.length} 个梦境`,
  }
}
