export interface ExportFileItem {
  entryId: string
  type: 'report' | 'summary' | 'dream'
  path: string
  content: string
}

export interface ExportManifest {
  version: '1.0'
  exportedAt: string
  archiveName: string
  referenceDate: string
  dreamCount: number
  dailyLogCount: number
  techniquePracticeCount: number
  files: Array<{
    entryId: string
    path: string
    bytes: number
  }>
}

export interface ExportResult {
  archiveName: string
  success: string[]
}
