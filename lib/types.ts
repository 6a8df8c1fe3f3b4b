// ========== Table ==========

/** A single cell. `null` is the only missing sentinel. */
export type CellValue = number | string | boolean | Date | null

export interface TableColumn {
  name: string
  values: CellValue[]
}

// Column-major; row i is the same record in every column. A short column counts as missing at the tail.
export interface Table {
  columns: TableColumn[]
}

export type DtypeLabel = 'integer' | 'float' | 'string' | 'boolean' | 'datetime' | 'mixed' | 'empty' | 'unknown'

// ========== Classification ==========

export type ColumnCategory = 'Numerical' | 'String' | 'Date' | 'Skipped' | 'Error'

export type ClassificationRule =
  | 'all-missing'
  | 'native-date'
  | 'parsed-date'
  | 'hinted-date'
  | 'numeric'
  | 'sequential-identifier'
  | 'high-cardinality-text'
  | 'categorical'

export type SkipRule = Extract<ClassificationRule, 'sequential-identifier' | 'high-cardinality-text'>

export type Classification =
  | { category: 'Numerical' | 'String' | 'Date'; rule: ClassificationRule }
  | { category: 'Skipped'; rule: SkipRule; reason: string }

// ========== Charts ==========

export type ChartKind = 'histogram' | 'bar' | 'pie' | 'timeline'

export interface ChartBlock {
  kind: ChartKind
  title: string
  labels: string[]
  values: number[]
}

// ========== Summaries ==========

export interface NumericStats {
  count: number
  min: number
  max: number
  mean: number
  median: number
  std: number
}

export interface OutlierItem {
  row: number   // 1-based position in the source table
  value: number
}

export interface OutlierReport {
  total: number
  items: OutlierItem[]
  lower: number
  upper: number
  q1: number
  q3: number
}

export interface BoxplotSummary {
  q1: number
  median: number
  q3: number
  whiskerLow: number
  whiskerHigh: number
  outliers: number[]
}

export interface DateStats {
  min?: string
  max?: string
  parsed: number
  unparsed: number
}

export interface FrequencyEntry {
  value: string
  count: number
}

// ========== Column profiles ==========

export interface ColumnProfileBase {
  name: string
  dtypeLabel: DtypeLabel
  missingCount: number
  uniqueCount: number
  qualityPercent: number
}

export interface NumericalColumnProfile extends ColumnProfileBase {
  category: 'Numerical'
  stats: NumericStats | null
  chartPrimary: ChartBlock | null
  chartSecondary: null
  outliers: OutlierReport | null
  boxplot: BoxplotSummary | null
}

export interface StringColumnProfile extends ColumnProfileBase {
  category: 'String'
  chartPrimary: ChartBlock | null
  chartSecondary: ChartBlock | null
  topValues: FrequencyEntry[]
}

export interface DateColumnProfile extends ColumnProfileBase {
  category: 'Date'
  stats: DateStats
  chartPrimary: ChartBlock | null
  chartSecondary: null
}

export interface SkippedColumnProfile extends ColumnProfileBase {
  category: 'Skipped'
  skipRule: SkipRule
  skipReason: string
}

export interface ErrorColumnProfile extends ColumnProfileBase {
  category: 'Error'
  errorMessage: string
}

export type ColumnProfile =
  | NumericalColumnProfile
  | StringColumnProfile
  | DateColumnProfile
  | SkippedColumnProfile
  | ErrorColumnProfile

// ========== Profile result ==========

export interface CorrelationBlock {
  columns: string[]
  matrix: Array<Array<number | null>>
}

export interface TablePreview {
  columns: string[]
  rows: string[][]
}

export interface ProfileResult {
  rowCount: number
  columnCount: number
  qualityPercent: number
  columnNames: string[]
  preview: TablePreview
  columns: ColumnProfile[]
  correlation: CorrelationBlock
  categoryCounts: Record<ColumnCategory, number>
  notices: string[]
}

// ========== Ingestion ==========

export type IngestResult =
  | { valid: true; table: Table; sheetName?: string }
  | { valid: false; message: string }

// ========== Persistence / API ==========

export interface AnalysisRecord {
  id: string
  fileName: string
  fileSize: number
  valid: boolean
  message: string
  result?: ProfileResult
  createdAt: string
}

export type AnalysisSummary = Omit<AnalysisRecord, 'result'> & {
  rowCount: number | null
  columnCount: number | null
}

// API response envelope
export interface ApiResponse<T = unknown> {
  data?: T
  error?: string
}
