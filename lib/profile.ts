import type {
  ColumnCategory,
  ColumnProfile,
  ColumnProfileBase,
  ProfileResult,
  Table,
  TableColumn,
  TablePreview,
} from './types'
import { classifyColumn } from './classify'
import { summarizeNumeric } from './numeric'
import { summarizeCategorical } from './categorical'
import { summarizeDates } from './dates'
import { correlationMatrix } from './correlation'
import { NoticeCollector, type DiagnosticSink } from './diagnostics'
import {
  countMissing,
  countUnique,
  percentPresent,
  rowCount,
  storageType,
  stringifyCell,
} from './table'

export const DEFAULT_PREVIEW_ROWS = 5

export interface ProfileOptions {
  previewRows?: number
  diagnostics?: DiagnosticSink
}

// ========== Table-level metrics ==========

function buildPreview(table: Table, rows: number, limit: number): TablePreview {
  const take = Math.min(rows, Math.max(0, limit))
  const preview: string[][] = []
  for (let r = 0; r < take; r++) {
    preview.push(table.columns.map(col => stringifyCell(col.values[r] ?? null)))
  }
  return { columns: table.columns.map(c => c.name), rows: preview }
}

function overallQuality(table: Table, rows: number): number {
  const totalCells = rows * table.columns.length
  const missingCells = table.columns.reduce(
    (acc, col) => acc + countMissing(col.values) + Math.max(0, rows - col.values.length),
    0,
  )
  return percentPresent(missingCells, totalCells)
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name
  return String(err)
}

// ========== Per-column profiling ==========

function columnBase(column: TableColumn, totalRows: number): ColumnProfileBase {
  const missingCount = countMissing(column.values) + Math.max(0, totalRows - column.values.length)
  return {
    name: column.name,
    dtypeLabel: storageType(column.values),
    missingCount,
    uniqueCount: countUnique(column.values),
    qualityPercent: percentPresent(missingCount, totalRows),
  }
}

/** Classifies one column and routes it to the matching summarizer. May throw; the caller isolates it. */
export function profileColumn(column: TableColumn, totalRows: number, sink: DiagnosticSink): ColumnProfile {
  const { name, values } = column
  const base = columnBase(column, totalRows)

  const classification = classifyColumn(values, name, totalRows)

  switch (classification.category) {
    case 'Skipped':
      sink.notice(name, `skipped: ${classification.reason}`)
      return { ...base, category: 'Skipped', skipRule: classification.rule, skipReason: classification.reason }

    case 'Numerical': {
      const summary = summarizeNumeric(values, name)
      if (summary.outliers && summary.outliers.total > 0) {
        const { total, lower, upper } = summary.outliers
        sink.notice(name, `has ${total} outlier${total === 1 ? '' : 's'} outside [${lower}, ${upper}]`)
      }
      return {
        ...base,
        category: 'Numerical',
        stats: summary.stats,
        chartPrimary: summary.histogram,
        chartSecondary: null,
        outliers: summary.outliers,
        boxplot: summary.boxplot,
      }
    }

    case 'Date': {
      const summary = summarizeDates(values, name)
      if (summary.stats.unparsed > 0) {
        sink.notice(name, `has ${summary.stats.unparsed} value(s) that could not be read as dates`)
      }
      return { ...base, category: 'Date', stats: summary.stats, chartPrimary: summary.timeline, chartSecondary: null }
    }

    case 'String': {
      const summary = summarizeCategorical(values, name)
      return {
        ...base,
        category: 'String',
        chartPrimary: summary.bar,
        chartSecondary: summary.share,
        topValues: summary.topValues,
      }
    }
  }
}

// The failure may have come from the counting helpers themselves; then the counts are zeroed.
function failedColumn(column: TableColumn, totalRows: number, err: unknown): ColumnProfile {
  let base: ColumnProfileBase
  try {
    base = columnBase(column, totalRows)
  } catch {
    base = { name: column.name, dtypeLabel: 'unknown', missingCount: 0, uniqueCount: 0, qualityPercent: 0 }
  }
  return { ...base, category: 'Error', errorMessage: errorMessage(err) }
}

// ========== Orchestrator ==========

/**
 * Profiles a whole table in one synchronous pass. Each column is analysed on its own: a column
 * whose analysis throws is reported with category `Error` and the rest of the table still runs.
 * The result shares no references with the input table.
 */
export function profile(table: Table, options: ProfileOptions = {}): ProfileResult {
  const collector = new NoticeCollector(options.diagnostics)
  const rows = rowCount(table)

  const columns = table.columns.map(column => {
    try {
      return profileColumn(column, rows, collector)
    } catch (err) {
      collector.notice(column.name, `could not be analysed: ${errorMessage(err)}`)
      return failedColumn(column, rows, err)
    }
  })

  const numericColumns = table.columns.filter((_, i) => columns[i].category === 'Numerical')
  const correlation = correlationMatrix(numericColumns)

  const categoryCounts: Record<ColumnCategory, number> = { Numerical: 0, String: 0, Date: 0, Skipped: 0, Error: 0 }
  for (const col of columns) categoryCounts[col.category]++

  return {
    rowCount: rows,
    columnCount: table.columns.length,
    qualityPercent: overallQuality(table, rows),
    columnNames: table.columns.map(c => c.name),
    preview: buildPreview(table, rows, options.previewRows ?? DEFAULT_PREVIEW_ROWS),
    columns,
    correlation,
    categoryCounts,
    notices: collector.notices,
  }
}
