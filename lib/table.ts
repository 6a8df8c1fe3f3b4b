import type { CellValue, DtypeLabel, Table } from './types'

// ========== Cell helpers ==========

const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

/** Coerces a cell to a finite number, or null when it is not one. Booleans and dates never coerce. */
export function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  if (!NUMERIC_RE.test(trimmed)) return null
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : null
}

export function looksNumeric(text: string): boolean {
  return NUMERIC_RE.test(text.trim())
}

// Distinct-value key: 1 and '1' are different values, two equal timestamps are the same one.
export function valueKey(value: CellValue): string {
  if (value === null) return 'null'
  if (value instanceof Date) return `d:${value.getTime()}`
  return `${typeof value}:${String(value)}`
}

export function countUnique(values: CellValue[]): number {
  const seen = new Set<string>()
  for (const v of values) {
    if (isMissing(v)) continue
    seen.add(valueKey(v))
  }
  return seen.size
}

export function countMissing(values: CellValue[]): number {
  let missing = 0
  for (const v of values) if (isMissing(v)) missing++
  return missing
}

export function storageType(values: CellValue[]): DtypeLabel {
  const kinds = new Set<DtypeLabel>()
  for (const v of values) {
    if (isMissing(v)) continue
    if (typeof v === 'number') kinds.add(Number.isInteger(v) ? 'integer' : 'float')
    else if (typeof v === 'boolean') kinds.add('boolean')
    else if (v instanceof Date) kinds.add('datetime')
    else kinds.add('string')
  }
  if (kinds.size === 0) return 'empty'
  if (kinds.size === 2 && kinds.has('integer') && kinds.has('float')) return 'float'
  if (kinds.size > 1) return 'mixed'
  const [only] = kinds
  return only
}

// ========== Formatting ==========

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  const rounded = Math.round(value * factor) / factor
  // avoid -0 leaking into JSON
  return rounded === 0 ? 0 : rounded
}

export const round1 = (value: number): number => roundTo(value, 1)

export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function stringifyCell(value: CellValue): string {
  if (isMissing(value)) return ''
  if (value instanceof Date) {
    if (!isValidDate(value)) return ''
    const iso = value.toISOString()
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso
  }
  return String(value)
}

export function percentPresent(missing: number, total: number): number {
  if (total === 0) return 100
  return round1(100 * (1 - missing / total))
}

// ========== Table shape ==========

export function rowCount(table: Table): number {
  return table.columns.reduce((max, col) => Math.max(max, col.values.length), 0)
}

/** Builds a column-major table from header names and row arrays; short rows are padded with null. */
export function tableFromRows(names: string[], rows: CellValue[][]): Table {
  return {
    columns: names.map((name, c) => ({
      name,
      values: rows.map(row => (c < row.length ? row[c] : null)),
    })),
  }
}
