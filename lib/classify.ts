import type { CellValue, Classification, ColumnCategory } from './types'
import { parseDate } from './dates'
import { countUnique, isMissing, toNumber } from './table'

// ========== Thresholds ==========

export const DATE_SAMPLE_SIZE = 50
export const DATE_PARSE_RATIO = 0.8
export const HINTED_DATE_PARSE_RATIO = 0.5
export const NUMERIC_RATIO = 0.8

export const ID_UNIQUE_RATIO = 0.95
export const ID_MIN_UNIQUE = 100
export const ID_INTEGER_SAMPLE = 200
export const ID_STEP_SHARE = 0.9

export const TEXT_UNIQUE_RATIO = 0.85
export const TEXT_MIN_UNIQUE = 50

const DATE_NAME_HINTS = [
  'date', 'time', 'timestamp', 'created', 'updated', 'dt',
  'dob', 'birth', 'start', 'end', 'expiry', 'due',
]

const ID_NAME_HINTS = [
  '_id', 'id_', 'key', 'index', 'idx', 'code',
  '_no', '_num', 'serial', 'pk', 'fk', 'identifier',
]

// ========== Column context ==========

/**
 * Everything the rules look at, derived once per column. Derived values are computed
 * lazily so that a rule which never runs costs nothing.
 */
export class ColumnContext {
  readonly present: CellValue[]
  private numericCache: number[] | null = null
  private uniqueCache: number | null = null

  constructor(
    values: CellValue[],
    readonly name: string,
    readonly totalRows: number,
  ) {
    this.present = values.filter(v => !isMissing(v))
  }

  get numeric(): number[] {
    if (this.numericCache === null) {
      const nums: number[] = []
      for (const v of this.present) {
        const n = toNumber(v)
        if (n !== null) nums.push(n)
      }
      this.numericCache = nums
    }
    return this.numericCache
  }

  get uniqueCount(): number {
    if (this.uniqueCache === null) this.uniqueCache = countUnique(this.present)
    return this.uniqueCache
  }

  get uniqueRatio(): number {
    return this.totalRows > 0 ? this.uniqueCount / this.totalRows : 0
  }

  get numericRatio(): number {
    return this.present.length > 0 ? this.numeric.length / this.present.length : 0
  }
}

export type Rule = (ctx: ColumnContext) => Classification | null

// ========== Predicates ==========

export function dateParseRatio(values: CellValue[]): number {
  const sample = values.slice(0, DATE_SAMPLE_SIZE)
  if (sample.length === 0) return 0
  const parsed = sample.filter(v => parseDate(v) !== null).length
  return parsed / sample.length
}

export function hasDateNameHint(name: string): boolean {
  const lower = name.toLowerCase()
  return DATE_NAME_HINTS.some(hint => lower.includes(hint))
}

export function hasIdNameHint(name: string): boolean {
  const lower = name.toLowerCase()
  return lower === 'id' || ID_NAME_HINTS.some(hint => lower.includes(hint))
}

/**
 * True when the sorted values step by one constant positive amount for more than 90% of
 * successive differences. The step is the most frequent difference; when two differences
 * are equally frequent the smaller one is taken, and with a bimodal spread neither clears
 * the 90% share, so the column does not count as a progression.
 */
export function isArithmeticProgression(values: number[]): boolean {
  if (values.length < 2) return false
  const sorted = [...values].sort((a, b) => a - b)
  const diffCounts = new Map<number, number>()
  for (let i = 1; i < sorted.length; i++) {
    const diff = sorted[i] - sorted[i - 1]
    diffCounts.set(diff, (diffCounts.get(diff) ?? 0) + 1)
  }

  let step = 0
  let stepCount = 0
  for (const [diff, count] of diffCounts) {
    if (count > stepCount || (count === stepCount && diff < step)) {
      step = diff
      stepCount = count
    }
  }

  return step > 0 && stepCount / (sorted.length - 1) > ID_STEP_SHARE
}

export function isSequentialIdentifier(ctx: ColumnContext): boolean {
  if (!(ctx.uniqueRatio > ID_UNIQUE_RATIO && ctx.uniqueCount > ID_MIN_UNIQUE)) return false
  if (!ctx.numeric.slice(0, ID_INTEGER_SAMPLE).every(n => Number.isInteger(n))) return false
  return hasIdNameHint(ctx.name) || isArithmeticProgression(ctx.numeric)
}

// ========== Rules (in priority order) ==========

export const allMissingRule: Rule = ctx =>
  ctx.present.length === 0 ? { category: 'String', rule: 'all-missing' } : null

export const dateRule: Rule = ctx => {
  if (ctx.present.every(v => v instanceof Date)) {
    return { category: 'Date', rule: 'native-date' }
  }
  const ratio = dateParseRatio(ctx.present)
  if (ratio >= DATE_PARSE_RATIO) return { category: 'Date', rule: 'parsed-date' }
  if (hasDateNameHint(ctx.name) && ratio >= HINTED_DATE_PARSE_RATIO) {
    return { category: 'Date', rule: 'hinted-date' }
  }
  return null
}

export const numericRule: Rule = ctx => {
  if (ctx.numericRatio < NUMERIC_RATIO) return null
  if (isSequentialIdentifier(ctx)) {
    return {
      category: 'Skipped',
      rule: 'sequential-identifier',
      reason: `looks like a sequential identifier (${ctx.uniqueCount} unique integer values)`,
    }
  }
  return { category: 'Numerical', rule: 'numeric' }
}

export const highCardinalityRule: Rule = ctx => {
  if (ctx.uniqueRatio > TEXT_UNIQUE_RATIO && ctx.uniqueCount > TEXT_MIN_UNIQUE) {
    const pct = Math.round(ctx.uniqueRatio * 1000) / 10
    return {
      category: 'Skipped',
      rule: 'high-cardinality-text',
      reason: `high cardinality (${ctx.uniqueCount} unique values, ${pct}% of rows)`,
    }
  }
  return null
}

export const fallbackRule: Rule = () => ({ category: 'String', rule: 'categorical' })

export const RULES: readonly Rule[] = [
  allMissingRule,
  dateRule,
  numericRule,
  highCardinalityRule,
  fallbackRule,
]

// ========== Entry points ==========

export function classifyColumn(values: CellValue[], name: string, totalRows: number): Classification {
  const ctx = new ColumnContext(values, name, totalRows)
  for (const rule of RULES) {
    const result = rule(ctx)
    if (result) return result
  }
  return { category: 'String', rule: 'categorical' }
}

export function classify(values: CellValue[], name: string, totalRows: number): ColumnCategory {
  return classifyColumn(values, name, totalRows).category
}
