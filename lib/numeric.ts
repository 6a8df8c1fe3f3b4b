import type { BoxplotSummary, CellValue, ChartBlock, NumericStats, OutlierReport } from './types'
import { round1, roundTo, toNumber } from './table'

export const MIN_HISTOGRAM_VALUES = 2
export const MIN_OUTLIER_VALUES = 4
export const MIN_HISTOGRAM_BINS = 5
export const MAX_HISTOGRAM_BINS = 50
export const MAX_OUTLIER_ITEMS = 5
export const MAX_BOXPLOT_OUTLIERS = 50
export const IQR_FENCE = 1.5

/** A coerced value and its 1-based row in the source column. */
export interface NumericPoint {
  row: number
  value: number
}

export function numericPoints(values: CellValue[]): NumericPoint[] {
  const points: NumericPoint[] = []
  values.forEach((v, i) => {
    const n = toNumber(v)
    if (n !== null) points.push({ row: i + 1, value: n })
  })
  return points
}

// ========== Order statistics ==========

function sortAsc(values: number[]): number[] {
  return [...values].sort((a, b) => a - b)
}

// Linear interpolation between closest ranks.
export function quantile(sorted: number[], q: number): number {
  if (sorted.length === 0) return NaN
  const pos = (sorted.length - 1) * q
  const base = Math.floor(pos)
  const rest = pos - base
  if (base + 1 < sorted.length) return sorted[base] + rest * (sorted[base + 1] - sorted[base])
  return sorted[base]
}

export interface Fences {
  q1: number
  median: number
  q3: number
  iqr: number
  lower: number
  upper: number
}

export function fences(sorted: number[]): Fences {
  const q1 = quantile(sorted, 0.25)
  const q3 = quantile(sorted, 0.75)
  const iqr = q3 - q1
  return {
    q1,
    median: quantile(sorted, 0.5),
    q3,
    iqr,
    lower: q1 - IQR_FENCE * iqr,
    upper: q3 + IQR_FENCE * iqr,
  }
}

// ========== Descriptive stats ==========

export function describe(values: number[]): NumericStats | null {
  const n = values.length
  if (n === 0) return null
  const sorted = sortAsc(values)
  const mean = values.reduce((acc, v) => acc + v, 0) / n
  const variance = n > 1
    ? values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (n - 1)
    : 0

  return {
    count: n,
    min: round1(sorted[0]),
    max: round1(sorted[n - 1]),
    mean: round1(mean),
    median: round1(quantile(sorted, 0.5)),
    std: round1(Math.sqrt(variance)),
  }
}

// ========== Histogram ==========

/**
 * Freedman–Diaconis bin count: width 2·IQR·n^(-1/3), at least 5 bins. Without spread in
 * the middle half, falls back to floor(sqrt(n)). Never more than 50 bins.
 */
export function binCount(sorted: number[]): number {
  const n = sorted.length
  const { iqr } = fences(sorted)
  let bins: number
  if (iqr > 0) {
    const width = 2 * iqr * n ** (-1 / 3)
    const range = sorted[n - 1] - sorted[0]
    bins = Math.max(Math.ceil(range / width), MIN_HISTOGRAM_BINS)
  } else {
    bins = Math.max(Math.floor(Math.sqrt(n)), 1)
  }
  return Math.min(bins, MAX_HISTOGRAM_BINS)
}

export function histogram(values: number[], title = 'Distribution'): ChartBlock | null {
  if (values.length < MIN_HISTOGRAM_VALUES) return null
  const sorted = sortAsc(values)
  const bins = binCount(sorted)

  let lo = sorted[0]
  let hi = sorted[sorted.length - 1]
  if (lo === hi) {
    lo -= 0.5
    hi += 0.5
  }
  const width = (hi - lo) / bins

  const counts = new Array<number>(bins).fill(0)
  for (const v of values) {
    // the maximum belongs to the last (closed) bin
    const idx = Math.min(bins - 1, Math.floor((v - lo) / width))
    counts[Math.max(0, idx)]++
  }

  const labels = counts.map((_, i) => {
    const from = lo + i * width
    const to = i === bins - 1 ? hi : lo + (i + 1) * width
    return `${round1(from)} – ${round1(to)}`
  })

  return { kind: 'histogram', title, labels, values: counts }
}

// ========== Outliers & boxplot ==========

export function detectOutliers(points: NumericPoint[]): OutlierReport | null {
  if (points.length < MIN_OUTLIER_VALUES) return null
  const { q1, q3, lower, upper } = fences(sortAsc(points.map(p => p.value)))

  const flagged = points.filter(p => p.value < lower || p.value > upper)
  return {
    total: flagged.length,
    items: flagged.slice(0, MAX_OUTLIER_ITEMS).map(p => ({ row: p.row, value: roundTo(p.value, 4) })),
    lower: roundTo(lower, 4),
    upper: roundTo(upper, 4),
    q1: roundTo(q1, 4),
    q3: roundTo(q3, 4),
  }
}

export function boxplot(points: NumericPoint[]): BoxplotSummary | null {
  if (points.length < MIN_OUTLIER_VALUES) return null
  const sorted = sortAsc(points.map(p => p.value))
  const { q1, median, q3, lower, upper } = fences(sorted)

  const inside = sorted.filter(v => v >= lower && v <= upper)
  const whiskerLow = inside.length > 0 ? inside[0] : sorted[0]
  const whiskerHigh = inside.length > 0 ? inside[inside.length - 1] : sorted[sorted.length - 1]

  const outliers = points
    .filter(p => p.value < lower || p.value > upper)
    .slice(0, MAX_BOXPLOT_OUTLIERS)
    .map(p => round1(p.value))

  return {
    q1: round1(q1),
    median: round1(median),
    q3: round1(q3),
    whiskerLow: round1(whiskerLow),
    whiskerHigh: round1(whiskerHigh),
    outliers,
  }
}

// ========== Column summary ==========

export interface NumericSummary {
  stats: NumericStats | null
  histogram: ChartBlock | null
  outliers: OutlierReport | null
  boxplot: BoxplotSummary | null
}

export function summarizeNumeric(values: CellValue[], columnName = ''): NumericSummary {
  const points = numericPoints(values)
  const nums = points.map(p => p.value)
  return {
    stats: describe(nums),
    histogram: histogram(nums, columnName ? `Distribution of ${columnName}` : 'Distribution'),
    outliers: detectOutliers(points),
    boxplot: boxplot(points),
  }
}
