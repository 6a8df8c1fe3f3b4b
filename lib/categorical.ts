import type { CellValue, ChartBlock, FrequencyEntry } from './types'
import { isMissing, stringifyCell } from './table'

export const MAX_BAR_CATEGORIES = 30
export const MAX_PIE_SLICES = 5
export const TOP_VALUES = 10

/** Counts each distinct stringified value; most frequent first, ties in order of first appearance. */
export function rankFrequencies(values: CellValue[]): FrequencyEntry[] {
  const freq = new Map<string, number>()
  for (const v of values) {
    if (isMissing(v)) continue
    const key = stringifyCell(v)
    freq.set(key, (freq.get(key) ?? 0) + 1)
  }
  // Array.prototype.sort is stable, and Map keeps insertion order
  return [...freq.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count)
}

export interface CategoricalSummary {
  bar: ChartBlock | null
  share: ChartBlock | null
  topValues: FrequencyEntry[]
}

export function summarizeCategorical(values: CellValue[], columnName = ''): CategoricalSummary {
  const ranked = rankFrequencies(values)
  if (ranked.length === 0) return { bar: null, share: null, topValues: [] }

  const top = ranked.slice(0, MAX_BAR_CATEGORIES)
  const bar: ChartBlock = {
    kind: 'bar',
    title: columnName ? `Value counts of ${columnName}` : 'Value counts',
    labels: top.map(e => e.value),
    values: top.map(e => e.count),
  }

  const slices = ranked.slice(0, MAX_PIE_SLICES)
  const rest = ranked.slice(MAX_PIE_SLICES).reduce((acc, e) => acc + e.count, 0)
  const share: ChartBlock = {
    kind: 'pie',
    title: columnName ? `Share of ${columnName}` : 'Share',
    labels: [...slices.map(e => e.value), ...(rest > 0 ? ['Other'] : [])],
    values: [...slices.map(e => e.count), ...(rest > 0 ? [rest] : [])],
  }

  return { bar, share, topValues: ranked.slice(0, TOP_VALUES) }
}
