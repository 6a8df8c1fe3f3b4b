import { describe, it, expect } from 'vitest'
import {
  quantile,
  fences,
  describe as describeValues,
  binCount,
  histogram,
  detectOutliers,
  boxplot,
  numericPoints,
  summarizeNumeric,
  MAX_HISTOGRAM_BINS,
  MIN_HISTOGRAM_BINS,
} from '@/lib/numeric'

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i)
}

// rows 1..8: two clear outliers at rows 6 and 8
const READINGS = [10, 12, 11, 13, 12, 100, 11, -50]

describe('quantile', () => {
  it('should interpolate between closest ranks', () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75)
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5)
    expect(quantile([1, 2, 3, 4], 1)).toBe(4)
  })

  it('should return NaN for an empty input', () => {
    expect(quantile([], 0.5)).toBeNaN()
  })
})

describe('fences', () => {
  it('should place the Tukey fences 1.5 IQR outside the quartiles', () => {
    const sorted = [...READINGS].sort((a, b) => a - b)
    expect(fences(sorted)).toEqual({ q1: 10.75, median: 11.5, q3: 12.25, iqr: 1.5, lower: 8.5, upper: 14.5 })
  })
})

describe('describe', () => {
  it('should compute count, range, centre and sample deviation', () => {
    expect(describeValues([3, 1, 2])).toEqual({ count: 3, min: 1, max: 3, mean: 2, median: 2, std: 1 })
  })

  it('should report zero deviation for a single value', () => {
    expect(describeValues([5])).toEqual({ count: 1, min: 5, max: 5, mean: 5, median: 5, std: 0 })
  })

  it('should round to one decimal', () => {
    expect(describeValues([1, 2])).toEqual({ count: 2, min: 1, max: 2, mean: 1.5, median: 1.5, std: 0.7 })
  })

  it('should return null without values', () => {
    expect(describeValues([])).toBeNull()
  })
})

describe('binCount', () => {
  it('should use the Freedman–Diaconis width with a floor of five bins', () => {
    expect(binCount(range(1, 100))).toBe(MIN_HISTOGRAM_BINS)
  })

  it('should cap extreme spreads at fifty bins', () => {
    expect(binCount([...range(1, 99), 1e9])).toBe(MAX_HISTOGRAM_BINS)
  })

  it('should fall back to the square root rule when the middle half is flat', () => {
    expect(binCount([5, 5, 5, 5, 5, 5, 5, 5, 5, 100])).toBe(3)
  })
})

describe('histogram', () => {
  it('should count every value exactly once with the maximum in the last bin', () => {
    const chart = histogram([5, 5, 5, 5, 5, 5, 5, 5, 5, 100], 'Distribution of load')
    expect(chart).toEqual({
      kind: 'histogram',
      title: 'Distribution of load',
      labels: ['5 – 36.7', '36.7 – 68.3', '68.3 – 100'],
      values: [9, 0, 1],
    })
  })

  it('should widen a constant column by half a unit on each side', () => {
    const chart = histogram([7, 7, 7, 7])
    expect(chart?.labels).toEqual(['6.5 – 7', '7 – 7.5'])
    expect(chart?.values).toEqual([0, 4])
  })

  it('should keep the bin count within bounds and the counts summing to n', () => {
    const values = range(1, 1000).map(n => (n * 37) % 1013)
    const chart = histogram(values)
    expect(chart).not.toBeNull()
    const bins = chart?.values ?? []
    expect(bins.length).toBeGreaterThanOrEqual(MIN_HISTOGRAM_BINS)
    expect(bins.length).toBeLessThanOrEqual(MAX_HISTOGRAM_BINS)
    expect(bins.reduce((a, b) => a + b, 0)).toBe(1000)
  })

  it('should need at least two values', () => {
    expect(histogram([42])).toBeNull()
  })
})

describe('detectOutliers', () => {
  it('should report rows outside the fences in row order', () => {
    expect(detectOutliers(numericPoints(READINGS))).toEqual({
      total: 2,
      items: [{ row: 6, value: 100 }, { row: 8, value: -50 }],
      lower: 8.5,
      upper: 14.5,
      q1: 10.75,
      q3: 12.25,
    })
  })

  it('should keep the true total while listing at most five items', () => {
    const values = [...range(1, 40), 1000, 1001, 1002, 1003, 1004, 1005]
    const report = detectOutliers(numericPoints(values))
    expect(report?.total).toBe(6)
    expect(report?.items.map(i => i.row)).toEqual([41, 42, 43, 44, 45])
    expect(report?.upper).toBe(68.5)
  })

  it('should count rows from one and skip non-numeric cells', () => {
    const report = detectOutliers(numericPoints([null, 10, 'x', 11, 12, 11, 500]))
    expect(report?.items).toEqual([{ row: 7, value: 500 }])
  })

  it('should need at least four values', () => {
    expect(detectOutliers(numericPoints([1, 2, 300]))).toBeNull()
  })

  it('should keep fences ordered around the quartiles', () => {
    const report = detectOutliers(numericPoints(range(1, 57).map(n => (n * n) % 97)))
    expect(report).not.toBeNull()
    if (!report) return
    expect(report.lower).toBeLessThanOrEqual(report.q1)
    expect(report.q1).toBeLessThanOrEqual(report.q3)
    expect(report.q3).toBeLessThanOrEqual(report.upper)
  })
})

describe('boxplot', () => {
  it('should put the whiskers on the most extreme values inside the fences', () => {
    expect(boxplot(numericPoints(READINGS))).toEqual({
      q1: 10.8,
      median: 11.5,
      q3: 12.3,
      whiskerLow: 10,
      whiskerHigh: 13,
      outliers: [100, -50],
    })
  })

  it('should need at least four values', () => {
    expect(boxplot(numericPoints([1, 2, 3]))).toBeNull()
  })
})

describe('summarizeNumeric', () => {
  it('should describe a three-row column without outliers or a boxplot', () => {
    const summary = summarizeNumeric([1, 2, 3], 'score')
    expect(summary.stats).toEqual({ count: 3, min: 1, max: 3, mean: 2, median: 2, std: 1 })
    expect(summary.histogram?.title).toBe('Distribution of score')
    expect(summary.outliers).toBeNull()
    expect(summary.boxplot).toBeNull()
  })

  it('should coerce numeric text and ignore the rest', () => {
    const summary = summarizeNumeric(['4', 6, null, 'n/a'])
    expect(summary.stats).toEqual({ count: 2, min: 4, max: 6, mean: 5, median: 5, std: 1.4 })
    expect(summary.histogram?.title).toBe('Distribution')
  })

  it('should leave everything empty for a column without numbers', () => {
    expect(summarizeNumeric([null, 'x'])).toEqual({ stats: null, histogram: null, outliers: null, boxplot: null })
  })
})
