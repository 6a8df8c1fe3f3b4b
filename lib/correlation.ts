import type { CellValue, CorrelationBlock } from './types'
import { roundTo, toNumber } from './table'

export interface NumericColumn {
  name: string
  values: CellValue[]
}

/** Pearson's r, or NaN when there are fewer than two points or either side has no variance. */
export function pearson(xs: number[], ys: number[]): number {
  const n = Math.min(xs.length, ys.length)
  if (n < 2) return NaN
  let mx = 0
  let my = 0
  for (let i = 0; i < n; i++) {
    mx += xs[i]
    my += ys[i]
  }
  mx /= n
  my /= n

  let num = 0
  let dx2 = 0
  let dy2 = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx
    const dy = ys[i] - my
    num += dx * dy
    dx2 += dx * dx
    dy2 += dy * dy
  }
  const den = Math.sqrt(dx2 * dy2)
  return den > 0 ? Math.max(-1, Math.min(1, num / den)) : NaN
}

// Pairs up rows where both columns hold a number.
function completePairs(a: Array<number | null>, b: Array<number | null>): [number[], number[]] {
  const xs: number[] = []
  const ys: number[] = []
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; i++) {
    const x = a[i]
    const y = b[i]
    if (x === null || y === null) continue
    xs.push(x)
    ys.push(y)
  }
  return [xs, ys]
}

export function correlationMatrix(columns: NumericColumn[]): CorrelationBlock {
  if (columns.length < 2) return { columns: [], matrix: [] }

  const coerced = columns.map(col => col.values.map(toNumber))
  const matrix: Array<Array<number | null>> = columns.map(() => columns.map(() => null))

  for (let i = 0; i < columns.length; i++) {
    matrix[i][i] = 1
    for (let j = i + 1; j < columns.length; j++) {
      const [xs, ys] = completePairs(coerced[i], coerced[j])
      const r = pearson(xs, ys)
      const cell = Number.isNaN(r) ? null : roundTo(r, 2)
      matrix[i][j] = cell
      matrix[j][i] = cell
    }
  }

  return { columns: columns.map(c => c.name), matrix }
}
