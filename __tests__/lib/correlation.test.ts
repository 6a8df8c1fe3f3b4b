import { describe, it, expect } from 'vitest'
import { pearson, correlationMatrix } from '@/lib/correlation'

describe('pearson', () => {
  it('should return 1 and -1 for perfectly linear data', () => {
    expect(pearson([1, 2, 3, 4], [2, 4, 6, 8])).toBe(1)
    expect(pearson([1, 2, 3, 4], [8, 6, 4, 2])).toBe(-1)
  })

  it('should be NaN when a side has no variance or there are too few points', () => {
    expect(pearson([1, 2, 3], [5, 5, 5])).toBeNaN()
    expect(pearson([1], [2])).toBeNaN()
  })
})

describe('correlationMatrix', () => {
  it('should return an empty block for fewer than two columns', () => {
    expect(correlationMatrix([])).toEqual({ columns: [], matrix: [] })
    expect(correlationMatrix([{ name: 'a', values: [1, 2, 3] }])).toEqual({ columns: [], matrix: [] })
  })

  it('should build a symmetric matrix with a unit diagonal', () => {
    const block = correlationMatrix([
      { name: 'a', values: [1, 2, 3, 4] },
      { name: 'b', values: [2, 4, 6, 8] },
      { name: 'c', values: [4, 3, 2, 1] },
    ])
    expect(block).toEqual({
      columns: ['a', 'b', 'c'],
      matrix: [
        [1, 1, -1],
        [1, 1, -1],
        [-1, -1, 1],
      ],
    })
  })

  it('should only use rows where both columns hold a number', () => {
    const block = correlationMatrix([
      { name: 'x', values: [1, 2, 3, 4, null, 'n/a'] },
      { name: 'y', values: [2, 4, 6, 8, 100, -3] },
    ])
    expect(block.matrix[0][1]).toBe(1)
  })

  it('should leave degenerate pairs empty', () => {
    const block = correlationMatrix([
      { name: 'flat', values: [3, 3, 3] },
      { name: 'rising', values: [1, 2, 3] },
    ])
    expect(block.matrix).toEqual([
      [1, null],
      [null, 1],
    ])
  })

  it('should round coefficients to two decimals', () => {
    const block = correlationMatrix([
      { name: 'x', values: [1, 2, 3, 4, 5] },
      { name: 'y', values: [2, 1, 4, 3, 5] },
    ])
    // r = 8 / 10
    expect(block.matrix[0][1]).toBe(0.8)
  })
})
