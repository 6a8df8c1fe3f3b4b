import { describe, it, expect } from 'vitest'
import {
  classify,
  classifyColumn,
  ColumnContext,
  allMissingRule,
  dateRule,
  numericRule,
  highCardinalityRule,
  fallbackRule,
  hasIdNameHint,
  hasDateNameHint,
  isArithmeticProgression,
  dateParseRatio,
} from '@/lib/classify'
import type { CellValue } from '@/lib/types'

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i)
}

function seeded(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296
    return state / 4294967296
  }
}

function ctx(values: CellValue[], name = 'col', totalRows = values.length): ColumnContext {
  return new ColumnContext(values, name, totalRows)
}

describe('allMissingRule', () => {
  it('should classify a column with no values as String', () => {
    expect(allMissingRule(ctx([null, null, null]))).toEqual({ category: 'String', rule: 'all-missing' })
    expect(classify([null, null], 'anything', 2)).toBe('String')
  })

  it('should pass when at least one value is present', () => {
    expect(allMissingRule(ctx([null, 'x']))).toBeNull()
  })
})

describe('dateRule', () => {
  it('should accept native date values', () => {
    const values = [new Date(Date.UTC(2024, 0, 1)), null, new Date(Date.UTC(2024, 5, 1))]
    expect(dateRule(ctx(values))).toEqual({ category: 'Date', rule: 'native-date' })
  })

  it('should accept text when at least 80% of the sample parses', () => {
    const values = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04', 'unknown']
    expect(dateRule(ctx(values, 'col'))).toEqual({ category: 'Date', rule: 'parsed-date' })
  })

  it('should need a date-like name when only half of the sample parses', () => {
    const values = ['2024-01-01', '2024-01-02', '2024-01-03', 'n/a yet', 'soon']
    expect(dateParseRatio(values)).toBe(0.6)
    expect(dateRule(ctx(values, 'due_on'))).toEqual({ category: 'Date', rule: 'hinted-date' })
    expect(dateRule(ctx(values, 'notes'))).toBeNull()
  })

  it('should only sample the first 50 values', () => {
    const values = [...Array<string>(50).fill('2024-03-01'), ...Array<string>(200).fill('not a date')]
    expect(dateParseRatio(values)).toBe(1)
    expect(dateRule(ctx(values))).toEqual({ category: 'Date', rule: 'parsed-date' })
  })

  it('should never treat numbers as dates', () => {
    expect(dateRule(ctx([2020, 2021, 2022, 2023], 'start_year'))).toBeNull()
  })
})

describe('numericRule', () => {
  it('should tolerate up to 20% unparseable entries', () => {
    const values: CellValue[] = [1.5, 2, 3, 4, 5, 6, 7, 8, '9', 'unknown']
    expect(numericRule(ctx(values))).toEqual({ category: 'Numerical', rule: 'numeric' })
  })

  it('should decline a column below the 80% numeric ratio', () => {
    const values: CellValue[] = [1, 2, 3, 4, 5, 6, 7, 'a', 'b', 'c']
    expect(numericRule(ctx(values))).toBeNull()
    expect(classify(values, 'mixed', values.length)).toBe('String')
  })

  it('should skip a name-hinted unique integer key', () => {
    const result = numericRule(ctx(range(1, 1000), 'Employee_ID'))
    expect(result).toEqual({
      category: 'Skipped',
      rule: 'sequential-identifier',
      reason: 'looks like a sequential identifier (1000 unique integer values)',
    })
  })

  it('should skip an unnamed arithmetic progression', () => {
    const values = range(1, 300).map(n => 1000 + n * 5)
    expect(classify(values, 'ticket', values.length)).toBe('Skipped')
  })

  it('should keep unique integers that are neither hinted nor evenly spaced', () => {
    const squares = range(1, 200).map(n => n * n)
    expect(classify(squares, 'area', squares.length)).toBe('Numerical')
  })

  it('should keep a hinted key with 100 or fewer unique values', () => {
    expect(classify(range(1, 100), 'id', 100)).toBe('Numerical')
  })

  it('should keep unique floats even when the name looks like a key', () => {
    const rand = seeded(7)
    const values = range(1, 500).map(() => Math.round((30000 + rand() * 60000) * 100) / 100)
    expect(classify(values, 'salary_id', values.length)).toBe('Numerical')
  })

  it('should measure uniqueness against the full row count', () => {
    // 150 unique ids in a 200-row table: 75% unique, not an identifier
    const values: CellValue[] = [...range(1, 150), ...Array<null>(50).fill(null)]
    expect(classify(values, 'customer_id', 200)).toBe('Numerical')
  })
})

describe('highCardinalityRule', () => {
  it('should skip free text with mostly distinct values', () => {
    const names = range(1, 60).map(n => `Person ${n}`)
    expect(highCardinalityRule(ctx(names))).toEqual({
      category: 'Skipped',
      rule: 'high-cardinality-text',
      reason: 'high cardinality (60 unique values, 100% of rows)',
    })
  })

  it('should keep distinct text when there are 50 values or fewer', () => {
    const names = range(1, 50).map(n => `Person ${n}`)
    expect(highCardinalityRule(ctx(names))).toBeNull()
    expect(classify(names, 'name', names.length)).toBe('String')
  })

  it('should keep text with repeats below the 85% ratio', () => {
    const values = range(1, 100).map(n => `City ${n % 80}`)
    expect(highCardinalityRule(ctx(values))).toBeNull()
  })
})

describe('fallbackRule', () => {
  it('should always classify as String', () => {
    expect(fallbackRule(ctx(['a']))).toEqual({ category: 'String', rule: 'categorical' })
  })
})

describe('hasIdNameHint', () => {
  it('should match exact id and key-like fragments case-insensitively', () => {
    expect(hasIdNameHint('id')).toBe(true)
    expect(hasIdNameHint('ID')).toBe(true)
    expect(hasIdNameHint('Employee_ID')).toBe(true)
    expect(hasIdNameHint('order_no')).toBe(true)
    expect(hasIdNameHint('PostalCode')).toBe(true)
  })

  it('should not match names that merely contain the letters id', () => {
    expect(hasIdNameHint('userid')).toBe(false)
    expect(hasIdNameHint('width')).toBe(false)
    expect(hasIdNameHint('valid')).toBe(false)
  })
})

describe('hasDateNameHint', () => {
  it('should match hint tokens as substrings', () => {
    expect(hasDateNameHint('CreatedDate')).toBe(true)
    expect(hasDateNameHint('dob')).toBe(true)
    expect(hasDateNameHint('weekend_flag')).toBe(true)
    expect(hasDateNameHint('amount')).toBe(false)
  })
})

describe('isArithmeticProgression', () => {
  it('should accept a progression with a few gaps', () => {
    const gaps = new Set([10, 200, 350, 700, 900])
    const values = range(1, 1000).filter(n => !gaps.has(n))
    expect(isArithmeticProgression(values)).toBe(true)
  })

  it('should ignore input order', () => {
    expect(isArithmeticProgression([5, 1, 4, 2, 3])).toBe(true)
  })

  it('should reject a bimodal spacing where neither step reaches 90%', () => {
    // steps alternate 1, 2, 1, 2, ...
    const values = range(0, 199).map(i => Math.floor(i / 2) * 3 + (i % 2))
    expect(isArithmeticProgression(values)).toBe(false)
  })

  it('should reject a mostly-duplicate column whose modal step is zero', () => {
    expect(isArithmeticProgression([1, 1, 1, 1, 2])).toBe(false)
  })

  it('should reject fewer than two values', () => {
    expect(isArithmeticProgression([4])).toBe(false)
  })
})

describe('classifyColumn', () => {
  it('should classify continuous salaries as Numerical regardless of name', () => {
    const rand = seeded(11)
    const salaries = range(1, 1000).map(() => Math.round((30000 + rand() * 60000) * 100) / 100)
    for (const name of ['Salary', 'id', 'salary_key']) {
      expect(classifyColumn(salaries, name, salaries.length).category).toBe('Numerical')
    }
  })

  it('should classify salaries with many repeats as Numerical', () => {
    const salaries = range(1, 1000).map(n => 40000 + (n % 40) * 1000)
    expect(classify(salaries, 'Salary', salaries.length)).toBe('Numerical')
  })

  it('should classify a mostly-parseable CreatedDate column as Date', () => {
    const values: CellValue[] = range(1, 45).map(n => `2024-02-${String((n % 28) + 1).padStart(2, '0')}`)
    values.push('unknown', 'tbd', '??', 'n/a', 'later')
    expect(classifyColumn(values, 'CreatedDate', values.length)).toEqual({ category: 'Date', rule: 'parsed-date' })
  })

  it('should be deterministic', () => {
    const values: CellValue[] = ['a', 'b', 'a', null, 'c']
    expect(classifyColumn(values, 'x', 5)).toEqual(classifyColumn(values, 'x', 5))
  })
})
