import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import { AnalysisStore } from '@/lib/store'
import { loadConfig } from '@/lib/config'
import { analyzeUpload, validateUpload, ACCEPTED_MESSAGE, UploadRejectedError } from '@/lib/upload'
import { FORMAT_ERROR_MESSAGE } from '@/lib/ingest'
import { NoticeCollector } from '@/lib/diagnostics'

/**
 * End-to-end upload: validation → ingestion → profiling → persistence → history.
 */

const FIXTURES = path.join(__dirname, '..', 'fixtures')
const MB = 1024 * 1024

function upload(name: string, content?: string): File {
  const text = content ?? fs.readFileSync(path.join(FIXTURES, name), 'utf8')
  return new File([text], name)
}

let store: AnalysisStore

beforeEach(() => {
  store = new AnalysisStore(':memory:')
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
})

afterEach(() => {
  store.close()
})

describe('Upload flow integration', () => {
  it('should profile a CSV upload and keep it in the history', async () => {
    const diagnostics = new NoticeCollector()
    const outcome = await analyzeUpload(upload('employees.csv'), { store, config: loadConfig({}), diagnostics })

    expect(outcome.status).toBe(200)
    const record = outcome.body.data
    expect(record?.valid).toBe(true)
    expect(record?.message).toBe(ACCEPTED_MESSAGE)

    const result = record?.result
    expect(result?.rowCount).toBe(8)
    expect(result?.columnCount).toBe(6)
    expect(result?.qualityPercent).toBe(95.8)
    expect(result?.categoryCounts).toEqual({ Numerical: 3, String: 2, Date: 1, Skipped: 0, Error: 0 })
    expect(result?.correlation.columns).toEqual(['employee_id', 'salary', 'rating'])
    expect(result?.preview.rows[0]).toEqual(['1', 'Alice Moreau', 'Engineering', '85000', '2019-03-15', '4.5'])
    expect(result?.notices).toEqual(['Column "salary" has 1 outlier outside [21125, 128125]'])
    expect(diagnostics.notices).toEqual(result?.notices)

    const salary = result?.columns.find(c => c.name === 'salary')
    expect(salary?.category).toBe('Numerical')
    if (salary?.category === 'Numerical') {
      expect(salary.outliers?.items).toEqual([{ row: 8, value: 250000 }])
    }

    // history
    const history = store.list()
    expect(history).toHaveLength(1)
    expect(history[0]).toMatchObject({ fileName: 'employees.csv', valid: true, rowCount: 8, columnCount: 6 })
    expect(store.get(history[0].id)).toEqual(record)
  })

  it('should profile a TSV upload', async () => {
    const outcome = await analyzeUpload(upload('inventory.tsv'), { store, config: loadConfig({}) })
    expect(outcome.status).toBe(200)
    expect(outcome.body.data?.result?.columnNames).toEqual(['sku', 'warehouse', 'quantity', 'unit_price'])
  })

  it('should record a file that is not a table as invalid', async () => {
    const outcome = await analyzeUpload(upload('header-only.csv'), { store, config: loadConfig({}) })

    expect(outcome.status).toBe(422)
    expect(outcome.body.data).toMatchObject({ valid: false, message: FORMAT_ERROR_MESSAGE })
    expect(outcome.body.data?.result).toBeUndefined()
    expect(store.list()).toHaveLength(1)
  })

  it('should reject a missing file without storing anything', async () => {
    const outcome = await analyzeUpload(null, { store, config: loadConfig({}) })
    expect(outcome).toEqual({ status: 400, body: { error: 'No file selected' } })
    expect(store.list()).toEqual([])
  })

  it('should reject unsupported extensions', async () => {
    const outcome = await analyzeUpload(upload('data.json', '{"a":1}'), { store, config: loadConfig({}) })
    expect(outcome).toEqual({
      status: 400,
      body: { error: 'Unsupported file type. Please upload one of: CSV, TSV, XLS, XLSX, XLSM.' },
    })
  })

  it('should reject files over the size limit', async () => {
    const config = { ...loadConfig({}), maxUploadBytes: MB }
    const outcome = await analyzeUpload(upload('big.csv', 'a'.repeat(MB + 1)), { store, config })
    expect(outcome).toEqual({ status: 413, body: { error: 'File is larger than the 1 MB limit' } })
    expect(store.list()).toEqual([])
  })
})

describe('validateUpload', () => {
  it('should throw a rejection carrying the HTTP status', () => {
    const config = loadConfig({})
    expect(() => validateUpload({ name: '', size: 0 }, config)).toThrow(UploadRejectedError)
    expect(() => validateUpload({ name: 'ok.xlsx', size: 10 }, config)).not.toThrow()
  })
})
