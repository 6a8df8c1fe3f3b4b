import Papa from 'papaparse'
import * as XLSX from 'xlsx'
import path from 'path'
import type { CellValue, IngestResult, Table } from './types'
import { isValidDate, tableFromRows } from './table'

export const FORMAT_ERROR_MESSAGE = 'Please upload the file in a correct format'

type SourceFormat = 'csv' | 'tsv' | 'workbook'

const FORMATS: Record<string, SourceFormat> = {
  '.csv': 'csv',
  '.tsv': 'tsv',
  '.xls': 'workbook',
  '.xlsx': 'workbook',
  '.xlsm': 'workbook',
}

export const SUPPORTED_EXTENSIONS = Object.keys(FORMATS).map(ext => ext.slice(1))

export function detectFormat(fileName: string): SourceFormat | null {
  return FORMATS[path.extname(fileName).toLowerCase()] ?? null
}

// ========== Value normalisation ==========

const MISSING_TOKENS = new Set([
  '', '-', 'na', 'n/a', 'nan', '-nan', 'null', 'none', '#n/a', '#na', '#ref!', '#value!', '#div/0!', '<na>',
])

/** Normalises a raw cell: missing markers become null, thousands separators and currency are stripped from numbers. */
export function normalizeCell(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw === 'boolean') return raw
  if (raw instanceof Date) return isValidDate(raw) ? raw : null
  if (typeof raw !== 'string') return String(raw)

  const trimmed = raw.trim()
  if (MISSING_TOKENS.has(trimmed.toLowerCase()) || trimmed === '$ -') return null

  const cleaned = trimmed
    .replace(/^[$₩€£¥]\s*/, '')
    .replace(/\s*[$₩€£¥]$/, '')
    .replace(/,(?=\d{3}(?:\D|$))/g, '')
    .replace(/%$/, '')
    .trim()

  if (cleaned !== '' && /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(cleaned)) {
    return Number(cleaned)
  }
  return trimmed
}

function headerName(raw: unknown, index: number): string {
  const name = raw === null || raw === undefined ? '' : String(raw).trim()
  return name === '' ? `Unnamed: ${index}` : name
}

// Header row plus at least one data row, with something in the header.
function toTable(rows: unknown[][]): Table | null {
  if (rows.length < 2) return null
  const [header, ...body] = rows
  if (header.length === 0 || header.every(h => h === null || h === undefined || String(h).trim() === '')) return null

  const names = header.map(headerName)
  const data = body.map(row => names.map((_, c) => normalizeCell(c < row.length ? row[c] : null)))
  return tableFromRows(names, data)
}

// ========== Delimited text ==========

export function decodeText(buffer: Buffer): string {
  let text: string
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer)
  } catch {
    // not valid UTF-8; spreadsheet exports from older tools are usually Latin-1
    text = buffer.toString('latin1')
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
}

export function parseDelimited(text: string, delimiter: ',' | '\t'): Table | null {
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    delimiter,
    skipEmptyLines: 'greedy',
  })
  const fatal = parsed.errors.find(e => e.type === 'Quotes')
  if (fatal) throw new Error(`Malformed ${delimiter === ',' ? 'CSV' : 'TSV'} at row ${fatal.row ?? '?'}: ${fatal.message}`)
  return toTable(parsed.data)
}

// ========== Workbooks ==========

/**
 * Workbooks store dates as day serials plus a number format. Converting them here keeps the
 * calendar day the sheet shows, whatever the server's timezone.
 */
function serialToDate(serial: number): Date | null {
  const code = XLSX.SSF.parse_date_code(serial)
  if (!code) return null
  return new Date(Date.UTC(code.y, code.m - 1, code.d, code.H, code.M, code.S))
}

function convertDateCells(sheet: XLSX.WorkSheet): void {
  for (const address of Object.keys(sheet)) {
    if (address.startsWith('!')) continue
    const cell: XLSX.CellObject = sheet[address]
    if (cell.t !== 'n' || typeof cell.v !== 'number' || typeof cell.z !== 'string') continue
    if (!XLSX.SSF.is_date(cell.z)) continue
    const date = serialToDate(cell.v)
    if (date) {
      cell.t = 'd'
      cell.v = date
    }
  }
}

export function parseWorkbook(buffer: Buffer): { table: Table; sheetName: string } | null {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true })
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName]
    if (!sheet) continue
    convertDateCells(sheet)
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true })
    const table = toTable(rows)
    if (table) return { table, sheetName }
  }
  return null
}

// ========== Entry point ==========

/**
 * Reads an uploaded file into a table. Never throws: any failure, an empty file or a
 * header without rows comes back as `{ valid: false }` with a user-facing message.
 */
export function readTable(buffer: Buffer, fileName: string): IngestResult {
  const format = detectFormat(fileName)
  if (!format) return { valid: false, message: FORMAT_ERROR_MESSAGE }

  try {
    if (format === 'workbook') {
      const found = parseWorkbook(buffer)
      if (!found) return { valid: false, message: FORMAT_ERROR_MESSAGE }
      return { valid: true, table: found.table, sheetName: found.sheetName }
    }

    const table = parseDelimited(decodeText(buffer), format === 'tsv' ? '\t' : ',')
    if (!table || table.columns.length === 0) return { valid: false, message: FORMAT_ERROR_MESSAGE }
    return { valid: true, table }
  } catch (err) {
    console.warn('[INGEST] Failed to read', fileName, '-', err instanceof Error ? err.message : String(err))
    return { valid: false, message: FORMAT_ERROR_MESSAGE }
  }
}
