import path from 'path'
import type { AnalysisRecord, ApiResponse } from './types'
import type { AppConfig } from './config'
import type { AnalysisStore } from './store'
import type { DiagnosticSink } from './diagnostics'
import { readTable } from './ingest'
import { profile } from './profile'

export const ACCEPTED_MESSAGE = 'Uploaded file is in correct format'

export interface UploadedFile {
  name: string
  size: number
  arrayBuffer(): Promise<ArrayBuffer>
}

export interface UploadDeps {
  store: AnalysisStore
  config: AppConfig
  diagnostics?: DiagnosticSink
}

export interface UploadOutcome {
  status: number
  body: ApiResponse<AnalysisRecord>
}

export class UploadRejectedError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'UploadRejectedError'
  }
}

// ========== Validation ==========

/** Checks presence, extension and size before anything is read. Throws UploadRejectedError. */
export function validateUpload<T extends Pick<UploadedFile, 'name' | 'size'>>(
  file: T | null,
  config: AppConfig,
): asserts file is T {
  if (!file || file.name === '') {
    throw new UploadRejectedError('No file selected', 400)
  }
  const ext = path.extname(file.name).slice(1).toLowerCase()
  if (!config.allowedExtensions.includes(ext)) {
    const listed = config.allowedExtensions.map(e => e.toUpperCase()).join(', ')
    throw new UploadRejectedError(`Unsupported file type. Please upload one of: ${listed}.`, 400)
  }
  if (file.size > config.maxUploadBytes) {
    const limitMb = Math.round((config.maxUploadBytes / (1024 * 1024)) * 10) / 10
    throw new UploadRejectedError(`File is larger than the ${limitMb} MB limit`, 413)
  }
}

// ========== Analysis ==========

async function processUpload(file: UploadedFile, deps: UploadDeps): Promise<UploadOutcome> {
  const buffer = Buffer.from(await file.arrayBuffer())
  const ingested = readTable(buffer, file.name)

  if (!ingested.valid) {
    const record = deps.store.save({
      fileName: file.name,
      fileSize: file.size,
      valid: false,
      message: ingested.message,
    })
    console.log(`[UPLOAD] Rejected ${file.name}: ${ingested.message}`)
    return { status: 422, body: { data: record } }
  }

  const startedAt = Date.now()
  const result = profile(ingested.table, {
    previewRows: deps.config.previewRows,
    diagnostics: deps.diagnostics,
  })
  console.log(
    `[UPLOAD] Profiled ${file.name}${ingested.sheetName ? ` (sheet ${ingested.sheetName})` : ''}: ` +
    `${result.rowCount} rows × ${result.columnCount} columns in ${Date.now() - startedAt}ms`,
  )

  const record = deps.store.save({
    fileName: file.name,
    fileSize: file.size,
    valid: true,
    message: ACCEPTED_MESSAGE,
    result,
  })
  return { status: 200, body: { data: record } }
}

/**
 * Validates, reads and profiles one uploaded file, then records the outcome. A file that cannot be
 * read as a table is still recorded (valid: false) so the history shows the rejection.
 */
export async function analyzeUpload(file: UploadedFile | null, deps: UploadDeps): Promise<UploadOutcome> {
  try {
    validateUpload(file, deps.config)
    return await processUpload(file, deps)
  } catch (err) {
    if (err instanceof UploadRejectedError) {
      return { status: err.status, body: { error: err.message } }
    }
    throw err
  }
}
