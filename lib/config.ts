import { SUPPORTED_EXTENSIONS } from './ingest'
import { DEFAULT_PREVIEW_ROWS } from './profile'

export interface AppConfig {
  maxUploadBytes: number
  allowedExtensions: readonly string[]
  databasePath: string
  previewRows: number
}

const MB = 1024 * 1024
const DEFAULT_MAX_UPLOAD_MB = 50

function positiveNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  return Number.isFinite(n) && n > 0 ? n : fallback
}

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  return {
    maxUploadBytes: Math.floor(positiveNumber(env.MAX_UPLOAD_MB, DEFAULT_MAX_UPLOAD_MB) * MB),
    allowedExtensions: SUPPORTED_EXTENSIONS,
    databasePath: env.ANALYSIS_DB_PATH?.trim() || 'data/analyses.db',
    previewRows: Math.floor(positiveNumber(env.PREVIEW_ROWS, DEFAULT_PREVIEW_ROWS)),
  }
}
