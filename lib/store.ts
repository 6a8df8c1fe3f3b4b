import Database from 'better-sqlite3'
import fs from 'fs'
import path from 'path'
import { v4 as uuid } from 'uuid'
import type { AnalysisRecord, AnalysisSummary, ProfileResult } from './types'
import { loadConfig } from './config'

interface AnalysisRow {
  id: string
  file_name: string
  file_size: number
  valid: number
  message: string
  row_count: number | null
  column_count: number | null
  result_json: string | null
  created_at: string
}

export type NewAnalysis = Omit<AnalysisRecord, 'id' | 'createdAt'>

export class AnalysisStore {
  private db: Database.Database

  constructor(dbPath: string = 'data/analyses.db') {
    const dir = path.dirname(dbPath)
    if (dbPath !== ':memory:' && !fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.migrate()
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analyses (
        id TEXT PRIMARY KEY,
        file_name TEXT NOT NULL,
        file_size INTEGER NOT NULL DEFAULT 0,
        valid INTEGER NOT NULL,
        message TEXT NOT NULL,
        row_count INTEGER DEFAULT NULL,
        column_count INTEGER DEFAULT NULL,
        result_json TEXT DEFAULT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_analyses_created ON analyses(created_at);
    `)
  }

  save(analysis: NewAnalysis): AnalysisRecord {
    const record: AnalysisRecord = { ...analysis, id: uuid(), createdAt: new Date().toISOString() }
    this.db.prepare(
      `INSERT INTO analyses (id, file_name, file_size, valid, message, row_count, column_count, result_json, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      record.id,
      record.fileName,
      record.fileSize,
      record.valid ? 1 : 0,
      record.message,
      record.result?.rowCount ?? null,
      record.result?.columnCount ?? null,
      record.result ? JSON.stringify(record.result) : null,
      record.createdAt,
    )
    return record
  }

  get(id: string): AnalysisRecord | null {
    const row = this.db.prepare<[string], AnalysisRow>('SELECT * FROM analyses WHERE id = ?').get(id)
    if (!row) return null
    const record: AnalysisRecord = {
      id: row.id,
      fileName: row.file_name,
      fileSize: row.file_size,
      valid: row.valid === 1,
      message: row.message,
      createdAt: row.created_at,
    }
    if (row.result_json) {
      const result: ProfileResult = JSON.parse(row.result_json)
      record.result = result
    }
    return record
  }

  /** Newest first, without the stored profiles. */
  list(limit = 50): AnalysisSummary[] {
    const rows = this.db.prepare<[number], AnalysisRow>(
      `SELECT id, file_name, file_size, valid, message, row_count, column_count, created_at
       FROM analyses ORDER BY created_at DESC, rowid DESC LIMIT ?`
    ).all(limit)
    return rows.map(row => ({
      id: row.id,
      fileName: row.file_name,
      fileSize: row.file_size,
      valid: row.valid === 1,
      message: row.message,
      rowCount: row.row_count,
      columnCount: row.column_count,
      createdAt: row.created_at,
    }))
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM analyses WHERE id = ?').run(id).changes > 0
  }

  close(): void {
    this.db.close()
  }
}

let store: AnalysisStore | null = null

export function getAnalysisStore(): AnalysisStore {
  if (!store) {
    store = new AnalysisStore(loadConfig().databasePath)
  }
  return store
}
