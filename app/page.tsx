"use client"

import { useCallback, useEffect } from 'react'
import type { AnalysisRecord } from '@/lib/types'
import Sidebar from './components/Sidebar'
import ProfileCard from './components/ProfileCard'
import ColumnCard from './components/ColumnCard'
import CorrelationTable from './components/CorrelationTable'
import DataTable from './components/DataTable'
import ChartSkeleton from './components/ChartSkeleton'
import { useUpload } from './hooks/useUpload'
import { useAnalyses } from './hooks/useAnalyses'

function EmptyState({ message }: { message: string }) {
  return (
    <div className="flex h-full items-center justify-center">
      <p className="text-sm" style={{ color: 'var(--text-secondary)' }}>{message}</p>
    </div>
  )
}

function AnalysisView({ record }: { record: AnalysisRecord }) {
  const result = record.result
  if (!record.valid || !result) {
    return <EmptyState message={`${record.fileName}: ${record.message}`} />
  }

  return (
    <div className="space-y-4">
      <ProfileCard fileName={record.fileName} result={result} />
      <DataTable preview={result.preview} totalRows={result.rowCount} />
      <CorrelationTable correlation={result.correlation} />
      <div className="grid grid-cols-1 gap-4 xl:grid-cols-2">
        {result.columns.map((column, i) => (
          <ColumnCard key={`${column.name}-${i}`} column={column} />
        ))}
      </div>
    </div>
  )
}

export default function Home() {
  const upload = useUpload()
  const analyses = useAnalyses()
  const { refresh, setSelected } = analyses

  // a finished upload becomes the current view and joins the history
  const handleUpload = useCallback((file: File) => {
    upload.startUpload(file, (record) => {
      setSelected(record)
      refresh().catch(err => console.error('[HISTORY]', err))
    }).catch(err => console.error('[UPLOAD]', err))
  }, [upload, setSelected, refresh])

  const handleSelect = useCallback((id: string) => {
    upload.resetState()
    analyses.open(id).catch(err => console.error('[HISTORY_OPEN]', err))
  }, [upload, analyses])

  const handleDelete = useCallback((id: string) => {
    analyses.remove(id).catch(err => console.error('[HISTORY_DELETE]', err))
  }, [analyses])

  // show the most recent analysis on first load
  const latestId = analyses.history[0]?.id ?? null
  const hasSelection = analyses.selected !== null
  const { open } = analyses
  useEffect(() => {
    if (!hasSelection && latestId) {
      open(latestId).catch(err => console.error('[HISTORY_OPEN]', err))
    }
  }, [hasSelection, latestId, open])

  const renderMain = () => {
    if (upload.isLoading) return <ChartSkeleton count={4} />
    if (upload.status === 'error' && upload.error) return <EmptyState message={upload.error} />
    if (analyses.selected) return <AnalysisView record={analyses.selected} />
    return <EmptyState message="Upload a CSV, TSV or Excel file to profile it" />
  }

  return (
    <div className="flex h-screen overflow-hidden">
      <Sidebar
        history={analyses.history}
        selectedId={analyses.selected?.id ?? null}
        onSelect={handleSelect}
        onDelete={handleDelete}
        onUpload={handleUpload}
        uploadStatus={upload.status}
        uploadMessage={upload.message}
      />
      <main className="flex-1 overflow-y-auto p-6">{renderMain()}</main>
    </div>
  )
}
