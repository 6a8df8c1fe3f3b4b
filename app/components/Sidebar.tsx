"use client"

import { useCallback, useState } from 'react'
import type { DragEvent } from 'react'
import type { AnalysisSummary } from '@/lib/types'
import type { UploadStatus } from '@/app/hooks/useUpload'

const ACCEPT = '.csv,.tsv,.xls,.xlsx,.xlsm'

interface SidebarProps {
  history: AnalysisSummary[]
  selectedId: string | null
  onSelect: (id: string) => void
  onDelete: (id: string) => void
  onUpload: (file: File) => void
  uploadStatus: UploadStatus
  uploadMessage: string
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export default function Sidebar({
  history,
  selectedId,
  onSelect,
  onDelete,
  onUpload,
  uploadStatus,
  uploadMessage,
}: SidebarProps) {
  const [isDragging, setIsDragging] = useState(false)
  const isUploading = uploadStatus === 'uploading'

  const handleFiles = useCallback(
    (fileList: FileList | null) => {
      const file = fileList?.[0]
      if (file) onUpload(file)
    },
    [onUpload]
  )

  const handleDragOver = useCallback((e: DragEvent) => {
    e.preventDefault()
    setIsDragging(true)
  }, [])

  const handleDragLeave = useCallback(() => {
    setIsDragging(false)
  }, [])

  const handleDrop = useCallback(
    (e: DragEvent) => {
      e.preventDefault()
      setIsDragging(false)
      handleFiles(e.dataTransfer.files)
    },
    [handleFiles]
  )

  return (
    <aside
      className="flex w-64 shrink-0 flex-col border-r"
      style={{
        background: 'var(--bg-secondary)',
        borderColor: 'var(--border-color)',
      }}
    >
      {/* Header */}
      <div className="border-b p-4" style={{ borderColor: 'var(--border-color)' }}>
        <h1 className="text-lg font-bold" style={{ color: 'var(--accent)' }}>
          Tabular Profiler
        </h1>
        <p className="text-xs" style={{ color: 'var(--text-secondary)' }}>
          Column-by-column data profiles
        </p>
      </div>

      {/* Upload Area */}
      <label
        htmlFor="table-upload"
        className={`m-3 flex cursor-pointer flex-col items-center justify-center rounded-lg border-2 border-dashed p-4 ${
          isDragging ? 'bg-blue-400/10' : ''
        }`}
        style={{
          borderColor: isDragging ? 'var(--accent)' : 'var(--border-color)',
        }}
        onDragOver={handleDragOver}
        onDragLeave={handleDragLeave}
        onDrop={handleDrop}
      >
        <input
          id="table-upload"
          type="file"
          accept={ACCEPT}
          className="sr-only"
          disabled={isUploading}
          onChange={(e) => {
            handleFiles(e.target.files)
            e.target.value = ''
          }}
        />
        {isUploading ? (
          <div className="flex items-center gap-2">
            <div
              className="h-4 w-4 animate-spin rounded-full border-2 border-t-transparent"
              style={{ borderColor: 'var(--accent)', borderTopColor: 'transparent' }}
            />
            <span className="text-sm" style={{ color: 'var(--text-secondary)' }}>
              {uploadMessage || 'Uploading...'}
            </span>
          </div>
        ) : (
          <>
            <svg
              width="24" height="24" fill="none" stroke="currentColor"
              strokeWidth="1.5" viewBox="0 0 24 24"
              style={{ color: 'var(--text-secondary)' }}
            >
              <path d="M12 16V4m0 0L8 8m4-4l4 4M4 20h16" />
            </svg>
            <span className="mt-1 text-xs" style={{ color: 'var(--text-secondary)' }}>
              Drop a CSV or Excel file
            </span>
          </>
        )}
      </label>

      {/* History */}
      <div className="flex-1 overflow-y-auto px-3 pb-3">
        <p
          className="mb-2 text-xs font-medium uppercase tracking-wider"
          style={{ color: 'var(--text-secondary)' }}
        >
          History ({history.length})
        </p>
        {history.length === 0 ? (
          <p className="text-xs" style={{ color: 'var(--text-secondary)' }}>
            No files analysed yet
          </p>
        ) : (
          <ul className="space-y-1">
            {history.map((item) => (
              <li
                key={item.id}
                className="group flex cursor-pointer items-center gap-2 rounded-md px-2 py-1.5 text-sm hover:bg-white/5"
                style={{ background: item.id === selectedId ? 'var(--bg-tertiary)' : undefined }}
                onClick={() => onSelect(item.id)}
              >
                <span
                  className="h-2 w-2 shrink-0 rounded-full"
                  style={{ background: item.valid ? 'var(--success)' : 'var(--error)' }}
                  title={item.message}
                />
                <div className="min-w-0 flex-1">
                  <p className="truncate" title={item.fileName}>{item.fileName}</p>
                  <p className="text-[10px]" style={{ color: 'var(--text-tertiary)' }}>
                    {item.rowCount === null
                      ? formatSize(item.fileSize)
                      : `${item.rowCount.toLocaleString()} rows · ${formatSize(item.fileSize)}`}
                  </p>
                </div>
                <button
                  onClick={(e) => {
                    e.stopPropagation()
                    onDelete(item.id)
                  }}
                  className="shrink-0 rounded px-1 text-xs opacity-0 hover:bg-white/10 group-hover:opacity-100"
                  style={{ color: 'var(--text-tertiary)' }}
                  title="Delete"
                >
                  ×
                </button>
              </li>
            ))}
          </ul>
        )}
      </div>
    </aside>
  )
}
