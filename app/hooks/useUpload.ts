"use client"

import { useState, useCallback } from 'react'
import type { AnalysisRecord, ApiResponse } from '@/lib/types'

export type UploadStatus = 'idle' | 'uploading' | 'complete' | 'error'

export interface UploadState {
  status: UploadStatus
  message: string
  record: AnalysisRecord | null
  error: string | null
}

const initialState: UploadState = {
  status: 'idle',
  message: '',
  record: null,
  error: null,
}

export function useUpload() {
  const [state, setState] = useState<UploadState>(initialState)

  const resetState = useCallback(() => {
    setState(initialState)
  }, [])

  const startUpload = useCallback(async (
    file: File,
    onComplete?: (record: AnalysisRecord) => void,
  ) => {
    setState({
      ...initialState,
      status: 'uploading',
      message: `Analysing ${file.name}...`,
    })

    const formData = new FormData()
    formData.append('file', file)

    try {
      const response = await fetch('/api/upload', {
        method: 'POST',
        body: formData,
      })
      const json: ApiResponse<AnalysisRecord> = await response.json()
      const record = json.data

      if (!record) {
        setState(prev => ({
          ...prev,
          status: 'error',
          error: json.error ?? `Upload failed (${response.status})`,
        }))
        return
      }

      // a file that is not a table still comes back as a record, flagged invalid
      setState({
        status: record.valid ? 'complete' : 'error',
        message: record.message,
        record,
        error: record.valid ? null : record.message,
      })
      onComplete?.(record)
    } catch (err) {
      setState(prev => ({
        ...prev,
        status: 'error',
        error: String(err),
      }))
    }
  }, [])

  return {
    ...state,
    startUpload,
    resetState,
    isLoading: state.status === 'uploading',
  }
}
