"use client"

import { useState, useCallback, useEffect } from 'react'
import type { AnalysisRecord, AnalysisSummary, ApiResponse } from '@/lib/types'

export function useAnalyses() {
  const [history, setHistory] = useState<AnalysisSummary[]>([])
  const [selected, setSelected] = useState<AnalysisRecord | null>(null)

  const refresh = useCallback(async () => {
    try {
      const res = await fetch('/api/analyses')
      if (!res.ok) return
      const json: ApiResponse<AnalysisSummary[]> = await res.json()
      setHistory(json.data ?? [])
    } catch (err) {
      console.error('[HISTORY]', err)
    }
  }, [])

  const open = useCallback(async (id: string) => {
    try {
      const res = await fetch(`/api/analyses/${id}`)
      if (!res.ok) return
      const json: ApiResponse<AnalysisRecord> = await res.json()
      if (json.data) setSelected(json.data)
    } catch (err) {
      console.error('[HISTORY_OPEN]', err)
    }
  }, [])

  const remove = useCallback(async (id: string) => {
    try {
      const res = await fetch(`/api/analyses/${id}`, { method: 'DELETE' })
      if (!res.ok) return
      setHistory(prev => prev.filter(a => a.id !== id))
      setSelected(prev => (prev?.id === id ? null : prev))
    } catch (err) {
      console.error('[HISTORY_DELETE]', err)
    }
  }, [])

  // load the history once on mount
  useEffect(() => {
    refresh().catch(err => console.error('[HISTORY]', err))
  }, [refresh])

  return { history, selected, setSelected, refresh, open, remove }
}
