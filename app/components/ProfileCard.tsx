"use client"

import type { ColumnCategory, ProfileResult } from '@/lib/types'

interface ProfileCardProps {
  fileName: string
  result: ProfileResult
}

const CATEGORY_ORDER: ColumnCategory[] = ['Numerical', 'String', 'Date', 'Skipped', 'Error']

export function qualityColor(percent: number): string {
  return percent >= 80 ? 'var(--success)'
    : percent >= 50 ? 'var(--warning)'
    : 'var(--error)'
}

export default function ProfileCard({ fileName, result }: ProfileCardProps) {
  const scoreColor = qualityColor(result.qualityPercent)

  return (
    <div
      className="rounded-xl border p-4"
      style={{ background: 'var(--bg-card)', borderColor: 'var(--border-color)' }}
    >
      <div className="mb-3 flex items-center justify-between">
        <h3 className="truncate text-sm font-semibold">{fileName}</h3>
        <div className="flex items-center gap-2">
          <span className="text-xs" style={{ color: 'var(--text-secondary)' }}>
            {result.rowCount.toLocaleString()} rows × {result.columnCount} columns
          </span>
          <span
            className="rounded-full px-2 py-0.5 text-xs font-bold"
            style={{ color: scoreColor, border: `1px solid ${scoreColor}` }}
            title="Share of non-missing cells"
          >
            {result.qualityPercent}%
          </span>
        </div>
      </div>

      <div className="mb-3 flex flex-wrap gap-1">
        {CATEGORY_ORDER.filter(c => result.categoryCounts[c] > 0).map(c => (
          <span
            key={c}
            className="rounded-md px-2 py-0.5 text-xs"
            style={{ background: 'var(--bg-tertiary)', color: 'var(--text-secondary)' }}
          >
            {c}: {result.categoryCounts[c]}
          </span>
        ))}
      </div>

      {/* Notices */}
      {result.notices.length > 0 && (
        <div className="space-y-1">
          {result.notices.map((notice, i) => (
            <div key={i} className="flex items-start gap-2 text-xs">
              <span style={{ color: 'var(--warning)' }}>●</span>
              <span style={{ color: 'var(--text-secondary)' }}>{notice}</span>
            </div>
          ))}
        </div>
      )}
    </div>
  )
}
