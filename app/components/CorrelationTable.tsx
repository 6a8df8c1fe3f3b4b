"use client"

import type { CorrelationBlock } from '@/lib/types'

interface CorrelationTableProps {
  correlation: CorrelationBlock
}

// Blue for positive, pink for negative, opacity by strength.
function cellBackground(r: number | null): string {
  if (r === null) return 'transparent'
  const alpha = Math.min(1, Math.abs(r)) * 0.6
  return r >= 0 ? `rgba(96, 165, 250, ${alpha})` : `rgba(244, 114, 182, ${alpha})`
}

export default function CorrelationTable({ correlation }: CorrelationTableProps) {
  if (correlation.columns.length < 2) return null

  return (
    <div
      className="overflow-hidden rounded-xl border"
      style={{ background: 'var(--bg-card)', borderColor: 'var(--border-color)' }}
    >
      <div className="border-b px-4 py-2" style={{ borderColor: 'var(--border-color)' }}>
        <h3 className="text-sm font-medium">Correlation (Pearson)</h3>
      </div>
      <div className="overflow-x-auto p-2">
        <table className="text-xs">
          <thead>
            <tr>
              <th />
              {correlation.columns.map((col, i) => (
                <th key={`${col}-${i}`} className="px-2 py-1 font-medium" style={{ color: 'var(--text-secondary)' }}>
                  {col}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {correlation.matrix.map((row, i) => (
              <tr key={i}>
                <th className="px-2 py-1 text-left font-medium" style={{ color: 'var(--text-secondary)' }}>
                  {correlation.columns[i]}
                </th>
                {row.map((r, j) => (
                  <td
                    key={j}
                    className="px-2 py-1 text-center tabular-nums"
                    style={{ background: cellBackground(r), color: r === null ? 'var(--text-tertiary)' : 'var(--text-primary)' }}
                  >
                    {r === null ? '—' : r.toFixed(2)}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  )
}
