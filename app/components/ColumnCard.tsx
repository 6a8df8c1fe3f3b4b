"use client"

import type { ColumnCategory, ColumnProfile } from '@/lib/types'
import ChartCard from './ChartCard'
import { qualityColor } from './ProfileCard'

interface ColumnCardProps {
  column: ColumnProfile
}

const CATEGORY_COLORS: Record<ColumnCategory, string> = {
  Numerical: '#60a5fa',
  String: '#a78bfa',
  Date: '#34d399',
  Skipped: 'var(--text-tertiary)',
  Error: 'var(--error)',
}

function Stat({ label, value }: { label: string; value: string | number }) {
  return (
    <div className="rounded-lg p-2" style={{ background: 'var(--bg-primary)' }}>
      <p className="text-[10px] uppercase" style={{ color: 'var(--text-tertiary)' }}>{label}</p>
      <p className="text-sm font-semibold tabular-nums">{typeof value === 'number' ? value.toLocaleString() : value}</p>
    </div>
  )
}

function Details({ column }: ColumnCardProps) {
  switch (column.category) {
    case 'Numerical':
      return (
        <div className="space-y-3">
          {column.stats && (
            <div className="grid grid-cols-3 gap-2">
              <Stat label="count" value={column.stats.count} />
              <Stat label="mean" value={column.stats.mean} />
              <Stat label="std" value={column.stats.std} />
              <Stat label="min" value={column.stats.min} />
              <Stat label="median" value={column.stats.median} />
              <Stat label="max" value={column.stats.max} />
            </div>
          )}
          {column.chartPrimary && <ChartCard chart={column.chartPrimary} />}
          {column.boxplot && (
            <p className="text-xs" style={{ color: 'var(--text-secondary)' }}>
              Box: whiskers {column.boxplot.whiskerLow} – {column.boxplot.whiskerHigh}, quartiles{' '}
              {column.boxplot.q1} / {column.boxplot.median} / {column.boxplot.q3}
            </p>
          )}
          {column.outliers && column.outliers.total > 0 && (
            <div className="text-xs" style={{ color: 'var(--text-secondary)' }}>
              <p className="mb-1">
                {column.outliers.total} outlier{column.outliers.total === 1 ? '' : 's'} outside [
                {column.outliers.lower}, {column.outliers.upper}]
              </p>
              <ul className="space-y-0.5">
                {column.outliers.items.map(item => (
                  <li key={item.row} style={{ color: 'var(--text-tertiary)' }}>
                    row {item.row}: {item.value}
                  </li>
                ))}
              </ul>
            </div>
          )}
        </div>
      )

    case 'String':
      return (
        <div className="space-y-3">
          {column.chartPrimary && <ChartCard chart={column.chartPrimary} />}
          {column.chartSecondary && <ChartCard chart={column.chartSecondary} />}
          {column.topValues.length > 0 && (
            <div className="flex flex-wrap gap-1">
              {column.topValues.map(entry => (
                <span
                  key={entry.value}
                  className="rounded-md px-2 py-0.5 text-xs"
                  style={{ background: 'var(--bg-tertiary)', color: 'var(--text-secondary)' }}
                >
                  {entry.value} ({entry.count})
                </span>
              ))}
            </div>
          )}
        </div>
      )

    case 'Date':
      return (
        <div className="space-y-3">
          <div className="grid grid-cols-2 gap-2">
            <Stat label="earliest" value={column.stats.min ?? '—'} />
            <Stat label="latest" value={column.stats.max ?? '—'} />
            <Stat label="parsed" value={column.stats.parsed} />
            <Stat label="unparsed" value={column.stats.unparsed} />
          </div>
          {column.chartPrimary && <ChartCard chart={column.chartPrimary} />}
        </div>
      )

    case 'Skipped':
      return (
        <p className="text-xs" style={{ color: 'var(--text-secondary)' }}>
          Not charted: {column.skipReason}
        </p>
      )

    case 'Error':
      return (
        <p className="text-xs" style={{ color: 'var(--error)' }}>
          Analysis failed: {column.errorMessage}
        </p>
      )
  }
}

export default function ColumnCard({ column }: ColumnCardProps) {
  const color = CATEGORY_COLORS[column.category]

  return (
    <div
      className="rounded-xl border p-4"
      style={{ background: 'var(--bg-card)', borderColor: 'var(--border-color)' }}
    >
      <div className="mb-3 flex items-center justify-between gap-2">
        <h3 className="truncate text-sm font-semibold" title={column.name}>{column.name}</h3>
        <span
          className="rounded-full px-2 py-0.5 text-xs font-medium"
          style={{ color, border: `1px solid ${color}` }}
        >
          {column.category}
        </span>
      </div>
      <div className="mb-3 flex flex-wrap gap-x-3 gap-y-1 text-xs" style={{ color: 'var(--text-tertiary)' }}>
        <span>{column.dtypeLabel}</span>
        <span>{column.uniqueCount.toLocaleString()} unique</span>
        <span>{column.missingCount.toLocaleString()} missing</span>
        <span style={{ color: qualityColor(column.qualityPercent) }}>{column.qualityPercent}% filled</span>
      </div>
      <Details column={column} />
    </div>
  )
}
