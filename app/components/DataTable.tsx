"use client"

import { useState, useMemo } from 'react'
import type { TablePreview } from '@/lib/types'

interface DataTableProps {
  preview: TablePreview
  totalRows: number
}

export default function DataTable({ preview, totalRows }: DataTableProps) {
  const [sortIndex, setSortIndex] = useState<number | null>(null)
  const [sortAsc, setSortAsc] = useState(true)

  const sorted = useMemo(() => {
    if (sortIndex === null) return preview.rows
    return [...preview.rows].sort((a, b) => {
      const va = a[sortIndex] ?? ''
      const vb = b[sortIndex] ?? ''
      const numA = Number(va)
      const numB = Number(vb)
      if (va !== '' && vb !== '' && !isNaN(numA) && !isNaN(numB)) {
        return sortAsc ? numA - numB : numB - numA
      }
      return sortAsc ? va.localeCompare(vb) : vb.localeCompare(va)
    })
  }, [preview.rows, sortIndex, sortAsc])

  const handleSort = (index: number) => {
    if (sortIndex === index) {
      setSortAsc(!sortAsc)
    } else {
      setSortIndex(index)
      setSortAsc(true)
    }
  }

  return (
    <div className="overflow-hidden rounded-xl border" style={{ borderColor: 'var(--border-color)' }}>
      <div className="overflow-x-auto">
        <table className="w-full text-xs">
          <thead>
            <tr style={{ background: 'var(--bg-tertiary)' }}>
              {preview.columns.map((col, i) => (
                <th
                  key={`${col}-${i}`}
                  className="cursor-pointer select-none whitespace-nowrap border-b px-3 py-2 text-left font-medium"
                  style={{ borderColor: 'var(--border-color)', color: 'var(--text-secondary)' }}
                  onClick={() => handleSort(i)}
                >
                  {col}
                  {sortIndex === i && (
                    <span className="ml-1">{sortAsc ? '↑' : '↓'}</span>
                  )}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {sorted.map((row, r) => (
              <tr key={r} className="hover:bg-white/5">
                {row.map((cell, c) => (
                  <td
                    key={c}
                    className="whitespace-nowrap border-b px-3 py-1.5"
                    style={{ borderColor: 'var(--border-subtle)', color: cell === '' ? 'var(--text-tertiary)' : 'var(--text-primary)' }}
                  >
                    {cell === '' ? '—' : cell}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      {/* Footer */}
      <div
        className="px-3 py-1.5 text-xs"
        style={{ background: 'var(--bg-card)', color: 'var(--text-tertiary)' }}
      >
        First {preview.rows.length} of {totalRows.toLocaleString()} rows
      </div>
    </div>
  )
}
