"use client"

interface ChartSkeletonProps {
  count?: number
}

// Placeholder column cards while a file is being profiled.
export default function ChartSkeleton({ count = 3 }: ChartSkeletonProps) {
  return (
    <div className="space-y-4">
      <div
        className="h-24 animate-pulse rounded-xl"
        style={{ background: 'var(--bg-secondary)', border: '1px solid var(--border-subtle)' }}
      />
      <div className="grid grid-cols-1 gap-4 xl:grid-cols-2">
        {Array.from({ length: count }).map((_, i) => (
          <div
            key={i}
            className="animate-pulse rounded-xl p-4"
            style={{
              background: 'var(--bg-secondary)',
              border: '1px solid var(--border-subtle)',
            }}
          >
            <div className="mb-3 flex justify-between">
              <div className="h-4 w-1/3 rounded" style={{ background: 'var(--bg-tertiary)' }} />
              <div className="h-4 w-16 rounded-full" style={{ background: 'var(--bg-tertiary)' }} />
            </div>
            <div className="mb-3 grid grid-cols-3 gap-2">
              {Array.from({ length: 3 }).map((__, j) => (
                <div key={j} className="h-10 rounded-lg" style={{ background: 'var(--bg-tertiary)' }} />
              ))}
            </div>
            <div className="h-48 rounded" style={{ background: 'var(--bg-tertiary)' }} />
          </div>
        ))}
      </div>
    </div>
  )
}
