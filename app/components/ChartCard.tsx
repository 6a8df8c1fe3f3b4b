"use client"

import {
  BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer,
  LineChart, Line, PieChart, Pie, Cell,
} from 'recharts'
import type { ChartBlock } from '@/lib/types'

export const COLORS = ['#60a5fa', '#f472b6', '#34d399', '#fbbf24', '#a78bfa', '#fb923c', '#22d3ee', '#e879f9']

const TOOLTIP_STYLE = {
  background: 'var(--bg-tertiary)',
  border: '1px solid var(--border-color)',
  borderRadius: '8px',
  color: 'var(--text-primary)',
}

const TICK = { fill: 'var(--text-secondary)', fontSize: 11 }

interface ChartCardProps {
  chart: ChartBlock
  height?: number
}

interface ChartPoint {
  name: string
  value: number
}

export function toPoints(chart: ChartBlock): ChartPoint[] {
  return chart.labels.map((name, i) => ({ name, value: chart.values[i] ?? 0 }))
}

export default function ChartCard({ chart, height = 220 }: ChartCardProps) {
  const data = toPoints(chart)

  const renderChart = () => {
    if (data.length === 0) {
      return (
        <p className="p-4 text-xs" style={{ color: 'var(--text-tertiary)' }}>
          Nothing to plot
        </p>
      )
    }

    if (chart.kind === 'bar' || chart.kind === 'histogram') {
      return (
        <ResponsiveContainer width="100%" height={height}>
          <BarChart data={data}>
            <CartesianGrid strokeDasharray="3 3" stroke="var(--border-color)" />
            <XAxis dataKey="name" tick={TICK} interval={chart.kind === 'histogram' ? 'preserveStartEnd' : 0} />
            <YAxis tick={TICK} allowDecimals={false} />
            <Tooltip contentStyle={TOOLTIP_STYLE} />
            <Bar dataKey="value" radius={[4, 4, 0, 0]} barSize={chart.kind === 'histogram' ? undefined : 24}>
              {data.map((_, i) => (
                <Cell key={i} fill={chart.kind === 'histogram' ? COLORS[0] : COLORS[i % COLORS.length]} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      )
    }

    if (chart.kind === 'timeline') {
      return (
        <ResponsiveContainer width="100%" height={height}>
          <LineChart data={data}>
            <CartesianGrid strokeDasharray="3 3" stroke="var(--border-color)" />
            <XAxis dataKey="name" tick={TICK} />
            <YAxis tick={TICK} allowDecimals={false} />
            <Tooltip contentStyle={TOOLTIP_STYLE} />
            <Line
              type="monotone"
              dataKey="value"
              stroke={COLORS[0]}
              strokeWidth={2}
              dot={data.length <= 60 ? { fill: COLORS[0] } : false}
            />
          </LineChart>
        </ResponsiveContainer>
      )
    }

    return (
      <ResponsiveContainer width="100%" height={height}>
        <PieChart>
          <Pie
            data={data}
            dataKey="value"
            nameKey="name"
            cx="50%"
            cy="50%"
            outerRadius={75}
            label={(props) => {
              const name = String(props.name ?? '')
              const percent = Number(props.percent ?? 0)
              return `${name} ${(percent * 100).toFixed(0)}%`
            }}
          >
            {data.map((_, i) => (
              <Cell key={i} fill={COLORS[i % COLORS.length]} />
            ))}
          </Pie>
          <Tooltip contentStyle={TOOLTIP_STYLE} />
        </PieChart>
      </ResponsiveContainer>
    )
  }

  return (
    <div
      className="overflow-hidden rounded-xl border"
      style={{ background: 'var(--bg-card)', borderColor: 'var(--border-color)' }}
    >
      <div className="border-b px-4 py-2" style={{ borderColor: 'var(--border-color)' }}>
        <h4 className="text-xs font-medium">{chart.title}</h4>
      </div>
      <div className="p-2">{renderChart()}</div>
    </div>
  )
}
