import type { ReactNode } from 'react'
import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { formatCurrency, formatWatts } from '../lib/format'
import type { CostEstimate, UsageSummary } from '../types'

// Cost per period for each device, shaped for a grouped bar chart
export function projectionRows(costs: CostEstimate[]) {
  return costs.map(c => ({
    device: c.device,
    Hourly: c.hourly,
    Daily: c.daily,
    Monthly: c.monthly,
    Annual: c.annual,
  }))
}

export default function SummaryPanel({ summary, costs }: { summary: UsageSummary; costs: CostEstimate[] }) {
  return (
    <div className="space-y-6">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        <SummaryList title="Average Power Consumption">
          {summary.devices.map(d => (
            <Row key={d.device} label={d.device} value={formatWatts(d.averageWatts, 2)} />
          ))}
        </SummaryList>
        <SummaryList title="Peak Power Usage">
          {summary.devices.map(d => (
            <Row key={d.device} label={d.device} value={formatWatts(d.peakWatts, 2)} />
          ))}
        </SummaryList>
        <SummaryList title="Projected Annual Costs">
          {summary.devices.map(d => (
            <Row key={d.device} label={d.device} value={formatCurrency(d.annualCost)} />
          ))}
        </SummaryList>
      </div>

      <div>
        <div className="mb-2 text-sm font-medium text-gray-700">Cost Projections by Time Period</div>
        <div className="h-72">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={projectionRows(costs)}>
              <CartesianGrid strokeDasharray="3 3" />
              <XAxis dataKey="device" />
              <YAxis unit="$" />
              <Tooltip />
              <Legend />
              <Bar dataKey="Hourly" fill="#0ea5e9" />
              <Bar dataKey="Daily" fill="#22c55e" />
              <Bar dataKey="Monthly" fill="#f97316" />
              <Bar dataKey="Annual" fill="#8b5cf6" />
            </BarChart>
          </ResponsiveContainer>
        </div>
      </div>
      <div className="text-xs text-gray-400">Based on {summary.readings} readings per device</div>
    </div>
  )
}

function SummaryList({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div>
      <div className="mb-2 text-sm font-medium text-gray-700">{title}</div>
      <div className="space-y-1 text-sm">{children}</div>
    </div>
  )
}

function Row({ label, value }: { label: string; value: string }) {
  return (
    <div className="flex justify-between">
      <span className="text-gray-500">{label}</span>
      <span className="font-medium">{value}</span>
    </div>
  )
}
