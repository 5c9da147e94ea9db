import { memo } from 'react'
import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { ChartRow } from '../lib/stream'
import { DEVICE_COLORS, DEVICES } from '../types'

type PowerChartProps = {
  rows: ChartRow[]
  height?: number
}

export const PowerChart = memo(function PowerChart({ rows, height = 400 }: PowerChartProps) {
  return (
    <div style={{ height }}>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={rows}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="time" minTickGap={30} />
          <YAxis unit=" W" width={70} />
          <Tooltip formatter={value => (typeof value === 'number' ? `${value.toFixed(2)} W` : value)} />
          <Legend />
          {DEVICES.map(device => (
            <Line
              key={device}
              type="monotone"
              dataKey={device}
              stroke={DEVICE_COLORS[device]}
              strokeWidth={2}
              dot={false}
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  )
})
