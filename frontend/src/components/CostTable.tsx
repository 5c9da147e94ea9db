import { formatCurrency, formatWatts } from '../lib/format'
import type { CostEstimate } from '../types'

export default function CostTable({ costs, energyRate }: { costs: CostEstimate[]; energyRate: number | null }) {
  if (costs.length === 0) {
    return <div className="text-sm text-gray-500">No readings yet</div>
  }

  return (
    <div>
      <table className="w-full text-sm">
        <thead>
          <tr className="text-left text-gray-500">
            <th className="py-1 font-medium">Device</th>
            <th className="py-1 font-medium text-right">Avg</th>
            <th className="py-1 font-medium text-right">Hourly</th>
            <th className="py-1 font-medium text-right">Daily</th>
            <th className="py-1 font-medium text-right">Monthly</th>
          </tr>
        </thead>
        <tbody>
          {costs.map(c => (
            <tr key={c.device} className="border-t border-gray-100">
              <td className="py-1">{c.device}</td>
              <td className="py-1 text-right">{formatWatts(c.meanWatts)}</td>
              <td className="py-1 text-right">{formatCurrency(c.hourly, 3)}</td>
              <td className="py-1 text-right">{formatCurrency(c.daily)}</td>
              <td className="py-1 text-right">{formatCurrency(c.monthly)}</td>
            </tr>
          ))}
        </tbody>
      </table>
      {energyRate !== null && (
        <div className="mt-2 text-xs text-gray-400">At {formatCurrency(energyRate)}/kWh</div>
      )}
    </div>
  )
}
