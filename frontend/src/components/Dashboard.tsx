import { useEffect, useState, type ReactNode } from 'react'
import type { PowerStream } from '../hooks/usePowerStream'
import { clearReadings, fetchConfig, startMonitoring, stopMonitoring, updateEnergyRate } from '../lib/api'
import { formatWatts, parseEnergyRate } from '../lib/format'
import { DEVICE_COLORS, DEVICES, type DashboardConfig } from '../types'
import Controls from './Controls'
import CostTable from './CostTable'
import { PowerChart } from './PowerChart'
import SummaryPanel from './SummaryPanel'

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err)
}

export default function Dashboard({ stream }: { stream: PowerStream }) {
  const [config, setConfig] = useState<DashboardConfig | null>(null)
  const [durationSec, setDurationSec] = useState(30)
  const [rate, setRate] = useState('0.12')
  const [busy, setBusy] = useState(false)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    fetchConfig()
      .then(cfg => {
        setConfig(cfg)
        setDurationSec(cfg.duration.default)
        setRate(cfg.energyRate.toFixed(2))
      })
      .catch(err => setError(`Failed to load configuration: ${errorMessage(err)}`))
  }, [])

  async function run(action: () => Promise<unknown>) {
    setBusy(true)
    setError(null)
    try {
      await action()
    } catch (err) {
      setError(errorMessage(err))
    } finally {
      setBusy(false)
    }
  }

  const { latest, rows, costs, energyRate, status, summary, connected } = stream

  // Sent on blur or Enter so a half-typed value never reaches the backend.
  function commitRate() {
    const parsed = parseEnergyRate(rate)
    if (parsed === null) {
      setError('Electricity rate must be between 0.01 and 1 $/kWh')
      return
    }
    if (parsed === energyRate) return
    setError(null)
    updateEnergyRate(parsed).catch(err => setError(errorMessage(err)))
  }
  const running = status?.state === 'running'

  return (
    <main>
      <div className="p-4 md:p-6 lg:p-8 space-y-6">
        <Card title="Control Panel">
          <Controls
            config={config}
            status={status}
            durationSec={durationSec}
            rate={rate}
            busy={busy}
            onDurationChange={setDurationSec}
            onRateChange={setRate}
            onRateCommit={commitRate}
            onStart={() => void run(() => startMonitoring(durationSec))}
            onStop={() => void run(stopMonitoring)}
            onClear={() => void run(clearReadings)}
          />
          {error && <div className="mt-3 text-sm text-red-600">{error}</div>}
          {!connected && <div className="mt-3 text-sm text-yellow-700">Connecting to live stream…</div>}
        </Card>

        <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
          {DEVICES.map(device => (
            <Card key={device} title={`${device} (W)`}>
              <div className="text-3xl font-semibold" style={{ color: DEVICE_COLORS[device] }}>
                {formatWatts(latest ? latest[device] : null)}
              </div>
              {latest && <div className="text-xs text-gray-400">at {latest.time}</div>}
            </Card>
          ))}
        </div>

        <div className="grid grid-cols-1 xl:grid-cols-3 gap-4">
          <div className="xl:col-span-2">
            <Card title="Device Power Usage (W)">
              {rows.length === 0 ? (
                <div className="text-sm text-gray-500">Press Start Monitoring to begin streaming readings</div>
              ) : (
                <PowerChart rows={rows} />
              )}
            </Card>
          </div>
          <Card title="Real-Time Cost Estimates">
            <CostTable costs={costs} energyRate={energyRate} />
          </Card>
        </div>

        {summary && !running && (
          <Card title="Power Usage and Cost Summary">
            <div className="mb-4 rounded-md bg-emerald-100 p-3 text-sm text-emerald-700">Monitoring Complete!</div>
            <SummaryPanel summary={summary} costs={costs} />
          </Card>
        )}
      </div>
    </main>
  )
}

function Card({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div className="rounded-xl border border-gray-200 bg-white p-4 shadow-sm">
      <div className="mb-3 text-sm font-medium text-gray-700">{title}</div>
      {children}
    </div>
  )
}
