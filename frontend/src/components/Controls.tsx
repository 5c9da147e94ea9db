import { formatRemaining } from '../lib/format'
import type { DashboardConfig, MonitoringStatus } from '../types'

type ControlsProps = {
  config: DashboardConfig | null
  status: MonitoringStatus | null
  durationSec: number
  rate: string
  busy: boolean
  onDurationChange: (value: number) => void
  onRateChange: (value: string) => void
  onRateCommit: () => void
  onStart: () => void
  onStop: () => void
  onClear: () => void
}

export default function Controls(props: ControlsProps) {
  const { config, status, durationSec, rate, busy } = props
  const running = status?.state === 'running'
  const limits = config?.duration ?? { min: 10, max: 60, default: 30 }

  return (
    <div className="grid grid-cols-1 md:grid-cols-3 gap-4 items-end">
      <label className="block text-sm">
        <span className="text-gray-500">Select duration (seconds): {durationSec}</span>
        <input
          type="range"
          className="mt-2 w-full"
          min={limits.min}
          max={limits.max}
          value={durationSec}
          disabled={running}
          onChange={e => props.onDurationChange(Number(e.target.value))}
        />
      </label>
      <label className="block text-sm">
        <span className="text-gray-500">Electricity Rate ($/kWh)</span>
        <input
          type="number"
          className="mt-2 w-full rounded-md border border-gray-300 px-3 py-1.5"
          min={0.01}
          max={1}
          step={0.01}
          value={rate}
          onChange={e => props.onRateChange(e.target.value)}
          onBlur={props.onRateCommit}
          onKeyDown={e => {
            if (e.key === 'Enter') props.onRateCommit()
          }}
        />
      </label>
      <div className="flex items-center gap-2">
        {running ? (
          <button
            onClick={props.onStop}
            disabled={busy}
            className="rounded-md bg-red-600 px-4 py-2 text-sm font-medium text-white disabled:opacity-50"
          >
            Stop Monitoring
          </button>
        ) : (
          <button
            onClick={props.onStart}
            disabled={busy}
            className="rounded-md bg-indigo-600 px-4 py-2 text-sm font-medium text-white disabled:opacity-50"
          >
            Start Monitoring
          </button>
        )}
        <button
          onClick={props.onClear}
          disabled={busy || running}
          className="rounded-md border border-gray-300 px-4 py-2 text-sm disabled:opacity-50"
        >
          Clear
        </button>
        {running && status && config && (
          <span className="text-xs text-gray-500">{formatRemaining(status.ticksDone, status.ticksPlanned, config.tickMs)}</span>
        )}
      </div>
    </div>
  )
}
