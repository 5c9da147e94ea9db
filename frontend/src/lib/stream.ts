import type {
  CostEstimate,
  MonitoringStatus,
  PowerReading,
  SeriesSnapshot,
  ServerMessage,
  UsageSummary,
} from '../types'

export const MAX_CHART_POINTS = 100

export type ChartRow = {
  tick: number
  time: string
  Fridge: number
  'Air Conditioner': number
  'Smart Light': number
}

export type StreamState = {
  rows: ChartRow[]
  costs: CostEstimate[]
  energyRate: number | null
  status: MonitoringStatus | null
  summary: UsageSummary | null
}

export const initialStreamState: StreamState = {
  rows: [],
  costs: [],
  energyRate: null,
  status: null,
  summary: null,
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStatus(value: unknown): boolean {
  return isRecord(value) && (value.state === 'running' || value.state === 'stopped')
}

/** Checks the envelope and the parts of `data` the reducer reads. */
export function isServerMessage(value: unknown): value is ServerMessage {
  if (!isRecord(value)) return false
  const { type, data } = value
  if (!isRecord(data)) return false

  switch (type) {
    case 'snapshot': {
      const { series, status, energyRate, costs } = data
      return (
        isRecord(series) &&
        Array.isArray(series.labels) &&
        isRecord(series.series) &&
        isStatus(status) &&
        typeof energyRate === 'number' &&
        Array.isArray(costs)
      )
    }
    case 'reading': {
      const { reading, costs } = data
      return isRecord(reading) && isRecord(reading.watts) && Array.isArray(costs)
    }
    case 'costs':
      return typeof data.energyRate === 'number' && Array.isArray(data.costs)
    case 'status':
      return isStatus(data)
    case 'complete':
      return isStatus(data.status) && (data.summary === null || isRecord(data.summary))
    default:
      return false
  }
}

export function parseServerMessage(raw: string): ServerMessage | null {
  let msg: unknown
  try {
    msg = JSON.parse(raw)
  } catch (err) {
    console.error('Discarding malformed stream message:', err)
    return null
  }
  return isServerMessage(msg) ? msg : null
}

export function rowFromReading(reading: PowerReading): ChartRow {
  return {
    tick: reading.tick,
    time: reading.time,
    Fridge: reading.watts.Fridge,
    'Air Conditioner': reading.watts['Air Conditioner'],
    'Smart Light': reading.watts['Smart Light'],
  }
}

export function rowsFromSnapshot(snapshot: SeriesSnapshot): ChartRow[] {
  const { series, labels } = snapshot
  const firstTick = snapshot.tick - labels.length + 1
  return labels.map((time, i) => ({
    tick: firstTick + i,
    time,
    Fridge: series.Fridge[i].watts,
    'Air Conditioner': series['Air Conditioner'][i].watts,
    'Smart Light': series['Smart Light'][i].watts,
  }))
}

function keepLast<T>(items: T[], max: number): T[] {
  return items.length > max ? items.slice(items.length - max) : items
}

export function applyMessage(state: StreamState, msg: ServerMessage, maxPoints = MAX_CHART_POINTS): StreamState {
  switch (msg.type) {
    case 'snapshot':
      return {
        rows: keepLast(rowsFromSnapshot(msg.data.series), maxPoints),
        costs: msg.data.costs,
        energyRate: msg.data.energyRate,
        status: msg.data.status,
        summary: null,
      }
    case 'reading':
      return {
        ...state,
        rows: keepLast([...state.rows, rowFromReading(msg.data.reading)], maxPoints),
        costs: msg.data.costs,
      }
    case 'costs':
      return { ...state, costs: msg.data.costs, energyRate: msg.data.energyRate }
    case 'status': {
      // a fresh run hides the previous run's summary
      const restarted = msg.data.state === 'running' && state.status?.state !== 'running'
      return { ...state, status: msg.data, summary: restarted ? null : state.summary }
    }
    case 'complete':
      return { ...state, status: msg.data.status, summary: msg.data.summary }
  }
}
