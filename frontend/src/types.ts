export const DEVICES = ['Fridge', 'Air Conditioner', 'Smart Light'] as const

export type Device = (typeof DEVICES)[number]

export type Sample = { timestamp: number; watts: number }

export type PowerReading = {
  tick: number
  timestamp: number
  time: string
  watts: Record<Device, number>
}

export type SeriesSnapshot = {
  tick: number
  maxReadings: number
  timestamps: number[]
  labels: string[]
  series: Record<Device, Sample[]>
}

export type CostEstimate = {
  device: Device
  meanWatts: number
  hourly: number
  daily: number
  monthly: number
  annual: number
}

export type UsageSummary = {
  readings: number
  devices: Array<{ device: Device; averageWatts: number; peakWatts: number; annualCost: number }>
}

export type MonitoringStatus = {
  state: 'running' | 'stopped'
  startedAt: number | null
  durationSec: number | null
  ticksDone: number
  ticksPlanned: number
}

export type DashboardConfig = {
  tickMs: number
  maxReadings: number
  energyRate: number
  duration: { min: number; max: number; default: number }
  devices: Array<{ device: Device; min: number; max: number }>
}

export type ServerMessage =
  | { type: 'snapshot'; data: { series: SeriesSnapshot; status: MonitoringStatus; energyRate: number; costs: CostEstimate[] } }
  | { type: 'reading'; data: { reading: PowerReading; costs: CostEstimate[] } }
  | { type: 'costs'; data: { energyRate: number; costs: CostEstimate[] } }
  | { type: 'status'; data: MonitoringStatus }
  | { type: 'complete'; data: { status: MonitoringStatus; summary: UsageSummary | null } }

export const DEVICE_COLORS: Record<Device, string> = {
  Fridge: '#0ea5e9',
  'Air Conditioner': '#f97316',
  'Smart Light': '#22c55e',
}
