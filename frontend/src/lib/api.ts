import type { DashboardConfig, MonitoringStatus } from '../types'

async function send(path: string, init?: RequestInit): Promise<Response> {
  const response = await fetch(path, init)
  if (!response.ok) {
    const body = await response.json().catch(() => null)
    throw new Error(body && typeof body.error === 'string' ? body.error : `Request failed: ${response.status}`)
  }
  return response
}

function jsonBody(body: unknown): RequestInit {
  return { headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) }
}

export async function fetchConfig(): Promise<DashboardConfig> {
  const response = await send('/api/config')
  return response.json()
}

export async function startMonitoring(durationSec: number): Promise<MonitoringStatus> {
  const response = await send('/api/monitoring/start', { method: 'POST', ...jsonBody({ durationSec }) })
  return response.json()
}

export async function stopMonitoring(): Promise<MonitoringStatus> {
  const response = await send('/api/monitoring/stop', { method: 'POST' })
  return response.json()
}

export async function updateEnergyRate(rate: number): Promise<number> {
  const response = await send('/api/config/rate', { method: 'PUT', ...jsonBody({ rate }) })
  const body: { energyRate: number } = await response.json()
  return body.energyRate
}

export async function clearReadings(): Promise<void> {
  await send('/api/series', { method: 'DELETE' })
}
