export function formatWatts(value: number | null | undefined, decimals = 1): string {
  if (value === null || value === undefined || isNaN(value)) {
    return 'N/A'
  }
  return `${value.toFixed(decimals)} W`
}

export function formatCurrency(value: number, decimals = 2): string {
  return `$${value.toFixed(decimals)}`
}

export function formatRemaining(ticksDone: number, ticksPlanned: number, tickMs: number): string {
  const seconds = Math.max(0, Math.ceil(((ticksPlanned - ticksDone) * tickMs) / 1000))
  return `${seconds}s left`
}

export const MIN_ENERGY_RATE = 0.01
export const MAX_ENERGY_RATE = 1

/** Rate typed into the rate box, or null when it is not a usable $/kWh value. */
export function parseEnergyRate(value: string): number | null {
  if (value.trim() === '') return null
  const rate = Number(value)
  if (!Number.isFinite(rate) || rate < MIN_ENERGY_RATE || rate > MAX_ENERGY_RATE) return null
  return rate
}
