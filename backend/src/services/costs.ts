import { DEVICES, type Device } from './devices';
import { roundTo, type SeriesMap } from './powerSimulator';

export const DEFAULT_ENERGY_RATE = 0.12; // $/kWh
export const MIN_ENERGY_RATE = 0.01;
export const MAX_ENERGY_RATE = 1.0;

const HOURS_PER_DAY = 24;
const DAYS_PER_MONTH = 30;
const HOURS_PER_YEAR = 24 * 365;

export type CostEstimate = {
  device: Device;
  meanWatts: number;
  hourly: number;
  daily: number;
  monthly: number;
  annual: number;
};

export type DeviceSummary = {
  device: Device;
  averageWatts: number;
  peakWatts: number;
  annualCost: number;
};

export type UsageSummary = {
  readings: number;
  devices: DeviceSummary[];
};

export class PricingError extends Error {
  readonly code = 'invalid_rate';

  constructor(message: string) {
    super(message);
    this.name = 'PricingError';
  }
}

export function calculateEnergyCost(powerW: number, rate: number, hours = 1): number {
  const kwh = (powerW * hours) / 1000;
  return kwh * rate;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

export function isValidRate(rate: number): boolean {
  return Number.isFinite(rate) && rate >= MIN_ENERGY_RATE && rate <= MAX_ENERGY_RATE;
}

export class EnergyPricing {
  private currentRate: number;

  constructor(rate = DEFAULT_ENERGY_RATE) {
    this.currentRate = EnergyPricing.validate(rate);
  }

  private static validate(rate: number): number {
    if (!isValidRate(rate)) {
      throw new PricingError(`Electricity rate must be between ${MIN_ENERGY_RATE} and ${MAX_ENERGY_RATE} $/kWh`);
    }
    return rate;
  }

  get rate(): number {
    return this.currentRate;
  }

  setRate(rate: number): number {
    this.currentRate = EnergyPricing.validate(rate);
    return this.currentRate;
  }

  // Projections assume the device keeps drawing its mean power around the clock.
  estimateCosts(series: SeriesMap): CostEstimate[] {
    return DEVICES.map((device) => {
      const meanWatts = mean(series[device].map((s) => s.watts));
      const hourly = calculateEnergyCost(meanWatts, this.currentRate);
      return {
        device,
        meanWatts: roundTo(meanWatts, 2),
        hourly: roundTo(hourly, 3),
        daily: roundTo(hourly * HOURS_PER_DAY, 2),
        monthly: roundTo(hourly * HOURS_PER_DAY * DAYS_PER_MONTH, 2),
        annual: roundTo(calculateEnergyCost(meanWatts, this.currentRate, HOURS_PER_YEAR), 2),
      };
    });
  }

  summarize(series: SeriesMap): UsageSummary | null {
    const readings = series.Fridge.length;
    if (readings === 0) return null;

    const devices = DEVICES.map((device) => {
      const watts = series[device].map((s) => s.watts);
      const averageWatts = mean(watts);
      return {
        device,
        averageWatts: roundTo(averageWatts, 2),
        peakWatts: roundTo(Math.max(...watts), 2),
        annualCost: roundTo(calculateEnergyCost(averageWatts, this.currentRate, HOURS_PER_YEAR), 2),
      };
    });
    return { readings, devices };
  }
}
