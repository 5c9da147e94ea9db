import { DEVICES, DEVICE_PROFILES, mapDevices, type Device, type DeviceProfile } from './devices';
import type { RandomSource } from './random';

export type Sample = {
  timestamp: number;
  watts: number;
};

export type SeriesMap = Record<Device, Sample[]>;

export type PowerReading = {
  tick: number;
  timestamp: number;
  time: string; // HH:mm:ss, local clock
  watts: Record<Device, number>;
};

export type SeriesSnapshot = {
  tick: number;
  maxReadings: number; // 0 = unbounded
  timestamps: number[];
  labels: string[];
  series: SeriesMap;
};

export type ReadingListener = (reading: PowerReading) => void;

export type PowerSimulatorOptions = {
  random?: RandomSource;
  now?: () => number;
  maxReadings?: number;
  profiles?: Record<Device, DeviceProfile>;
};

export type PowerSimulator = {
  tick: () => PowerReading;
  snapshot: () => SeriesSnapshot;
  latest: () => PowerReading | null;
  size: () => number;
  tickCount: () => number;
  reset: () => void;
  onReading: (listener: ReadingListener) => () => void;
};

export const DEFAULT_MAX_READINGS = 100;

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function pad(n: number) {
  return n.toString().padStart(2, '0');
}

export function formatClock(timestamp: number): string {
  const d = new Date(timestamp);
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/**
 * Owns the per-device power series. Every tick appends exactly one sample to
 * each device, so all series always share the same length. With a positive
 * `maxReadings` the oldest samples are dropped from every series together.
 */
export function createPowerSimulator(options: PowerSimulatorOptions = {}): PowerSimulator {
  const random = options.random ?? Math.random;
  const now = options.now ?? Date.now;
  const profiles = options.profiles ?? DEVICE_PROFILES;
  const maxReadings = Math.max(0, Math.floor(options.maxReadings ?? DEFAULT_MAX_READINGS));

  let series: SeriesMap = mapDevices<Sample[]>(() => []);
  let ticks = 0;
  let last: PowerReading | null = null;

  const listeners = new Set<ReadingListener>();
  function emit(reading: PowerReading) {
    for (const l of listeners) {
      try {
        l(reading);
      } catch (err) {
        console.error('Reading listener failed:', err);
      }
    }
  }

  function trim() {
    if (maxReadings === 0) return;
    const excess = series.Fridge.length - maxReadings;
    if (excess <= 0) return;
    for (const device of DEVICES) series[device].splice(0, excess);
  }

  return {
    tick() {
      const timestamp = now();
      const watts = mapDevices((device) => roundTo(profiles[device].draw(random), 2));
      for (const device of DEVICES) {
        series[device].push({ timestamp, watts: watts[device] });
      }
      trim();

      ticks += 1;
      const reading: PowerReading = { tick: ticks, timestamp, time: formatClock(timestamp), watts };
      last = reading;
      emit(reading);
      return reading;
    },

    snapshot() {
      const copy = mapDevices((device) => series[device].map((s) => ({ ...s })));
      const timestamps = copy.Fridge.map((s) => s.timestamp);
      return {
        tick: ticks,
        maxReadings,
        timestamps,
        labels: timestamps.map(formatClock),
        series: copy,
      };
    },

    latest() {
      return last;
    },

    size() {
      return series.Fridge.length;
    },

    tickCount() {
      return ticks;
    },

    reset() {
      series = mapDevices<Sample[]>(() => []);
      ticks = 0;
      last = null;
    },

    onReading(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
