import { DEFAULT_ENERGY_RATE, isValidRate, MAX_ENERGY_RATE, MIN_ENERGY_RATE } from './services/costs';
import {
  DEFAULT_DURATION_SEC,
  isValidDuration,
  MAX_DURATION_SEC,
  MIN_DURATION_SEC,
} from './services/monitoring';
import { DEFAULT_MAX_READINGS } from './services/powerSimulator';

export type AppConfig = {
  port: number;
  tickMs: number;
  maxReadings: number; // 0 = keep everything
  energyRate: number; // $/kWh
  defaultDurationSec: number;
  seed?: number;
};

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

const MIN_TICK_MS = 50;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(name, `expected a number, got "${raw}"`);
  return value;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value)) throw new ConfigError(name, `expected an integer, got "${env[name]}"`);
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = readInteger(env, 'PORT', 4000);
  if (port < 0 || port > 65535) throw new ConfigError('PORT', 'must be between 0 and 65535');

  const tickMs = readInteger(env, 'TICK_MS', 1000);
  if (tickMs < MIN_TICK_MS) throw new ConfigError('TICK_MS', `must be at least ${MIN_TICK_MS}`);

  const maxReadings = readInteger(env, 'MAX_READINGS', DEFAULT_MAX_READINGS);
  if (maxReadings < 0) throw new ConfigError('MAX_READINGS', 'must be 0 (unbounded) or positive');

  const energyRate = readNumber(env, 'ENERGY_RATE', DEFAULT_ENERGY_RATE);
  if (!isValidRate(energyRate)) {
    throw new ConfigError('ENERGY_RATE', `must be between ${MIN_ENERGY_RATE} and ${MAX_ENERGY_RATE}`);
  }

  const defaultDurationSec = readInteger(env, 'MONITOR_DURATION_SEC', DEFAULT_DURATION_SEC);
  if (!isValidDuration(defaultDurationSec)) {
    throw new ConfigError('MONITOR_DURATION_SEC', `must be between ${MIN_DURATION_SEC} and ${MAX_DURATION_SEC}`);
  }

  const rawSeed = env.SIM_SEED;
  const seed = rawSeed === undefined || rawSeed.trim() === '' ? undefined : readInteger(env, 'SIM_SEED', 0);

  return { port, tickMs, maxReadings, energyRate, defaultDurationSec, seed };
}
