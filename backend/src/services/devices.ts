import { uniform, type RandomSource } from './random';

export const DEVICES = ['Fridge', 'Air Conditioner', 'Smart Light'] as const;

export type Device = (typeof DEVICES)[number];

export type DeviceProfile = {
  device: Device;
  min: number; // W
  max: number; // W
  draw: (random: RandomSource) => number;
};

const AC_COMPRESSOR_DUTY = 0.45;

export const DEVICE_PROFILES: Record<Device, DeviceProfile> = {
  Fridge: {
    device: 'Fridge',
    min: 90,
    max: 220,
    draw: (random) => uniform(random, 90, 220),
  },
  'Air Conditioner': {
    device: 'Air Conditioner',
    min: 150,
    max: 2000,
    // compressor kicks in intermittently; otherwise only the fan runs
    draw: (random) =>
      random() < AC_COMPRESSOR_DUTY ? uniform(random, 1200, 2000) : uniform(random, 150, 400),
  },
  'Smart Light': {
    device: 'Smart Light',
    min: 6,
    max: 12,
    draw: (random) => uniform(random, 6, 12),
  },
};

export function isDevice(value: unknown): value is Device {
  return typeof value === 'string' && DEVICES.some((device) => device === value);
}

export function mapDevices<T>(fn: (device: Device) => T): Record<Device, T> {
  return {
    Fridge: fn('Fridge'),
    'Air Conditioner': fn('Air Conditioner'),
    'Smart Light': fn('Smart Light'),
  };
}
