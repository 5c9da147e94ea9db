import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from './app';
import type { AppConfig } from './config';
import { EnergyPricing } from './services/costs';
import { MonitoringSession } from './services/monitoring';
import { createPowerSimulator, type PowerSimulator } from './services/powerSimulator';
import { createRandom } from './services/random';
import { StreamHub } from './stream';

const config: AppConfig = {
  port: 0,
  tickMs: 1000,
  maxReadings: 100,
  energyRate: 0.12,
  defaultDurationSec: 30,
};

describe('dashboard api', () => {
  let server: Server;
  let baseUrl: string;
  let simulator: PowerSimulator;
  let monitoring: MonitoringSession;
  let hub: StreamHub;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    simulator = createPowerSimulator({ random: createRandom(21), maxReadings: config.maxReadings });
    monitoring = new MonitoringSession(simulator, config.tickMs);
    hub = new StreamHub();
    const app = createApp({ config, simulator, monitoring, pricing: new EnergyPricing(config.energyRate), hub });

    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    monitoring.stop();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  function send(method: string, path: string, body?: unknown) {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const res = await send('GET', '/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('describes the devices, rate and duration limits', async () => {
    const res = await send('GET', '/api/config');
    expect(await res.json()).toEqual({
      tickMs: 1000,
      maxReadings: 100,
      energyRate: 0.12,
      duration: { min: 10, max: 60, default: 30 },
      devices: [
        { device: 'Fridge', min: 90, max: 220 },
        { device: 'Air Conditioner', min: 150, max: 2000 },
        { device: 'Smart Light', min: 6, max: 12 },
      ],
    });
  });

  it('updates the electricity rate and broadcasts new costs', async () => {
    const broadcast = vi.spyOn(hub, 'broadcast');

    const res = await send('PUT', '/api/config/rate', { rate: 0.25 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ energyRate: 0.25 });
    expect(broadcast).toHaveBeenCalledWith(expect.objectContaining({ type: 'costs' }));

    const costs = await (await send('GET', '/api/costs')).json();
    expect(costs.energyRate).toBe(0.25);
  });

  it('rejects an out-of-range or missing rate', async () => {
    const tooHigh = await send('PUT', '/api/config/rate', { rate: 3 });
    expect(tooHigh.status).toBe(400);
    expect(await tooHigh.json()).toEqual({ error: 'Electricity rate must be between 0.01 and 1 $/kWh' });

    const missing = await send('PUT', '/api/config/rate', {});
    expect(missing.status).toBe(400);
  });

  it('serves the current series snapshot', async () => {
    simulator.tick();
    simulator.tick();
    simulator.tick();

    const snap = await (await send('GET', '/api/series')).json();
    expect(snap.tick).toBe(3);
    expect(snap.series.Fridge).toHaveLength(3);
    expect(snap.series['Air Conditioner']).toHaveLength(3);
    expect(snap.series['Smart Light']).toHaveLength(3);
    expect(snap.labels).toHaveLength(3);
  });

  it('answers a malformed JSON body with a JSON error', async () => {
    const res = await fetch(`${baseUrl}/api/config/rate`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: '{"rate":',
    });

    expect(res.status).toBe(400);
    expect(res.headers.get('content-type')).toContain('application/json');
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });

    const costs = await (await send('GET', '/api/costs')).json();
    expect(costs.energyRate).toBe(0.12);
  });

  it('serves one device series by name', async () => {
    simulator.tick();
    simulator.tick();
    const { series } = simulator.snapshot();

    const res = await send('GET', '/api/series/Air%20Conditioner');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ device: 'Air Conditioner', samples: series['Air Conditioner'] });
  });

  it('rejects an unknown device name', async () => {
    const res = await send('GET', '/api/series/Toaster');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown device: Toaster' });
  });

  it('has no summary until readings exist', async () => {
    const empty = await send('GET', '/api/summary');
    expect(empty.status).toBe(404);
    expect(await empty.json()).toEqual({ error: 'No readings yet' });

    simulator.tick();
    const res = await send('GET', '/api/summary');
    expect(res.status).toBe(200);
    expect((await res.json()).readings).toBe(1);
  });

  it('starts and stops a monitoring session', async () => {
    const started = await send('POST', '/api/monitoring/start', { durationSec: 20 });
    expect(started.status).toBe(202);
    expect(await started.json()).toMatchObject({ state: 'running', durationSec: 20, ticksDone: 1, ticksPlanned: 20 });

    const status = await (await send('GET', '/api/monitoring')).json();
    expect(status.state).toBe('running');

    const stopped = await send('POST', '/api/monitoring/stop');
    expect((await stopped.json()).state).toBe('stopped');
  });

  it('falls back to the configured default duration', async () => {
    const res = await send('POST', '/api/monitoring/start');
    expect(await res.json()).toMatchObject({ durationSec: 30, ticksPlanned: 30 });
  });

  it('rejects invalid durations and overlapping sessions', async () => {
    const invalid = await send('POST', '/api/monitoring/start', { durationSec: 5 });
    expect(invalid.status).toBe(400);

    await send('POST', '/api/monitoring/start', { durationSec: 10 });
    const overlap = await send('POST', '/api/monitoring/start', { durationSec: 10 });
    expect(overlap.status).toBe(409);
    expect(await overlap.json()).toEqual({ error: 'A monitoring session is already running' });
  });

  it('clears readings only while stopped', async () => {
    await send('POST', '/api/monitoring/start', { durationSec: 10 });
    const busy = await send('DELETE', '/api/series');
    expect(busy.status).toBe(409);

    await send('POST', '/api/monitoring/stop');
    const cleared = await send('DELETE', '/api/series');
    expect(cleared.status).toBe(204);
    expect(simulator.size()).toBe(0);
  });
});
