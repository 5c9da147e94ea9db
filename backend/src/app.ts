import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { DEVICES, DEVICE_PROFILES, isDevice } from './services/devices';
import { PricingError } from './services/costs';
import { MAX_DURATION_SEC, MIN_DURATION_SEC, MonitoringError } from './services/monitoring';
import { costsMessage, snapshotMessage, type StreamHub, type StreamSources } from './stream';

export type AppDeps = StreamSources & {
  config: AppConfig;
  hub: StreamHub;
};

function field(body: unknown, key: 'rate' | 'durationSec'): unknown {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  return Object.getOwnPropertyDescriptor(body, key)?.value;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

function sendError(res: Response, err: unknown) {
  if (err instanceof MonitoringError) {
    return res.status(err.code === 'already_running' ? 409 : 400).json({ error: err.message });
  }
  if (err instanceof PricingError) {
    return res.status(400).json({ error: err.message });
  }
  console.error('Request failed:', err);
  return res.status(500).json({ error: 'Internal server error' });
}

export function createApp(deps: AppDeps) {
  const { config, simulator, monitoring, pricing, hub } = deps;

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => res.json({ status: 'ok' }));

  app.get('/api/config', (_req, res) => {
    res.json({
      tickMs: config.tickMs,
      maxReadings: config.maxReadings,
      energyRate: pricing.rate,
      duration: { min: MIN_DURATION_SEC, max: MAX_DURATION_SEC, default: config.defaultDurationSec },
      devices: DEVICES.map((device) => ({
        device,
        min: DEVICE_PROFILES[device].min,
        max: DEVICE_PROFILES[device].max,
      })),
    });
  });

  app.put('/api/config/rate', (req, res) => {
    try {
      const energyRate = pricing.setRate(toNumber(field(req.body, 'rate')));
      hub.broadcast(costsMessage(deps));
      res.json({ energyRate });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/series', (_req, res) => res.json(simulator.snapshot()));

  app.get('/api/series/:device', (req, res) => {
    const { device } = req.params;
    if (!isDevice(device)) return res.status(404).json({ error: `Unknown device: ${device}` });
    return res.json({ device, samples: simulator.snapshot().series[device] });
  });

  app.delete('/api/series', (_req, res) => {
    if (monitoring.running) {
      return res.status(409).json({ error: 'Stop monitoring before clearing readings' });
    }
    simulator.reset();
    hub.broadcast(snapshotMessage(deps));
    return res.status(204).end();
  });

  app.get('/api/costs', (_req, res) => {
    res.json({ energyRate: pricing.rate, costs: pricing.estimateCosts(simulator.snapshot().series) });
  });

  app.get('/api/summary', (_req, res) => {
    const summary = pricing.summarize(simulator.snapshot().series);
    if (!summary) return res.status(404).json({ error: 'No readings yet' });
    return res.json(summary);
  });

  app.get('/api/monitoring', (_req, res) => res.json(monitoring.status()));

  app.post('/api/monitoring/start', (req, res) => {
    try {
      const raw = field(req.body, 'durationSec');
      const durationSec = raw === undefined ? config.defaultDurationSec : toNumber(raw);
      const status = monitoring.start(durationSec);
      console.log(`Monitoring started for ${durationSec}s`);
      res.status(202).json(status);
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/monitoring/stop', (_req, res) => {
    const wasRunning = monitoring.running;
    const status = monitoring.stop();
    if (wasRunning) console.log(`Monitoring stopped after ${status.ticksDone} ticks`);
    res.json(status);
  });

  // Errors raised before a route runs, such as a malformed JSON body.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    sendError(res, err);
  });

  return app;
}
