import 'dotenv/config';
import http from 'http';
import { WebSocketServer } from 'ws';
import { createApp } from './app';
import { ConfigError, loadConfig, type AppConfig } from './config';
import { EnergyPricing } from './services/costs';
import { MonitoringSession } from './services/monitoring';
import { createPowerSimulator } from './services/powerSimulator';
import { createRandom } from './services/random';
import { StreamHub, connectStream, snapshotMessage } from './stream';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Invalid configuration: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const simulator = createPowerSimulator({
  random: createRandom(config.seed),
  maxReadings: config.maxReadings,
});
const monitoring = new MonitoringSession(simulator, config.tickMs);
const pricing = new EnergyPricing(config.energyRate);
const hub = new StreamHub();
const sources = { simulator, monitoring, pricing };

const app = createApp({ ...sources, config, hub });
const server = http.createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', (ws) => {
  hub.add(ws);
  hub.send(ws, snapshotMessage(sources));
  ws.on('close', () => hub.remove(ws));
});

connectStream(hub, sources);

monitoring.onComplete((status) => {
  console.log(`Monitoring complete: ${status.ticksDone} readings per device`);
});

function shutdown() {
  monitoring.stop();
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

server.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`Backend listening on http://localhost:${config.port}`);
});
