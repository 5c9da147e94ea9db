import type { CostEstimate, EnergyPricing, UsageSummary } from './services/costs';
import type { MonitoringSession, MonitoringStatus } from './services/monitoring';
import type { PowerReading, PowerSimulator, SeriesSnapshot } from './services/powerSimulator';

export type ServerMessage =
  | {
      type: 'snapshot';
      data: { series: SeriesSnapshot; status: MonitoringStatus; energyRate: number; costs: CostEstimate[] };
    }
  | { type: 'reading'; data: { reading: PowerReading; costs: CostEstimate[] } }
  | { type: 'costs'; data: { energyRate: number; costs: CostEstimate[] } }
  | { type: 'status'; data: MonitoringStatus }
  | { type: 'complete'; data: { status: MonitoringStatus; summary: UsageSummary | null } };

export type Subscriber = {
  readyState: number;
  send: (msg: string) => void;
};

const OPEN = 1; // WebSocket.OPEN

export class StreamHub {
  private readonly subscribers = new Set<Subscriber>();

  get size(): number {
    return this.subscribers.size;
  }

  add(sub: Subscriber) {
    this.subscribers.add(sub);
  }

  remove(sub: Subscriber) {
    this.subscribers.delete(sub);
  }

  send(sub: Subscriber, message: ServerMessage) {
    this.deliver(sub, JSON.stringify(message));
  }

  broadcast(message: ServerMessage) {
    const str = JSON.stringify(message);
    for (const sub of this.subscribers) this.deliver(sub, str);
  }

  private deliver(sub: Subscriber, str: string) {
    if (sub.readyState !== OPEN) return;
    try {
      sub.send(str);
    } catch (err) {
      console.warn('Dropping message for subscriber:', err);
    }
  }
}

export type StreamSources = {
  simulator: PowerSimulator;
  monitoring: MonitoringSession;
  pricing: EnergyPricing;
};

export function snapshotMessage({ simulator, monitoring, pricing }: StreamSources): ServerMessage {
  const series = simulator.snapshot();
  return {
    type: 'snapshot',
    data: {
      series,
      status: monitoring.status(),
      energyRate: pricing.rate,
      costs: pricing.estimateCosts(series.series),
    },
  };
}

export function costsMessage({ simulator, pricing }: StreamSources): ServerMessage {
  return {
    type: 'costs',
    data: { energyRate: pricing.rate, costs: pricing.estimateCosts(simulator.snapshot().series) },
  };
}

/** Forwards every session event to the hub. Returns a function that unhooks it. */
export function connectStream(hub: StreamHub, sources: StreamSources): () => void {
  const { simulator, monitoring, pricing } = sources;
  const unhooks = [
    monitoring.onTick((reading) => {
      const costs = pricing.estimateCosts(simulator.snapshot().series);
      hub.broadcast({ type: 'reading', data: { reading, costs } });
    }),
    monitoring.onStateChange((status) => {
      hub.broadcast({ type: 'status', data: status });
    }),
    monitoring.onComplete((status) => {
      const summary = pricing.summarize(simulator.snapshot().series);
      hub.broadcast({ type: 'complete', data: { status, summary } });
    }),
  ];
  return () => {
    for (const unhook of unhooks) unhook();
  };
}
