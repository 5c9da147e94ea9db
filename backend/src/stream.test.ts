import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EnergyPricing } from './services/costs';
import { MonitoringSession } from './services/monitoring';
import { createPowerSimulator } from './services/powerSimulator';
import { createRandom } from './services/random';
import { connectStream, costsMessage, snapshotMessage, StreamHub, type ServerMessage } from './stream';

function fakeSubscriber(readyState = 1) {
  const received: ServerMessage[] = [];
  return {
    readyState,
    received,
    send: vi.fn((msg: string) => {
      received.push(JSON.parse(msg));
    }),
  };
}

function sources() {
  const simulator = createPowerSimulator({ random: createRandom(9) });
  return {
    simulator,
    monitoring: new MonitoringSession(simulator, 1000),
    pricing: new EnergyPricing(0.12),
  };
}

describe('StreamHub', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('broadcasts to open subscribers only', () => {
    const hub = new StreamHub();
    const open = fakeSubscriber();
    const closed = fakeSubscriber(3);
    hub.add(open);
    hub.add(closed);

    hub.broadcast({ type: 'costs', data: { energyRate: 0.12, costs: [] } });

    expect(open.received).toEqual([{ type: 'costs', data: { energyRate: 0.12, costs: [] } }]);
    expect(closed.send).not.toHaveBeenCalled();
  });

  it('keeps delivering when one subscriber fails', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const hub = new StreamHub();
    const broken = {
      readyState: 1,
      send: () => {
        throw new Error('socket reset');
      },
    };
    const healthy = fakeSubscriber();
    hub.add(broken);
    hub.add(healthy);

    hub.broadcast({ type: 'costs', data: { energyRate: 0.5, costs: [] } });

    expect(healthy.received).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('forgets removed subscribers', () => {
    const hub = new StreamHub();
    const sub = fakeSubscriber();
    hub.add(sub);
    hub.remove(sub);

    hub.broadcast({ type: 'costs', data: { energyRate: 0.12, costs: [] } });

    expect(hub.size).toBe(0);
    expect(sub.send).not.toHaveBeenCalled();
  });
});

describe('stream messages', () => {
  it('builds a snapshot of series, status and rate', () => {
    const src = sources();
    src.simulator.tick();

    const msg = snapshotMessage(src);
    expect(msg.type).toBe('snapshot');
    if (msg.type !== 'snapshot') return;
    expect(msg.data.series.series.Fridge).toHaveLength(1);
    expect(msg.data.status.state).toBe('stopped');
    expect(msg.data.energyRate).toBe(0.12);
  });

  it('builds cost estimates at the current rate', () => {
    const src = sources();
    src.pricing.setRate(0.3);

    expect(costsMessage(src)).toEqual({
      type: 'costs',
      data: {
        energyRate: 0.3,
        costs: src.pricing.estimateCosts(src.simulator.snapshot().series),
      },
    });
  });
});

describe('connectStream', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('broadcasts status, readings and completion of a session', () => {
    const src = sources();
    const hub = new StreamHub();
    const sub = fakeSubscriber();
    hub.add(sub);
    connectStream(hub, src);

    src.monitoring.start(10);
    expect(sub.received.map((m) => m.type)).toEqual(['status', 'reading']);

    vi.advanceTimersByTime(9000);

    const types = sub.received.map((m) => m.type);
    expect(types.filter((t) => t === 'reading')).toHaveLength(10);
    expect(types.slice(-2)).toEqual(['status', 'complete']);

    const complete = sub.received[sub.received.length - 1];
    if (complete.type !== 'complete') throw new Error('expected completion message');
    expect(complete.data.status.state).toBe('stopped');
    expect(complete.data.summary?.readings).toBe(10);
  });

  it('attaches up-to-date costs to every reading', () => {
    const src = sources();
    const hub = new StreamHub();
    const sub = fakeSubscriber();
    hub.add(sub);
    connectStream(hub, src);

    src.monitoring.start(10);
    src.monitoring.stop();

    const reading = sub.received.find((m) => m.type === 'reading');
    if (reading?.type !== 'reading') throw new Error('expected a reading');
    expect(reading.data.reading.tick).toBe(1);
    expect(reading.data.costs).toEqual(src.pricing.estimateCosts(src.simulator.snapshot().series));
  });

  it('stops forwarding once disconnected', () => {
    const src = sources();
    const hub = new StreamHub();
    const sub = fakeSubscriber();
    hub.add(sub);
    const disconnect = connectStream(hub, src);
    disconnect();

    src.monitoring.start(10);
    src.monitoring.stop();

    expect(sub.received).toEqual([]);
  });
});
