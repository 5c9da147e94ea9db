import type { PowerReading, PowerSimulator } from './powerSimulator';

export const MIN_DURATION_SEC = 10;
export const MAX_DURATION_SEC = 60;
export const DEFAULT_DURATION_SEC = 30;

export type MonitoringState = 'running' | 'stopped';

export type MonitoringStatus = {
  state: MonitoringState;
  startedAt: number | null;
  durationSec: number | null;
  ticksDone: number;
  ticksPlanned: number;
};

export type MonitoringErrorCode = 'invalid_duration' | 'already_running';

export class MonitoringError extends Error {
  constructor(
    readonly code: MonitoringErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MonitoringError';
  }
}

export function isValidDuration(durationSec: number): boolean {
  return Number.isInteger(durationSec) && durationSec >= MIN_DURATION_SEC && durationSec <= MAX_DURATION_SEC;
}

type Listener<T> = (value: T) => void;

/**
 * Drives the simulator from a single interval timer for a bounded run.
 * The first tick fires as soon as the session starts, then one per `tickMs`.
 */
export class MonitoringSession {
  private timer: ReturnType<typeof setInterval> | null = null;
  private startedAt: number | null = null;
  private durationSec: number | null = null;
  private ticksDone = 0;
  private ticksPlanned = 0;

  private readonly tickListeners = new Set<Listener<PowerReading>>();
  private readonly completeListeners = new Set<Listener<MonitoringStatus>>();
  private readonly stateListeners = new Set<Listener<MonitoringStatus>>();

  constructor(
    private readonly simulator: PowerSimulator,
    private readonly tickMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  status(): MonitoringStatus {
    return {
      state: this.running ? 'running' : 'stopped',
      startedAt: this.startedAt,
      durationSec: this.durationSec,
      ticksDone: this.ticksDone,
      ticksPlanned: this.ticksPlanned,
    };
  }

  start(durationSec: number): MonitoringStatus {
    if (!isValidDuration(durationSec)) {
      throw new MonitoringError(
        'invalid_duration',
        `Duration must be a whole number of seconds between ${MIN_DURATION_SEC} and ${MAX_DURATION_SEC}`,
      );
    }
    if (this.running) {
      throw new MonitoringError('already_running', 'A monitoring session is already running');
    }

    this.startedAt = this.now();
    this.durationSec = durationSec;
    this.ticksDone = 0;
    this.ticksPlanned = Math.ceil((durationSec * 1000) / this.tickMs);
    this.timer = setInterval(() => this.step(), this.tickMs);
    this.notify(this.stateListeners, this.status());

    this.step();
    return this.status();
  }

  stop(): MonitoringStatus {
    if (this.clearTimer()) {
      this.notify(this.stateListeners, this.status());
    }
    return this.status();
  }

  onTick(listener: Listener<PowerReading>): () => void {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  onComplete(listener: Listener<MonitoringStatus>): () => void {
    this.completeListeners.add(listener);
    return () => {
      this.completeListeners.delete(listener);
    };
  }

  onStateChange(listener: Listener<MonitoringStatus>): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  private step() {
    if (!this.running) return;
    let reading: PowerReading;
    try {
      reading = this.simulator.tick();
    } catch (err) {
      console.error('Simulator tick failed, stopping session:', err);
      this.stop();
      return;
    }
    this.ticksDone += 1;
    this.notify(this.tickListeners, reading);

    if (this.ticksDone >= this.ticksPlanned) {
      this.clearTimer();
      const status = this.status();
      this.notify(this.stateListeners, status);
      this.notify(this.completeListeners, status);
    }
  }

  private clearTimer(): boolean {
    if (this.timer === null) return false;
    clearInterval(this.timer);
    this.timer = null;
    return true;
  }

  private notify<T>(listeners: Set<Listener<T>>, value: T) {
    for (const l of listeners) {
      try {
        l(value);
      } catch (err) {
        console.error('Monitoring listener failed:', err);
      }
    }
  }
}
