import type { AgePoint, PollerScheduler } from './poller.js';
import type { TelemetryStore } from './store.js';

export type DeviceHealth = {
  deviceId: string;
  name: string;
  state: 'idle' | 'live';
  currentSessionId: string | null;
  consecutiveFailures: number;
  failureAlert: boolean;
  lastPollAgeMs: number | null;
  lastSuccessAgeMs: number | null;
  lastSampleAgeMs: number | null;
  lastError: string | null;
  ageHistory: AgePoint[];
};

export type HealthSnapshot = {
  generatedAt: number;
  poller: {
    running: boolean;
    loopsAlive: boolean;
    startedAt: number | null;
    devices: number;
  };
  openSessions: number;
  liveDevices: number;
  devices: DeviceHealth[];
};

function age(now: number, at: number | null): number | null {
  return at === null ? null : Math.max(0, now - at);
}

/** Read-only view over the poller and the store, rebuilt on every call. */
export class HealthAggregator {
  constructor(
    private readonly poller: PollerScheduler,
    private readonly store: TelemetryStore,
    private readonly now: () => number = Date.now
  ) {}

  snapshot(): HealthSnapshot {
    const now = this.now();
    const devices = this.poller.runtimes().map(
      (r): DeviceHealth => ({
        deviceId: r.deviceId,
        name: r.name,
        state: r.state,
        currentSessionId: r.currentSessionId,
        consecutiveFailures: r.consecutiveFailures,
        failureAlert: r.failureAlert,
        lastPollAgeMs: age(now, r.lastPollAt),
        lastSuccessAgeMs: age(now, r.lastSuccessAt),
        lastSampleAgeMs: age(now, r.lastSampleAt),
        lastError: r.lastError,
        ageHistory: r.ageHistory,
      })
    );
    return {
      generatedAt: now,
      poller: {
        running: this.poller.isRunning(),
        loopsAlive: this.poller.loopsAlive(),
        startedAt: this.poller.startedAt(),
        devices: devices.length,
      },
      openSessions: this.store.openCount(),
      liveDevices: devices.filter((d) => d.state === 'live').length,
      devices,
    };
  }
}
