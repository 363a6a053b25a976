import { setTimeout as delay } from 'node:timers/promises';
import type { PollerSettings } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import type { Device } from '../types/device.js';
import type { FetchResult, PollResult, TelemetryClient } from '../types/telemetry.js';
import { normalizeStatus } from './normalizer.js';
import type { DeviceRegistry, RegistryEvent } from './registry.js';
import { createRing, type Ring } from './ring.js';
import { SessionMachine, type MachineState, type SessionTransition } from './session.js';
import type { TelemetryStore } from './store.js';

export type Clock = {
  now: () => number;
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  },
};

export type AgePoint = { at: number; ageMs: number | null };

export type DeviceRuntime = {
  deviceId: string;
  name: string;
  intervalMs: number;
  state: MachineState;
  currentSessionId: string | null;
  consecutiveFailures: number;
  failureAlert: boolean;
  lastPollAt: number | null;
  lastSuccessAt: number | null;
  lastSampleAt: number | null;
  lastError: string | null;
  loopAlive: boolean;
};

export type DeviceRuntimeSnapshot = Readonly<DeviceRuntime> & {
  ageHistory: AgePoint[];
};

type DeviceLoop = {
  device: Device;
  abort: AbortController;
  machine: SessionMachine;
  runtime: DeviceRuntime;
  history: Ring<AgePoint>;
  done: Promise<void>;
};

// Everything that lives between start() and stop(); a new one per start.
type PollerContext = {
  startedAt: number;
  loops: Map<string, DeviceLoop>;
  stopping: Map<string, Promise<void>>;
  unsubscribe: () => void;
};

export type PollerOptions = {
  registry: DeviceRegistry;
  client: TelemetryClient;
  store: TelemetryStore;
  settings: PollerSettings;
  historyWindowMs?: number;
  clock?: Clock;
  logger?: Logger;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function within<T>(p: Promise<T>, ms: number): Promise<T | 'timeout'> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs one polling loop per enabled device. Loops share nothing but the store:
 * a slow or failing device never delays another device's ticks.
 */
export class PollerScheduler {
  private ctx: PollerContext | null = null;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly historyWindowMs: number;

  constructor(private readonly opts: PollerOptions) {
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('poller');
    this.historyWindowMs = opts.historyWindowMs ?? 120_000;
  }

  isRunning(): boolean {
    return this.ctx !== null;
  }

  startedAt(): number | null {
    return this.ctx?.startedAt ?? null;
  }

  start(): void {
    if (this.ctx) return;
    const ctx: PollerContext = {
      startedAt: this.clock.now(),
      loops: new Map(),
      stopping: new Map(),
      unsubscribe: () => {},
    };
    this.ctx = ctx;
    ctx.unsubscribe = this.opts.registry.subscribe((event) => this.onRegistryEvent(ctx, event));
    const devices = this.opts.registry.enabled();
    for (const device of devices) this.startLoop(ctx, device);
    this.log.info(`started with ${devices.length} device(s)`);
  }

  /**
   * Cancels every loop, waits for them (bounded by the shutdown timeout) and
   * closes open sessions with reason `shutdown`.
   */
  async stop(): Promise<void> {
    const ctx = this.ctx;
    if (!ctx) return;
    this.ctx = null;
    ctx.unsubscribe();
    const ids = [...ctx.loops.keys()];
    await Promise.all(ids.map((id) => this.stopLoop(ctx, id)));
    await Promise.all(ctx.stopping.values());
    this.log.info(`stopped ${ids.length} loop(s)`);
  }

  runtimes(): DeviceRuntimeSnapshot[] {
    if (!this.ctx) return [];
    return [...this.ctx.loops.values()].map((loop) => ({ ...loop.runtime, ageHistory: loop.history.all() }));
  }

  loopsAlive(): boolean {
    if (!this.ctx) return false;
    for (const loop of this.ctx.loops.values()) {
      if (!loop.runtime.loopAlive) return false;
    }
    return true;
  }

  private onRegistryEvent(ctx: PollerContext, event: RegistryEvent) {
    switch (event.type) {
      case 'added':
        if (event.device.enabled) this.startLoop(ctx, event.device);
        break;
      case 'removed':
        this.stopLoop(ctx, event.deviceId).catch((err) => this.log.error(`stop ${event.deviceId} failed`, err));
        break;
      case 'updated': {
        const { device } = event;
        this.stopLoop(ctx, device.id)
          .then(() => {
            if (device.enabled && this.ctx === ctx) this.startLoop(ctx, device);
          })
          .catch((err) => this.log.error(`restart ${device.id} failed`, err));
        break;
      }
    }
  }

  private startLoop(ctx: PollerContext, device: Device) {
    if (ctx.loops.has(device.id)) return;
    const threshold = device.silenceThreshold ?? this.opts.settings.silenceThreshold;
    const loop: DeviceLoop = {
      device,
      abort: new AbortController(),
      machine: new SessionMachine(this.opts.store, { id: device.id, name: device.name }, threshold),
      runtime: {
        deviceId: device.id,
        name: device.name,
        intervalMs: device.intervalMs,
        state: 'idle',
        currentSessionId: null,
        consecutiveFailures: 0,
        failureAlert: false,
        lastPollAt: null,
        lastSuccessAt: null,
        lastSampleAt: null,
        lastError: null,
        loopAlive: true,
      },
      history: createRing<AgePoint>(Math.ceil(this.historyWindowMs / device.intervalMs) + 5),
      done: Promise.resolve(),
    };
    ctx.loops.set(device.id, loop);
    // a previous loop for the same device may still be closing its session
    const previous = ctx.stopping.get(device.id);
    loop.done = this.run(loop, previous).catch((err) => {
      loop.runtime.loopAlive = false;
      this.log.error(`loop for ${device.id} died`, err);
    });
    this.log.debug(`loop started for ${device.id} every ${device.intervalMs}ms`);
  }

  private async stopLoop(ctx: PollerContext, deviceId: string): Promise<void> {
    const loop = ctx.loops.get(deviceId);
    if (!loop) return;
    ctx.loops.delete(deviceId);
    loop.abort.abort();
    const stopping = this.finish(loop).finally(() => {
      if (ctx.stopping.get(deviceId) === stopping) ctx.stopping.delete(deviceId);
    });
    ctx.stopping.set(deviceId, stopping);
    await stopping;
  }

  private async finish(loop: DeviceLoop): Promise<void> {
    const id = loop.device.id;
    const outcome = await within(loop.done, this.opts.settings.shutdownTimeoutMs);
    if (outcome === 'timeout') {
      this.log.warn(`loop for ${id} did not exit within ${this.opts.settings.shutdownTimeoutMs}ms`);
    }
    try {
      const closed = loop.machine.shutdown();
      if (closed) this.log.info(`${id}: session ${closed.id} closed (shutdown)`);
    } catch (err) {
      this.log.error(`${id}: could not close session on shutdown`, err);
    }
    this.syncRuntime(loop);
  }

  private async run(loop: DeviceLoop, after?: Promise<void>): Promise<void> {
    if (after) await after;
    const { signal } = loop.abort;
    while (!signal.aborted) {
      const tickStart = this.clock.now();
      try {
        await this.cycle(loop, tickStart);
      } catch (err) {
        this.log.error(`${loop.device.id}: cycle failed`, err);
      }
      if (signal.aborted) break;
      const wait = Math.max(0, loop.device.intervalMs - (this.clock.now() - tickStart));
      await this.clock.sleep(wait, signal);
    }
  }

  private async cycle(loop: DeviceLoop, ts: number): Promise<void> {
    const { device, runtime } = loop;
    runtime.lastPollAt = ts;
    const fetched = await this.fetchWithDeadline(loop);
    if (loop.abort.signal.aborted) return;

    const result = this.toPollResult(device, fetched, ts);
    this.track(loop, result);
    try {
      this.report(loop, loop.machine.handle(result));
    } catch (err) {
      this.log.error(`${device.id}: session update rejected`, err);
    } finally {
      this.syncRuntime(loop);
      const last = runtime.lastSampleAt;
      loop.history.push({ at: ts, ageMs: last === null ? null : Math.max(0, ts - last) });
    }
  }

  private fetchWithDeadline(loop: DeviceLoop): Promise<FetchResult> {
    const timeoutMs = Math.max(1, Math.min(this.opts.settings.fetchTimeoutMs, loop.device.intervalMs - 1));
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = AbortSignal.any([loop.abort.signal, timeout]);
    // the race keeps a client that ignores its signal from holding the loop
    const deadline = new Promise<FetchResult>((resolve) => {
      const onAbort = () =>
        resolve(
          timeout.aborted
            ? { ok: false, kind: 'timeout', message: `no response within ${timeoutMs}ms` }
            : { ok: false, kind: 'unreachable', message: 'cancelled' }
        );
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    });
    const call = this.opts.client
      .fetch(loop.device, { signal, timeoutMs })
      .catch((err: unknown): FetchResult => ({ ok: false, kind: 'unreachable', message: errorMessage(err) }));
    return Promise.race([call, deadline]);
  }

  private toPollResult(device: Device, fetched: FetchResult, ts: number): PollResult {
    if (!fetched.ok) {
      return {
        kind: 'unreachable',
        deviceId: device.id,
        ts,
        cause: fetched.kind,
        message: fetched.message,
        partial: null,
      };
    }
    const normalized = normalizeStatus(device.id, fetched.payload, ts);
    if (!normalized.ok) {
      return {
        kind: 'unreachable',
        deviceId: device.id,
        ts,
        cause: 'parse-error',
        message: `${normalized.error.code}: ${normalized.error.message}`,
        partial: normalized.partial,
      };
    }
    return {
      kind: 'status',
      deviceId: device.id,
      ts,
      status: normalized.status,
      source: normalized.source,
      sample: normalized.sample,
    };
  }

  private track(loop: DeviceLoop, result: PollResult) {
    const { runtime } = loop;
    const id = loop.device.id;
    if (result.kind === 'status') {
      if (runtime.consecutiveFailures > 0) {
        this.log.info(`${id}: reachable again after ${runtime.consecutiveFailures} failed poll(s)`);
      }
      runtime.consecutiveFailures = 0;
      runtime.failureAlert = false;
      runtime.lastSuccessAt = result.ts;
      runtime.lastSampleAt = result.sample.ts;
      runtime.lastError = null;
      return;
    }

    runtime.consecutiveFailures += 1;
    runtime.lastError = `${result.cause}: ${result.message}`;
    if (result.cause === 'parse-error') {
      this.log.warn(`${id}: payload rejected (${result.message})`);
    } else if (runtime.consecutiveFailures === 1) {
      this.log.warn(`${id}: poll failed (${runtime.lastError})`);
    } else {
      this.log.debug(`${id}: poll failed x${runtime.consecutiveFailures} (${runtime.lastError})`);
    }
    if (!runtime.failureAlert && runtime.consecutiveFailures >= this.opts.settings.failureAlertThreshold) {
      runtime.failureAlert = true;
      this.log.warn(`${id}: ${runtime.consecutiveFailures} consecutive failed polls`);
    }
  }

  private report(loop: DeviceLoop, t: SessionTransition) {
    const id = loop.device.id;
    switch (t.type) {
      case 'opened':
        this.log.info(`${id}: session ${t.session.id} opened at ${t.session.startedAt}`);
        break;
      case 'closed':
        this.log.info(`${id}: session ${t.session.id} closed (${t.session.closeReason}) at ${t.session.endedAt}`);
        break;
      case 'missed':
        this.log.debug(`${id}: live session missed ${t.misses} poll(s)`);
        break;
      default:
        break;
    }
  }

  private syncRuntime(loop: DeviceLoop) {
    const m = loop.machine.snapshot();
    loop.runtime.state = m.state;
    loop.runtime.currentSessionId = m.sessionId;
  }
}
