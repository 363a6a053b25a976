import { afterEach, describe, expect, it, vi } from 'vitest';
import type { PollerSettings } from '../../config.js';
import { silentLogger } from '../../logger.js';
import { PollerScheduler, systemClock, type Clock } from '../poller.js';
import { DeviceRegistry } from '../registry.js';
import { StoreError, TelemetryStore } from '../store.js';
import { ScriptedClient, draft, failure, idlePayload, livePayload, ok, virtualClock, type Step } from './fixtures.js';

const settings: PollerSettings = {
  intervalMs: 5000,
  fetchTimeoutMs: 4000,
  silenceThreshold: 3,
  shutdownTimeoutMs: 1000,
  failureAlertThreshold: 2,
};

const running: PollerScheduler[] = [];

type SetupOptions = { clock?: Clock; intervalMs?: number; register?: boolean };

function setup(scripts: Record<string, Step[]>, opts: SetupOptions = {}) {
  const clock = opts.clock ?? virtualClock();
  let n = 0;
  const store = new TelemetryStore({ newId: () => `s${++n}`, now: clock.now, logger: silentLogger });
  const registry = new DeviceRegistry(opts.intervalMs ?? settings.intervalMs);
  if (opts.register !== false) {
    for (const id of Object.keys(scripts)) registry.add({ id, baseUrl: 'http://hub.test:8893' });
  }
  const client = new ScriptedClient(scripts, clock);
  const poller = new PollerScheduler({ registry, client, store, settings, clock, logger: silentLogger });
  running.push(poller);
  return { clock, store, registry, client, poller };
}

const liveAt = (lat: number): Step => ok((now) => livePayload(now, lat));
const idleNow: Step = ok((now) => idlePayload(now));

afterEach(async () => {
  await Promise.all(running.splice(0).map((p) => p.stop()));
});

describe('PollerScheduler', () => {
  it('records a broadcast from the first live poll to the last live sample', async () => {
    const { store, poller } = setup({ 'hub-1': [liveAt(1), liveAt(2), liveAt(3), idleNow] });
    poller.start();

    await vi.waitFor(() => expect(store.getSession('s1')?.endedAt).toBe(10000));
    const session = store.getSession('s1');
    expect(session).toMatchObject({ deviceId: 'hub-1', startedAt: 0, closeReason: 'graceful', sampleCount: 3 });
    const samples = store.slice('s1', 0);
    expect(samples.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(samples.map((s) => s.ts)).toEqual([0, 5000, 10000]);
    expect(samples.map((s) => s.gps?.lat)).toEqual([1, 2, 3]);
    expect(store.listSessions()).toHaveLength(1);
  });

  it('closes on silence and opens a new session when the device returns', async () => {
    const down = failure('timeout', 'no response');
    const { store, poller } = setup({
      'hub-1': [liveAt(1), liveAt(2), liveAt(3), down, down, down, liveAt(4)],
    });
    poller.start();

    await vi.waitFor(() => expect(store.getSession('s2')).not.toBeNull());
    expect(store.getSession('s1')).toMatchObject({ endedAt: 10000, closeReason: 'timeout', sampleCount: 3 });
    expect(store.getSession('s2')).toMatchObject({ startedAt: 30000, endedAt: null, sampleCount: 1 });
    expect(poller.runtimes()[0]).toMatchObject({
      state: 'live',
      currentSessionId: 's2',
      consecutiveFailures: 0,
      lastSampleAt: 30000,
    });

    await poller.stop();
    expect(store.getSession('s2')).toMatchObject({ endedAt: 30000, closeReason: 'shutdown' });
    expect(() => store.append('s2', draft(40000))).toThrow(StoreError);
    expect(poller.runtimes()).toEqual([]);
    expect(poller.isRunning()).toBe(false);
  });

  it('counts consecutive failures and raises the alert at the threshold', async () => {
    const refused = failure('unreachable', 'refused');
    const { client, poller } = setup({ 'hub-1': [refused, refused, refused] });
    poller.start();

    await vi.waitFor(() => expect(client.callsFor('hub-1')).toBe(4));
    expect(poller.runtimes()[0]).toMatchObject({
      state: 'idle',
      consecutiveFailures: 3,
      failureAlert: true,
      lastSuccessAt: null,
      lastError: 'unreachable: refused',
    });
  });

  it('resets the failure count on the next good poll', async () => {
    const refused = failure('unreachable', 'refused');
    const { client, poller } = setup({ 'hub-1': [refused, refused, liveAt(1)] });
    poller.start();

    await vi.waitFor(() => expect(client.callsFor('hub-1')).toBe(4));
    expect(poller.runtimes()[0]).toMatchObject({
      state: 'live',
      consecutiveFailures: 0,
      failureAlert: false,
      lastSuccessAt: 10000,
      lastError: null,
    });
  });

  it('counts a rejected payload as a failed poll', async () => {
    const { client, poller } = setup({
      'hub-1': [ok((now) => ({ timestamp: now, input: { channelStatus: 'weird' } }))],
    });
    poller.start();

    await vi.waitFor(() => expect(client.callsFor('hub-1')).toBe(2));
    expect(poller.runtimes()[0]).toMatchObject({
      consecutiveFailures: 1,
      lastError: 'parse-error: missing-status: channel status missing or unrecognised',
    });
  });

  it('turns a client error into an unreachable poll', async () => {
    const broken: Step = () => {
      throw new Error('socket hang up');
    };
    const { client, poller } = setup({ 'hub-1': [broken, broken] });
    poller.start();

    await vi.waitFor(() => expect(client.callsFor('hub-1')).toBe(3));
    expect(poller.runtimes()[0]).toMatchObject({
      consecutiveFailures: 2,
      lastError: 'unreachable: socket hang up',
      loopAlive: true,
    });
  });

  it('treats a reachable input on another protocol as healthy', async () => {
    const rtmp = ok((now) => ({ timestamp: now, input: { channelStatus: 2, channelType: 'RTMP' } }));
    const { store, client, poller } = setup({ 'hub-1': [rtmp, rtmp, rtmp] });
    poller.start();

    await vi.waitFor(() => expect(client.callsFor('hub-1')).toBe(4));
    expect(poller.runtimes()[0]).toMatchObject({
      state: 'idle',
      consecutiveFailures: 0,
      failureAlert: false,
      lastSuccessAt: 10000,
    });
    expect(store.listSessions()).toEqual([]);
  });

  it('follows devices added, disabled and removed while running', async () => {
    const { store, registry, poller } = setup({ 'hub-1': [liveAt(1)], 'hub-2': [liveAt(2)] }, { register: false });
    poller.start();
    expect(poller.runtimes()).toEqual([]);

    registry.add({ id: 'hub-1', baseUrl: 'http://hub.test:8893' });
    registry.add({ id: 'hub-2', baseUrl: 'http://hub.test:8893' });
    await vi.waitFor(() => expect(store.openCount()).toBe(2));

    registry.remove('hub-1');
    expect(poller.runtimes().map((r) => r.deviceId)).toEqual(['hub-2']);
    await vi.waitFor(() => expect(store.openSessionFor('hub-1')).toBeNull());
    expect(store.listSessions('hub-1')[0]).toMatchObject({ closeReason: 'shutdown' });
    expect(store.openSessionFor('hub-2')).not.toBeNull();

    registry.update('hub-2', { enabled: false });
    await vi.waitFor(() => expect(store.openCount()).toBe(0));
    expect(store.listSessions('hub-2')[0]).toMatchObject({ closeReason: 'shutdown' });
    expect(poller.runtimes()).toEqual([]);
  });

  it('is idempotent on start', () => {
    const { poller } = setup({ 'hub-1': [] });
    poller.start();
    const startedAt = poller.startedAt();
    poller.start();
    expect(poller.startedAt()).toBe(startedAt);
    expect(poller.runtimes()).toHaveLength(1);
    expect(poller.isRunning()).toBe(true);
  });

  it('keeps polling a healthy device while another one hangs', async () => {
    const healthy = Array.from({ length: 20 }, () => liveAt(1));
    const { store, client, registry, poller } = setup({ 'hub-1': healthy }, { clock: systemClock, intervalMs: 20 });
    registry.add({ id: 'hub-2', baseUrl: 'http://hub.test:8893', intervalMs: 5000 });
    poller.start();

    await vi.waitFor(() => expect(store.getSession('s1')?.sampleCount ?? 0).toBeGreaterThanOrEqual(6), {
      timeout: 2000,
    });
    expect(client.callsFor('hub-2')).toBe(1);
    const indices = store.slice('s1', 0).map((s) => s.index);
    expect(indices).toEqual(indices.map((_, i) => i));
    expect(poller.runtimes().find((r) => r.deviceId === 'hub-2')?.consecutiveFailures).toBe(0);
  });
});
