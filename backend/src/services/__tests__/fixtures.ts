import type { Clock } from '../poller.js';
import type { Device } from '../../types/device.js';
import type {
  FetchOptions,
  FetchResult,
  GpsFix,
  InputSource,
  InterfaceReading,
  PollResult,
  SampleDraft,
  TelemetryClient,
} from '../../types/telemetry.js';

export const DEVICE_ID = 'hub-1';

export function cellular(overrides: Partial<InterfaceReading> = {}): InterfaceReading {
  return {
    name: 'lte1',
    kind: 'cellular',
    bitrateKbps: 2500,
    owdMs: 80,
    lossRate: 0,
    droppedPackets: 0,
    linkUp: true,
    ...overrides,
  };
}

export function fix(lat: number, lon = 2.35): GpsFix {
  return { lat, lon, alt: null, fixQuality: null };
}

export function draft(ts: number, overrides: Partial<SampleDraft> = {}): SampleDraft {
  return {
    deviceId: DEVICE_ID,
    ts,
    gps: null,
    interfaces: [cellular()],
    drops: { video: 0, ts: 0 },
    missing: [],
    ...overrides,
  };
}

export const NO_SOURCE: InputSource = { identifier: null, name: null, channelType: null };

export function live(ts: number, gps: GpsFix | null = null, source: InputSource = NO_SOURCE): PollResult {
  return { kind: 'status', deviceId: DEVICE_ID, ts, status: 'live', source, sample: draft(ts, { gps }) };
}

export function idle(ts: number): PollResult {
  return { kind: 'status', deviceId: DEVICE_ID, ts, status: 'idle', source: NO_SOURCE, sample: draft(ts, { interfaces: [] }) };
}

/** On air over a protocol other than SafeStreams. */
export function untracked(ts: number): PollResult {
  const source: InputSource = { identifier: null, name: null, channelType: 'RTMP' };
  return { kind: 'status', deviceId: DEVICE_ID, ts, status: 'untracked', source, sample: draft(ts, { interfaces: [] }) };
}

export function lost(ts: number, partial: SampleDraft | null = null): PollResult {
  return {
    kind: 'unreachable',
    deviceId: DEVICE_ID,
    ts,
    cause: partial ? 'parse-error' : 'timeout',
    message: 'no answer',
    partial,
  };
}

/** Raw StreamHub payload as the client hands it to the normalizer. */
export function livePayload(ts: number, lat: number) {
  return {
    timestamp: ts,
    input: { channelStatus: 2, latitude: lat, longitude: 2.35 },
    linkStats: { links_stats: [{ name: 'lte1', type: 'cellular', rx_bitrate: 2500, owdR: 80, rx_percent_lost: 0, rx_lost_nb_packets: 0, up: true }] },
    streamStats: { video: [{ rx_lost_packets: 0 }], 'mpegts-up': [{ rx_lost_packets: 0 }] },
  };
}

export function idlePayload(ts: number) {
  return { timestamp: ts, input: { channelStatus: 1 } };
}

export function device(id = DEVICE_ID, overrides: Partial<Device> = {}): Device {
  return {
    id,
    name: `Hub ${id}`,
    baseUrl: 'http://hub.test:8893',
    inputIndex: 0,
    intervalMs: 5000,
    enabled: true,
    ...overrides,
  };
}

export type VirtualClock = Clock & { time: number };

/** Sleeping advances virtual time and yields one macrotask. */
export function virtualClock(start = 0): VirtualClock {
  const clock: VirtualClock = {
    time: start,
    now: () => clock.time,
    sleep: (ms, signal) =>
      new Promise<void>((resolve) => {
        if (signal.aborted) return resolve();
        setImmediate(() => {
          if (!signal.aborted) clock.time += ms;
          resolve();
        });
      }),
  };
  return clock;
}

export type Step = (now: number) => FetchResult;

export const ok =
  (build: (now: number) => unknown): Step =>
  (now) => ({ ok: true, payload: build(now) });

export const failure =
  (kind: 'timeout' | 'unreachable' | 'protocol-error', message = 'refused'): Step =>
  () => ({ ok: false, kind, message });

/**
 * Plays a fixed list of results per device, then hangs until the poll is
 * cancelled.
 */
export class ScriptedClient implements TelemetryClient {
  calls = new Map<string, number>();

  constructor(
    private readonly scripts: Record<string, Step[]>,
    private readonly clock: { now: () => number }
  ) {}

  callsFor(id: string): number {
    return this.calls.get(id) ?? 0;
  }

  async fetch(d: Device, opts: FetchOptions): Promise<FetchResult> {
    const n = this.callsFor(d.id);
    this.calls.set(d.id, n + 1);
    const step = this.scripts[d.id]?.[n];
    if (step) return step(this.clock.now());
    return new Promise<FetchResult>((resolve) => {
      opts.signal.addEventListener(
        'abort',
        () => resolve({ ok: false, kind: 'unreachable', message: 'aborted' }),
        { once: true }
      );
    });
  }
}
