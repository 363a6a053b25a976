import { z } from 'zod';
import type { Device } from './device.js';

// Envelope produced by the StreamHub client for one poll. Inner objects are
// vendor JSON and are only loosely typed here; the normalizer reads them.
export const RawStatusSchema = z.object({
  timestamp: z.number().finite().optional(),
  input: z.record(z.unknown()).nullable(),
  linkStats: z.unknown().optional(),
  streamStats: z.unknown().optional(),
});

export type RawStatus = z.infer<typeof RawStatusSchema>;

// `untracked`: the input is on air over a protocol other than SafeStreams.
export type DeviceStatus = 'live' | 'idle' | 'off' | 'error' | 'untracked';

/** What the vendor reports about the followed input itself. */
export type InputSource = {
  identifier: string | null;
  name: string | null;
  channelType: string | null;
};

export type InterfaceKind = 'cellular' | 'eth' | 'wifi' | 'usb' | 'other';

export type GpsFix = {
  lat: number;
  lon: number;
  alt: number | null;
  fixQuality: number | null;
};

export type InterfaceReading = {
  name: string;
  kind: InterfaceKind;
  bitrateKbps: number | null;
  owdMs: number | null;
  lossRate: number | null;
  droppedPackets: number | null;
  linkUp: boolean | null;
};

export type StreamDrops = {
  video: number | null;
  ts: number | null;
};

// A sample before the store assigns it a session and an index.
export type SampleDraft = {
  deviceId: string;
  ts: number;
  gps: GpsFix | null;
  interfaces: InterfaceReading[];
  drops: StreamDrops;
  /** Paths of fields the device did not report, e.g. `gps` or `interfaces.lte1.owdMs`. */
  missing: string[];
};

export type Sample = {
  readonly deviceId: string;
  readonly sessionId: string;
  readonly index: number;
  readonly ts: number;
  readonly gps: Readonly<GpsFix> | null;
  readonly interfaces: readonly Readonly<InterfaceReading>[];
  readonly drops: Readonly<StreamDrops>;
  readonly missing: readonly string[];
};

export type CloseReason = 'graceful' | 'timeout' | 'shutdown' | 'manual';

export type Session = {
  id: string;
  deviceId: string;
  deviceName: string;
  inputIdentifier: string | null;
  inputName: string | null;
  startedAt: number;
  endedAt: number | null;
  closeReason: CloseReason | null;
  title: string | null;
  sampleCount: number;
};

export type FailureKind = 'timeout' | 'unreachable' | 'protocol-error';

export type UnreachableCause = FailureKind | 'parse-error';

export type FetchResult = { ok: true; payload: unknown } | { ok: false; kind: FailureKind; message: string };

export type FetchOptions = {
  signal: AbortSignal;
  timeoutMs: number;
};

/** One status request per call; must give up once `signal` aborts. */
export interface TelemetryClient {
  fetch(device: Device, opts: FetchOptions): Promise<FetchResult>;
}

export type PollResult =
  | {
      kind: 'status';
      deviceId: string;
      ts: number;
      status: DeviceStatus;
      source: InputSource;
      sample: SampleDraft;
    }
  | {
      kind: 'unreachable';
      deviceId: string;
      ts: number;
      cause: UnreachableCause;
      message: string;
      partial: SampleDraft | null;
    };

export type SessionEvent =
  | { type: 'session.opened'; session: Session }
  | { type: 'session.closed'; session: Session }
  | { type: 'session.deleted'; sessionId: string }
  | { type: 'store.purged'; count: number };
