import type { InputSource, PollResult, Sample, SampleDraft, Session } from '../types/telemetry.js';
import { StoreError, type TelemetryStore } from './store.js';

export type MachineState = 'idle' | 'live';

export type SessionTransition =
  | { type: 'opened'; session: Session; sample: Sample }
  | { type: 'appended'; sample: Sample }
  | { type: 'missed'; misses: number; sample: Sample | null }
  | { type: 'closed'; session: Session }
  | { type: 'ignored' };

export type MachineSnapshot = {
  state: MachineState;
  sessionId: string | null;
  misses: number;
  lastSampleTs: number | null;
};

type DeviceRef = { id: string; name: string };

/**
 * Per-device session lifecycle. `idle` until a live result arrives; a live
 * session survives up to `silenceThreshold - 1` consecutive unreachable polls
 * and closes on the threshold or on an explicit non-live status.
 */
export class SessionMachine {
  private state: MachineState = 'idle';
  private sessionId: string | null = null;
  private lastSampleTs: number | null = null;
  private misses = 0;
  private stopped = false;

  constructor(
    private readonly store: TelemetryStore,
    private readonly device: DeviceRef,
    private readonly silenceThreshold: number
  ) {
    if (!Number.isInteger(silenceThreshold) || silenceThreshold < 1) {
      throw new RangeError(`silenceThreshold must be a positive integer, got ${silenceThreshold}`);
    }
  }

  snapshot(): MachineSnapshot {
    return {
      state: this.state,
      sessionId: this.sessionId,
      misses: this.misses,
      lastSampleTs: this.lastSampleTs,
    };
  }

  handle(result: PollResult): SessionTransition {
    if (this.stopped) return { type: 'ignored' };
    if (result.kind === 'status') {
      return result.status === 'live' ? this.onLive(result.sample, result.source) : this.onNotLive();
    }
    return this.onUnreachable(result.partial);
  }

  /** Closes the open session with reason `shutdown`; later results are ignored. */
  shutdown(): Session | null {
    if (this.stopped) return null;
    this.stopped = true;
    if (this.state !== 'live') return null;
    return this.close('shutdown');
  }

  private onLive(draft: SampleDraft, source: InputSource): SessionTransition {
    if (this.state === 'idle') {
      const opened = this.store.openSession(this.device.id, this.device.name, draft.ts, source);
      this.state = 'live';
      this.sessionId = opened.id;
      this.misses = 0;
      this.lastSampleTs = null;
      const sample = this.append(draft);
      return { type: 'opened', session: this.store.getSession(opened.id) ?? opened, sample };
    }
    this.misses = 0;
    return { type: 'appended', sample: this.append(draft) };
  }

  private onNotLive(): SessionTransition {
    if (this.state === 'idle') return { type: 'ignored' };
    return { type: 'closed', session: this.close('graceful') };
  }

  private onUnreachable(partial: SampleDraft | null): SessionTransition {
    if (this.state === 'idle') return { type: 'ignored' };
    this.misses += 1;
    let sample: Sample | null = null;
    let rejected: StoreError | null = null;
    if (partial) {
      try {
        sample = this.append(partial);
      } catch (err) {
        if (!(err instanceof StoreError) || err.code !== 'OUT_OF_ORDER') throw err;
        rejected = err;
      }
    }
    if (this.misses >= this.silenceThreshold) {
      const session = this.close('timeout');
      if (rejected) throw rejected;
      return { type: 'closed', session };
    }
    if (rejected) throw rejected;
    return { type: 'missed', misses: this.misses, sample };
  }

  private append(draft: SampleDraft): Sample {
    const sessionId = this.requireSession();
    try {
      const sample = this.store.append(sessionId, draft);
      this.lastSampleTs = sample.ts;
      return sample;
    } catch (err) {
      // closed or deleted from the management side: start over on the next live poll
      if (err instanceof StoreError && err.code !== 'OUT_OF_ORDER') this.reset();
      throw err;
    }
  }

  private close(reason: 'graceful' | 'timeout' | 'shutdown'): Session {
    const sessionId = this.requireSession();
    const endedAt = this.lastSampleTs ?? this.store.getSession(sessionId)?.startedAt ?? 0;
    try {
      return this.store.closeSession(sessionId, endedAt, reason);
    } finally {
      this.reset();
    }
  }

  private requireSession(): string {
    if (this.sessionId === null) {
      throw new StoreError('SESSION_NOT_FOUND', `device ${this.device.id} has no open session`);
    }
    return this.sessionId;
  }

  private reset() {
    this.state = 'idle';
    this.sessionId = null;
    this.misses = 0;
    this.lastSampleTs = null;
  }
}
