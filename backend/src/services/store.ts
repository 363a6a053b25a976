import { randomUUID } from 'node:crypto';
import type { CloseReason, InputSource, Sample, SampleDraft, Session, SessionEvent } from '../types/telemetry.js';
import { createLogger, type Logger } from '../logger.js';

export type StoreErrorCode = 'SESSION_NOT_FOUND' | 'SESSION_CLOSED' | 'SESSION_ALREADY_OPEN' | 'OUT_OF_ORDER';

export class StoreError extends Error {
  constructor(
    readonly code: StoreErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

type SessionRecord = {
  session: Session;
  samples: Sample[];
};

type Waiter = () => void;

export type StoreOptions = {
  newId?: () => string;
  now?: () => number;
  logger?: Logger;
};

function freezeSample(draft: SampleDraft, sessionId: string, index: number): Sample {
  const interfaces = draft.interfaces.map((i) => Object.freeze({ ...i }));
  return Object.freeze({
    deviceId: draft.deviceId,
    sessionId,
    index,
    ts: draft.ts,
    gps: draft.gps ? Object.freeze({ ...draft.gps }) : null,
    interfaces: Object.freeze(interfaces),
    drops: Object.freeze({ ...draft.drops }),
    missing: Object.freeze([...draft.missing]),
  });
}

function lowerBound(samples: readonly Sample[], ts: number): number {
  let lo = 0;
  let hi = samples.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (samples[mid].ts < ts) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Append-only session store. Sessions live in an arena keyed by id; a device
 * only refers to its open session through `openByDevice`.
 */
export class TelemetryStore {
  private sessions = new Map<string, SessionRecord>();
  private openByDevice = new Map<string, string>();
  private waiters = new Map<string, Set<Waiter>>();
  private listeners = new Set<(event: SessionEvent) => void>();
  private readonly newId: () => string;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(opts: StoreOptions = {}) {
    this.newId = opts.newId ?? randomUUID;
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? createLogger('store');
  }

  onEvent(listener: (event: SessionEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  openSession(
    deviceId: string,
    deviceName: string,
    startedAt: number,
    input: Pick<InputSource, 'identifier' | 'name'> = { identifier: null, name: null }
  ): Session {
    const current = this.openByDevice.get(deviceId);
    if (current) {
      throw new StoreError('SESSION_ALREADY_OPEN', `device ${deviceId} already has open session ${current}`);
    }
    const session: Session = {
      id: this.newId(),
      deviceId,
      deviceName,
      inputIdentifier: input.identifier,
      inputName: input.name,
      startedAt,
      endedAt: null,
      closeReason: null,
      title: null,
      sampleCount: 0,
    };
    this.sessions.set(session.id, { session, samples: [] });
    this.openByDevice.set(deviceId, session.id);
    this.emit({ type: 'session.opened', session: { ...session } });
    return { ...session };
  }

  append(sessionId: string, draft: SampleDraft): Sample {
    const rec = this.require(sessionId);
    if (rec.session.endedAt !== null) {
      throw new StoreError('SESSION_CLOSED', `session ${sessionId} is closed`);
    }
    const last = rec.samples[rec.samples.length - 1];
    if (last && draft.ts < last.ts) {
      throw new StoreError('OUT_OF_ORDER', `sample at ${draft.ts} is older than index ${last.index} at ${last.ts}`);
    }
    const sample = freezeSample(draft, sessionId, rec.samples.length);
    rec.samples.push(sample);
    rec.session.sampleCount = rec.samples.length;
    this.notify(sessionId);
    return sample;
  }

  closeSession(sessionId: string, endedAt: number, reason: CloseReason): Session {
    const rec = this.require(sessionId);
    if (rec.session.endedAt !== null) {
      throw new StoreError('SESSION_CLOSED', `session ${sessionId} is already closed`);
    }
    rec.session.endedAt = endedAt;
    rec.session.closeReason = reason;
    if (this.openByDevice.get(rec.session.deviceId) === sessionId) {
      this.openByDevice.delete(rec.session.deviceId);
    }
    this.notify(sessionId);
    this.emit({ type: 'session.closed', session: { ...rec.session } });
    return { ...rec.session };
  }

  /** Operator stop: end time is the last sample's, or now for an empty session. */
  stop(sessionId: string): Session {
    const rec = this.require(sessionId);
    const last = rec.samples[rec.samples.length - 1];
    return this.closeSession(sessionId, last ? last.ts : this.now(), 'manual');
  }

  rename(sessionId: string, title: string | null): Session {
    const rec = this.require(sessionId);
    const trimmed = title?.trim() ?? '';
    rec.session.title = trimmed ? trimmed : null;
    return { ...rec.session };
  }

  getSession(sessionId: string): Session | null {
    const rec = this.sessions.get(sessionId);
    return rec ? { ...rec.session } : null;
  }

  listSessions(deviceId?: string): Session[] {
    const out: Session[] = [];
    for (const rec of this.sessions.values()) {
      if (deviceId === undefined || rec.session.deviceId === deviceId) out.push({ ...rec.session });
    }
    return out.sort((a, b) => b.startedAt - a.startedAt);
  }

  openSessionFor(deviceId: string): Session | null {
    const id = this.openByDevice.get(deviceId);
    return id ? this.getSession(id) : null;
  }

  /** Timestamp of the newest sample stored for a device across its sessions. */
  lastSampleAt(deviceId: string): number | null {
    let latest: number | null = null;
    for (const rec of this.sessions.values()) {
      if (rec.session.deviceId !== deviceId) continue;
      const last = rec.samples[rec.samples.length - 1];
      if (last && (latest === null || last.ts > latest)) latest = last.ts;
    }
    return latest;
  }

  openCount(): number {
    return this.openByDevice.size;
  }

  /** Samples with `fromTs <= ts <= toTs`, in index order. */
  range(sessionId: string, fromTs: number, toTs: number): Sample[] {
    const { samples } = this.require(sessionId);
    if (fromTs > toTs) return [];
    const out: Sample[] = [];
    for (let i = lowerBound(samples, fromTs); i < samples.length && samples[i].ts <= toTs; i += 1) {
      out.push(samples[i]);
    }
    return out;
  }

  /** Samples with `fromIndex <= index < toIndex`. */
  slice(sessionId: string, fromIndex: number, toIndex?: number): Sample[] {
    const { samples } = this.require(sessionId);
    return samples.slice(Math.max(0, fromIndex), toIndex);
  }

  /**
   * Follows a session from `fromIndex`. Yields every stored sample, then waits
   * for appends; ends once the session is closed and drained, deleted, or the
   * signal aborts.
   */
  async *tail(sessionId: string, fromIndex = 0, signal?: AbortSignal): AsyncGenerator<Sample, void, undefined> {
    const rec = this.require(sessionId);
    let next = Math.max(0, Math.trunc(fromIndex));
    while (!signal?.aborted) {
      if (this.sessions.get(sessionId) !== rec) return;
      if (next < rec.samples.length) {
        yield rec.samples[next];
        next += 1;
        continue;
      }
      if (rec.session.endedAt !== null) return;
      await this.changed(sessionId, signal);
    }
  }

  delete(sessionId: string): boolean {
    const rec = this.sessions.get(sessionId);
    if (!rec) return false;
    this.sessions.delete(sessionId);
    if (this.openByDevice.get(rec.session.deviceId) === sessionId) {
      this.openByDevice.delete(rec.session.deviceId);
    }
    this.notify(sessionId);
    this.emit({ type: 'session.deleted', sessionId });
    return true;
  }

  purgeAll(): number {
    const count = this.sessions.size;
    const ids = [...this.sessions.keys()];
    this.sessions.clear();
    this.openByDevice.clear();
    for (const id of ids) this.notify(id);
    this.emit({ type: 'store.purged', count });
    return count;
  }

  private require(sessionId: string): SessionRecord {
    const rec = this.sessions.get(sessionId);
    if (!rec) throw new StoreError('SESSION_NOT_FOUND', `session ${sessionId} not found`);
    return rec;
  }

  private changed(sessionId: string, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const set = this.waiters.get(sessionId) ?? new Set<Waiter>();
      this.waiters.set(sessionId, set);
      const wake: Waiter = () => {
        set.delete(wake);
        if (set.size === 0 && this.waiters.get(sessionId) === set) this.waiters.delete(sessionId);
        signal?.removeEventListener('abort', wake);
        resolve();
      };
      set.add(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }

  private notify(sessionId: string) {
    const set = this.waiters.get(sessionId);
    if (!set) return;
    this.waiters.delete(sessionId);
    for (const wake of [...set]) wake();
  }

  private emit(event: SessionEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error(`listener failed on ${event.type}`, err);
      }
    }
  }
}
