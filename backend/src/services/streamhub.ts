import axios, { type AxiosInstance } from 'axios';
import type { Device } from '../types/device.js';
import type { FetchOptions, FetchResult, RawStatus, TelemetryClient } from '../types/telemetry.js';
import { isTracked, parseStatus } from './normalizer.js';

type JsonResult = { ok: true; data: unknown } | Extract<FetchResult, { ok: false }>;

export function createHttp(): AxiosInstance {
  return axios.create({
    headers: { Accept: 'application/json', 'User-Agent': 'linkwatch/0.1' },
    maxRedirects: 0,
    responseType: 'text',
    // status handling is ours: redirects usually point at the login page
    validateStatus: () => true,
  });
}

function isDict(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// Some firmware answers with text/html around a JSON body.
function parseBody(body: unknown, contentType: string): JsonResult {
  if (typeof body !== 'string') {
    return body === undefined || body === null
      ? { ok: false, kind: 'protocol-error', message: 'empty response' }
      : { ok: true, data: body };
  }
  const trimmed = body.trimStart();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      return { ok: true, data: JSON.parse(trimmed) };
    } catch (err) {
      return { ok: false, kind: 'protocol-error', message: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  const preview = trimmed.slice(0, 120).replace(/\s+/g, ' ');
  return { ok: false, kind: 'protocol-error', message: `non-JSON response (${contentType || 'no content-type'}): ${preview}` };
}

/** Inputs come back as a list, as `{ inputs: [...] }`, or keyed by index. */
export function selectInput(data: unknown, index: number): Record<string, unknown> | null {
  const container = isDict(data) && data.inputs !== undefined ? data.inputs : data;
  let list: unknown[] = [];
  if (Array.isArray(container)) {
    list = container;
  } else if (isDict(container)) {
    list = Object.keys(container)
      .filter((k) => /^\d+$/.test(k))
      .sort((a, b) => Number(a) - Number(b))
      .map((k) => container[k]);
  }
  const input = list[index];
  return isDict(input) ? input : null;
}

/**
 * StreamHub REST client. One poll reads `/inputs`, then the link and stream
 * statistics of the followed input when it is on air over SafeStreams.
 */
export class StreamHubClient implements TelemetryClient {
  constructor(
    private readonly http: AxiosInstance = createHttp(),
    private readonly now: () => number = Date.now
  ) {}

  async fetch(device: Device, opts: FetchOptions): Promise<FetchResult> {
    const inputs = await this.getJson(device, '/inputs', opts);
    if (!inputs.ok) return inputs;

    const input = selectInput(inputs.data, device.inputIndex);
    const payload: RawStatus = { timestamp: this.now(), input };
    if (input && parseStatus(input) === 'live' && isTracked(input)) {
      const n = device.inputIndex + 1;
      const [links, streams] = await Promise.all([
        this.getJson(device, `/inputs/${n}/linkStats`, opts),
        this.getJson(device, `/inputs/${n}/streamStats`, opts),
      ]);
      // stats are best effort; the normalizer reports what is missing
      if (links.ok) payload.linkStats = links.data;
      if (streams.ok) payload.streamStats = streams.data;
    }
    return { ok: true, payload };
  }

  private async getJson(device: Device, path: string, opts: FetchOptions): Promise<JsonResult> {
    const url = `${device.baseUrl}${path}`;
    try {
      const res = await this.http.get<unknown>(url, {
        params: device.apiKey ? { api_key: device.apiKey } : undefined,
        signal: opts.signal,
        timeout: opts.timeoutMs,
      });
      const contentType = String(res.headers['content-type'] ?? '');
      if (res.status >= 300 && res.status < 400) {
        return { ok: false, kind: 'protocol-error', message: `redirect ${res.status} from ${path}` };
      }
      if (res.status >= 500) {
        return { ok: false, kind: 'unreachable', message: `HTTP ${res.status} from ${path}` };
      }
      if (res.status >= 400) {
        return { ok: false, kind: 'protocol-error', message: `HTTP ${res.status} from ${path}` };
      }
      return parseBody(res.data, contentType);
    } catch (err) {
      if (axios.isAxiosError(err)) {
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
          return { ok: false, kind: 'timeout', message: `${path}: ${err.message}` };
        }
        return { ok: false, kind: 'unreachable', message: `${path}: ${err.code ?? err.message}` };
      }
      throw err;
    }
  }
}
