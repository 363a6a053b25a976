import {
  RawStatusSchema,
  type DeviceStatus,
  type GpsFix,
  type InputSource,
  type InterfaceKind,
  type InterfaceReading,
  type SampleDraft,
  type StreamDrops,
} from '../types/telemetry.js';

export type ParseErrorCode = 'invalid-envelope' | 'missing-status' | 'missing-timestamp' | 'no-interfaces';

export type ParseError = {
  code: ParseErrorCode;
  message: string;
};

export type NormalizeResult =
  | { ok: true; status: DeviceStatus; source: InputSource; sample: SampleDraft }
  | { ok: false; error: ParseError; partial: SampleDraft | null };

type Dict = Record<string, unknown>;

const STATUS_BY_CODE: Record<number, DeviceStatus> = { 0: 'off', 1: 'idle', 2: 'live', 3: 'error', 4: 'error' };
const STATUS_BY_LABEL: Record<string, DeviceStatus> = {
  off: 'off',
  idle: 'idle',
  on: 'live',
  live: 'live',
  running: 'live',
  error: 'error',
};

const LAT_KEYS = ['latitude', 'lat', 'Latitude', 'Lat', 'gps_lat'];
const LON_KEYS = ['longitude', 'lng', 'lon', 'long', 'Longitude', 'Lng', 'Lon', 'Long', 'gps_lng', 'gps_lon'];
const ALT_KEYS = ['altitude', 'alt', 'Altitude', 'gps_alt'];
const FIX_KEYS = ['fixQuality', 'fix_quality', 'fix', 'quality', 'locationStatus'];
const GPS_CONTAINERS = [
  'gps',
  'GPS',
  'location',
  'position',
  'geo',
  'coordinates',
  'geolocation',
  'coord',
  'metadata',
  'meta',
  'status_details',
];

function isDict(v: unknown): v is Dict {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pick(o: Dict, keys: readonly string[]): unknown {
  for (const k of keys) {
    const v = o[k];
    if (v !== undefined && v !== null) return v;
  }
  return undefined;
}

/**
 * Coerces vendor numbers: plain numbers, numeric strings, comma decimals and
 * unit-suffixed strings such as `"1 200 kb/s"`. Anything else is `null`.
 */
export function toNumber(x: unknown): number | null {
  if (typeof x === 'number') return Number.isFinite(x) ? x : null;
  if (typeof x !== 'string') return null;
  const compact = x.trim().replace(/\s+/g, '').replace(',', '.');
  const m = /^-?\d+(\.\d+)?/.exec(compact);
  if (!m) return null;
  const n = Number(m[0]);
  return Number.isFinite(n) ? n : null;
}

function toInt(x: unknown): number | null {
  const n = toNumber(x);
  return n === null ? null : Math.trunc(n);
}

// "48.85N" / "2,35 W" -> signed degrees
function toCoordinate(x: unknown): number | null {
  if (typeof x !== 'string') return toNumber(x);
  const s = x.trim();
  const hemi = s.slice(-1).toUpperCase();
  if ('NSEW'.includes(hemi) && s.length > 1) {
    const n = toNumber(s.slice(0, -1));
    if (n === null) return null;
    return hemi === 'S' || hemi === 'W' ? -Math.abs(n) : n;
  }
  return toNumber(s);
}

export function parseStatus(input: Dict): DeviceStatus | null {
  const v = input.channelStatus ?? input.channelState;
  if (typeof v === 'number' && Number.isInteger(v)) return STATUS_BY_CODE[v] ?? null;
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase();
    if (/^\d+$/.test(s)) return STATUS_BY_CODE[Number(s)] ?? null;
    return STATUS_BY_LABEL[s] ?? null;
  }
  return null;
}

function text(v: unknown): string | null {
  return typeof v === 'string' && v.trim() ? v.trim() : null;
}

export function readSource(input: Dict): InputSource {
  return {
    identifier: text(input.identifier),
    name: text(pick(input, ['familyName', 'family_name', 'displayName'])),
    channelType: text(pick(input, ['channelType', 'channel_type', 'protocol'])),
  };
}

/**
 * Sessions are recorded for SafeStreams inputs only. Firmware that does not
 * report a channel type is assumed to be SafeStreams.
 */
export function isTracked(input: Dict): boolean {
  const { channelType } = readSource(input);
  return channelType === null || /safestreams|sst/i.test(channelType);
}

function fixFrom(lat: unknown, lon: unknown, source: Dict | null): GpsFix | null {
  const la = toCoordinate(lat);
  const lo = toCoordinate(lon);
  if (la === null || lo === null) return null;
  if (Math.abs(la) > 90 || Math.abs(lo) > 180) return null;
  return {
    lat: la,
    lon: lo,
    alt: source ? toNumber(pick(source, ALT_KEYS)) : null,
    fixQuality: source ? toInt(pick(source, FIX_KEYS)) : null,
  };
}

function fixFromDict(o: Dict): GpsFix | null {
  const lat = pick(o, LAT_KEYS);
  const lon = pick(o, LON_KEYS);
  if (lat === undefined || lon === undefined) return null;
  return fixFrom(lat, lon, o);
}

function fixFromPair(v: unknown): GpsFix | null {
  if (!Array.isArray(v) || v.length < 2) return null;
  return fixFrom(v[0], v[1], null);
}

export function extractGps(input: Dict): GpsFix | null {
  const direct = fixFromDict(input);
  if (direct) return direct;

  for (const key of GPS_CONTAINERS) {
    const g = input[key];
    if (Array.isArray(g)) {
      const fix = fixFromPair(g);
      if (fix) return fix;
      continue;
    }
    if (!isDict(g)) continue;
    const fix = fixFromDict(g);
    if (fix) return fix;
    for (const inner of Object.values(g)) {
      const nested = isDict(inner) ? fixFromDict(inner) : fixFromPair(inner);
      if (nested) return nested;
    }
  }
  return null;
}

export function inferKind(type: string, name: string): InterfaceKind {
  const s = `${type} ${name}`.toLowerCase();
  if (/(cell|lte|[345]g|modem|sim\d?|wwan|mobile)/.test(s)) return 'cellular';
  if (/(wi-?fi|wlan)/.test(s)) return 'wifi';
  if (/usb/.test(s)) return 'usb';
  if (/(eth|lan|en\d)/.test(s)) return 'eth';
  return 'other';
}

function linkUpFrom(o: Dict): boolean | null {
  const v = pick(o, ['up', 'linkUp', 'link_up', 'state', 'connected']);
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v > 0;
  if (typeof v !== 'string') return null;
  const s = v.trim().toLowerCase();
  if (['up', 'on', 'connected', 'active', 'true'].includes(s)) return true;
  if (['down', 'off', 'disconnected', 'inactive', 'false'].includes(s)) return false;
  return null;
}

function bitrateFrom(o: Dict): number | null {
  const v = pick(o, ['rx_bitrate', 'rxBitrate', 'rx_kbits', 'bitrate', 'rx']);
  if (isDict(v)) return toNumber(pick(v, ['kbits', 'value']));
  return toNumber(v);
}

function linkList(linkStats: unknown): unknown[] {
  if (Array.isArray(linkStats)) return linkStats;
  if (isDict(linkStats) && Array.isArray(linkStats.links_stats)) return linkStats.links_stats;
  return [];
}

export function readInterfaces(linkStats: unknown, missing: string[]): InterfaceReading[] {
  const readings: InterfaceReading[] = [];
  linkList(linkStats).forEach((item, i) => {
    if (!isDict(item)) return;
    const nameRaw = pick(item, ['name', 'itf_name', 'interface']);
    const name = typeof nameRaw === 'string' && nameRaw.trim() ? nameRaw.trim() : `link${i}`;
    const typeRaw = pick(item, ['type', 'itf_type', 'kind']);
    const reading: InterfaceReading = {
      name,
      kind: inferKind(typeof typeRaw === 'string' ? typeRaw : '', name),
      bitrateKbps: bitrateFrom(item),
      owdMs: toNumber(pick(item, ['owdR', 'owd_r', 'owd', 'oneway', 'rtt'])),
      lossRate: toNumber(pick(item, ['rx_percent_lost', 'rx_percent_loss', 'rx_loss_percent'])),
      droppedPackets: toInt(pick(item, ['rx_lost_nb_packets', 'rx_lost_packets', 'rx_lost_nb', 'rx_lost'])),
      linkUp: linkUpFrom(item),
    };
    for (const field of ['bitrateKbps', 'owdMs', 'lossRate', 'droppedPackets', 'linkUp'] as const) {
      if (reading[field] === null) missing.push(`interfaces.${name}.${field}`);
    }
    readings.push(reading);
  });
  return readings;
}

function sumLost(entries: unknown): number | null {
  if (!Array.isArray(entries)) return null;
  let total: number | null = null;
  for (const e of entries) {
    const n = isDict(e) ? toInt(e.rx_lost_packets) : null;
    if (n !== null) total = (total ?? 0) + n;
  }
  return total;
}

export function readDrops(streamStats: unknown): StreamDrops {
  if (!isDict(streamStats)) return { video: null, ts: null };
  return {
    video: sumLost(streamStats.video),
    ts: sumLost(streamStats['mpegts-up'] ?? streamStats.mpegts_up),
  };
}

function fail(code: ParseErrorCode, message: string, partial: SampleDraft | null): NormalizeResult {
  return { ok: false, error: { code, message }, partial };
}

/**
 * Turns one raw StreamHub poll into a sample draft. Fields the device did not
 * report stay `null` and are listed in `missing`; nothing is defaulted to zero.
 * `receivedAt` stamps partial samples whose payload carries no timestamp.
 */
export function normalizeStatus(deviceId: string, raw: unknown, receivedAt: number): NormalizeResult {
  const envelope = RawStatusSchema.safeParse(raw);
  if (!envelope.success) {
    return fail('invalid-envelope', envelope.error.issues[0]?.message ?? 'invalid payload', null);
  }
  const { timestamp, input, linkStats, streamStats } = envelope.data;
  if (input === null) return fail('missing-status', 'input not reported', null);

  const missing: string[] = [];
  if (timestamp === undefined) missing.push('timestamp');
  const gps = extractGps(input);
  if (!gps) {
    missing.push('gps');
  } else {
    if (gps.alt === null) missing.push('gps.alt');
    if (gps.fixQuality === null) missing.push('gps.fixQuality');
  }
  const interfaces = readInterfaces(linkStats, missing);
  if (interfaces.length === 0) missing.push('interfaces');
  const drops = readDrops(streamStats);
  if (drops.video === null) missing.push('drops.video');
  if (drops.ts === null) missing.push('drops.ts');

  const draft: SampleDraft = {
    deviceId,
    ts: timestamp ?? receivedAt,
    gps,
    interfaces,
    drops,
    missing,
  };

  const reported = parseStatus(input);
  if (reported === null) return fail('missing-status', 'channel status missing or unrecognised', draft);
  const status: DeviceStatus = reported === 'live' && !isTracked(input) ? 'untracked' : reported;
  if (timestamp === undefined) return fail('missing-timestamp', 'payload carries no timestamp', draft);
  if (status === 'live' && interfaces.length === 0) {
    return fail('no-interfaces', 'live input reported no interface readings', draft);
  }
  return { ok: true, status, source: readSource(input), sample: draft };
}
