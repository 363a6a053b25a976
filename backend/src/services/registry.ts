import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DeviceRecordSchema, DeviceSchema, toDevice, type Device, type DeviceInput } from '../types/device.js';

export type RegistryEvent =
  | { type: 'added'; device: Device }
  | { type: 'removed'; deviceId: string }
  | { type: 'updated'; device: Device };

export type DevicePatch = Partial<Pick<Device, 'name' | 'apiKey' | 'inputIndex' | 'intervalMs' | 'enabled' | 'silenceThreshold'>>;

/** In-memory device set; the poller follows it through `subscribe`. */
export class DeviceRegistry {
  private devices = new Map<string, Device>();
  private listeners = new Set<(event: RegistryEvent) => void>();

  constructor(private readonly defaultIntervalMs: number) {}

  subscribe(listener: (event: RegistryEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(): Device[] {
    return [...this.devices.values()];
  }

  enabled(): Device[] {
    return this.list().filter((d) => d.enabled);
  }

  get(id: string): Device | null {
    return this.devices.get(id) ?? null;
  }

  add(input: DeviceInput): Device {
    const device = toDevice(input, this.defaultIntervalMs);
    if (this.devices.has(device.id)) {
      throw new Error(`device ${device.id} is already registered`);
    }
    this.devices.set(device.id, device);
    this.emit({ type: 'added', device });
    return device;
  }

  /** Throws a ZodError, leaving the device unchanged, when the result is invalid. */
  update(id: string, patch: DevicePatch): Device {
    const current = this.devices.get(id);
    if (!current) throw new Error(`device ${id} is not registered`);
    const next = DeviceRecordSchema.parse({ ...current, ...patch, id });
    this.devices.set(id, next);
    this.emit({ type: 'updated', device: next });
    return next;
  }

  remove(id: string): boolean {
    if (!this.devices.delete(id)) return false;
    this.emit({ type: 'removed', deviceId: id });
    return true;
  }

  private emit(event: RegistryEvent) {
    for (const listener of this.listeners) listener(event);
  }
}

const DeviceFileSchema = z.array(DeviceSchema);

/** Reads a JSON array of devices. A missing file yields an empty list. */
export async function loadDeviceFile(file: string): Promise<DeviceInput[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  const parsed: unknown = JSON.parse(text);
  return DeviceFileSchema.parse(parsed);
}
