import { z } from 'zod';

export const DeviceSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    protocol: z.enum(['http', 'https']).default('https'),
    host: z.string().min(1).optional(),
    port: z.number().int().nonnegative().default(0),
    apiKey: z.string().optional(),
    inputIndex: z.number().int().nonnegative().default(0),
    intervalMs: z.number().int().positive().optional(),
    enabled: z.boolean().default(true),
    silenceThreshold: z.number().int().positive().optional(),
  })
  .refine((d) => d.baseUrl !== undefined || d.host !== undefined, {
    message: 'either baseUrl or host is required',
    path: ['host'],
  });

export type DeviceInput = z.input<typeof DeviceSchema>;

// Resolved form held by the registry.
export const DeviceRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  inputIndex: z.number().int().nonnegative(),
  intervalMs: z.number().int().positive(),
  enabled: z.boolean(),
  silenceThreshold: z.number().int().positive().optional(),
});

export type Device = z.infer<typeof DeviceRecordSchema>;

// StreamHub serves its REST API on 8893 (http) / 8896 (https), not on the UI ports.
export function apiPort(protocol: 'http' | 'https', port: number): number {
  if (port === 0 || port === 80 || port === 443) {
    return protocol === 'http' ? 8893 : 8896;
  }
  return port;
}

export function toDevice(input: DeviceInput, defaultIntervalMs: number): Device {
  const d = DeviceSchema.parse(input);
  const baseUrl = d.baseUrl ?? `${d.protocol}://${d.host}:${apiPort(d.protocol, d.port)}`;
  return {
    id: d.id,
    name: d.name ?? d.id,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    apiKey: d.apiKey,
    inputIndex: d.inputIndex,
    intervalMs: d.intervalMs ?? defaultIntervalMs,
    enabled: d.enabled,
    silenceThreshold: d.silenceThreshold,
  };
}
