import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

function getEnv(key: string, fallback?: string) {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  return v;
}

const positiveInt = z.coerce.number().int().positive();

function getInt(key: string, fallback: number) {
  const parsed = positiveInt.safeParse(getEnv(key, String(fallback)));
  if (!parsed.success) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${process.env[key]}"`);
  }
  return parsed.data;
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const config = {
  port: Number(getEnv('PORT', '3000')),
  authToken: getEnv('AUTH_TOKEN'),
  corsOrigin: getEnv('CORS_ORIGIN', '*'),
  devicesFile: getEnv('DEVICES_FILE', 'devices.json') ?? 'devices.json',
  logLevel: LogLevelSchema.catch('info').parse(getEnv('LOG_LEVEL', 'info')),
  poller: {
    intervalMs: getInt('POLL_INTERVAL_MS', 2000),
    fetchTimeoutMs: getInt('FETCH_TIMEOUT_MS', 1500),
    silenceThreshold: getInt('SILENCE_THRESHOLD', 3),
    shutdownTimeoutMs: getInt('SHUTDOWN_TIMEOUT_MS', 5000),
    failureAlertThreshold: getInt('FAILURE_ALERT_THRESHOLD', 5),
  },
  health: {
    historyWindowMs: getInt('HEALTH_HISTORY_WINDOW_MS', 120_000),
  },
};

export type PollerSettings = typeof config.poller;
