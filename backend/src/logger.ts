/* eslint-disable no-console */
import { config, type LogLevel } from './config.js';

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: unknown) => void;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(scope: string, level: LogLevel = config.logLevel): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const tag = `[${scope}]`;
  return {
    debug(msg) {
      if (enabled('debug')) console.debug(tag, msg);
    },
    info(msg) {
      if (enabled('info')) console.info(tag, msg);
    },
    warn(msg) {
      if (enabled('warn')) console.warn(tag, msg);
    },
    error(msg, err) {
      if (!enabled('error')) return;
      if (err === undefined) console.error(tag, msg);
      else console.error(tag, msg, err);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
