import type { ILogger } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug: (msg, meta) => {
      if (enabled('debug')) {
        console.debug(`${prefix} ${msg}`, ...withMeta(meta));
      }
    },
    info: (msg, meta) => {
      if (enabled('info')) {
        console.info(`${prefix} ${msg}`, ...withMeta(meta));
      }
    },
    warn: (msg, meta) => {
      if (enabled('warn')) {
        console.warn(`${prefix} ${msg}`, ...withMeta(meta));
      }
    },
    error: (msg, error, meta) => {
      if (enabled('error')) {
        console.error(`${prefix} ${msg}`, ...(error ? [error] : []), ...withMeta(meta));
      }
    },
  };
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function withMeta(meta: Record<string, unknown> | undefined): unknown[] {
  return meta && Object.keys(meta).length > 0 ? [meta] : [];
}
