import type { LogLevel } from './config.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const isLevel = (v: string | undefined): v is LogLevel => v !== undefined && v in RANK;

const fromEnv = process.env.LOG_LEVEL;
let threshold: LogLevel = isLevel(fromEnv) ? fromEnv : 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
};

const enabled = (level: LogLevel) => RANK[level] >= RANK[threshold];

export function createLogger(scope: string): Logger {
  const fmt = (msg: string) => `[${scope}] ${msg}`;
  return {
    debug: msg => { if (enabled('debug')) console.debug(fmt(msg)); },
    info: msg => { if (enabled('info')) console.log(fmt(msg)); },
    warn: msg => { if (enabled('warn')) console.warn(fmt(msg)); },
    error: (msg, err) => {
      if (!enabled('error')) return;
      if (err === undefined) console.error(fmt(msg));
      else console.error(fmt(msg), err instanceof Error ? err.message : err);
    }
  };
}
