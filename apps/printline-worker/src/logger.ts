import type { LogLevel } from "./config.js";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Console logger that prefixes every line with a bracketed subsystem tag */
export function createLogger(tag: string, level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => LEVELS[l] >= LEVELS[level];
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
