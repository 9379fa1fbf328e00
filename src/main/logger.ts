import type { LogLevel } from '../shared/models';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minimumLevel: LogLevel = 'info';

/**
 * Sets the lowest level that still reaches the console.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function log(msg: string, level: LogLevel = 'info'): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${msg}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (msg: string) => log(msg, 'debug'),
  info: (msg: string) => log(msg, 'info'),
  warn: (msg: string) => log(msg, 'warn'),
  error: (msg: string) => log(msg, 'error')
};
