export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function log(message: string, level: LogLevel = 'info'): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const ts = new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  const line = `[${ts}] ${message}`;
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}
