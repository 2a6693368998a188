export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type LevelNum = 0 | 1 | 2 | 3 | 4 | 5;

const LEVELS: Record<LogLevel, LevelNum> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export const LOG_LEVEL_ENV = 'SHOTVEIL_LOG_LEVEL';

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function parseLogLevel(raw: unknown): LogLevel {
  const normalized = String(raw ?? '').trim().toLowerCase();
  if (!normalized) {
    return 'info';
  }
  if (isLogLevel(normalized)) {
    return normalized;
  }
  if (normalized === 'none' || normalized === 'off') {
    return 'silent';
  }
  if (normalized === 'warning') {
    return 'warn';
  }
  return 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[parseLogLevel(process.env[LOG_LEVEL_ENV])] >= LEVELS[level];
}

function safeExtra(extra: unknown): unknown {
  if (extra == null) {
    return undefined;
  }
  if (typeof extra === 'string' || typeof extra === 'number' || typeof extra === 'boolean') {
    return extra;
  }
  if (extra instanceof Error) {
    return extra.message;
  }
  try {
    return JSON.parse(JSON.stringify(extra));
  } catch {
    return String(extra);
  }
}

export function log(level: Exclude<LogLevel, 'silent'>, message: string, extra?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }

  const payload = safeExtra(extra);
  const prefix = `[shotveil] ${message}`;
  const args = payload === undefined ? [prefix] : [prefix, payload];

  try {
    if (level === 'error') console.error(...args);
    else if (level === 'warn') console.warn(...args);
    else if (level === 'info') console.info(...args);
    else console.debug(...args);
  } catch {
    // logging must not throw
  }
}
