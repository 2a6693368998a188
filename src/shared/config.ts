import { OCR_TIMEOUT_MS } from './file/security';
import { LOG_LEVEL_ENV, parseLogLevel, type LogLevel } from './log';

export const OCR_LANG_PATH_ENV = 'SHOTVEIL_OCR_LANG_PATH';
export const OCR_TIMEOUT_ENV = 'SHOTVEIL_OCR_TIMEOUT_MS';

export interface RuntimeConfig {
  logLevel: LogLevel;
  ocrLangPath?: string;
  ocrTimeoutMs: number;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${OCR_TIMEOUT_ENV} must be a positive integer, received "${raw}".`);
  }
  return parsed;
}

export function readRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const langPath = env[OCR_LANG_PATH_ENV]?.trim();

  return {
    logLevel: parseLogLevel(env[LOG_LEVEL_ENV]),
    ocrLangPath: langPath ? langPath : undefined,
    ocrTimeoutMs: parsePositiveInteger(env[OCR_TIMEOUT_ENV], OCR_TIMEOUT_MS)
  };
}
