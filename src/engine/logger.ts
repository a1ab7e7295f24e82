import { getErrorMessage } from '../lib/errors.js';
import type { LoggingConfig, LogLevel, LogMetadata } from '../lib/types.js';

import { resolveLoggingConfig } from './config.js';

const LOG_PREFIX = '[dispatcher]';
const LEVEL_RANK = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const satisfies Record<LogLevel, number>;

const loggingConfig = resolveLoggingConfig();

function formatMetadata(meta?: LogMetadata): string {
  return meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata,
  timestamp: Date = new Date()
): string {
  return `[${timestamp.toISOString()}] ${level.toUpperCase()}: ${LOG_PREFIX} ${message}${formatMetadata(meta)}`;
}

export function shouldLog(level: LogLevel, config: LoggingConfig): boolean {
  if (!config.enabled) return false;
  return LEVEL_RANK[level] >= LEVEL_RANK[config.level];
}

function write(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (shouldLog(level, loggingConfig)) {
    process.stderr.write(`${formatLogEntry(level, message, meta)}\n`);
  }
}

export function logDebug(message: string, meta?: LogMetadata): void {
  write('debug', message, meta);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  write('info', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  write('warn', message, meta);
}

export function logError(message: string, error?: unknown): void {
  if (!shouldLog('error', loggingConfig)) return;

  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error === undefined
        ? {}
        : { error: getErrorMessage(error) };

  process.stderr.write(`${formatLogEntry('error', message, errorMeta)}\n`);
}
