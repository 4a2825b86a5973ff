/**
 * Diagnostics go to stderr with a fixed prefix so stdout stays free for
 * whatever the caller pipes there.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const XRAYDB_LOG_LEVEL_ENV = 'XRAYDB_LOG_LEVEL';

const LOG_PREFIX = '[xraydb]';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function getLogLevel(): LogLevel {
  const raw = process.env[XRAYDB_LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) return 'warn';
  return raw;
}

function emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[getLogLevel()]) return;
  const line = `${LOG_PREFIX} ${level.toUpperCase()} ${message}`;
  if (context && Object.keys(context).length > 0) {
    console.error(line, JSON.stringify(context));
  } else {
    console.error(line);
  }
}

export const log = {
  debug: (message: string, context?: Record<string, unknown>) => emit('debug', message, context),
  info: (message: string, context?: Record<string, unknown>) => emit('info', message, context),
  warn: (message: string, context?: Record<string, unknown>) => emit('warn', message, context),
  error: (message: string, context?: Record<string, unknown>) => emit('error', message, context),
};
