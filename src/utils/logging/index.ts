/**
 * Logger
 *
 * Writes timestamped, level-tagged lines to stderr. stdout is reserved for the
 * MCP stdio transport, so nothing here may print to it.
 */

export type LogLevel = 'debug' | 'info' | 'notice' | 'warn' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warn: 3,
  warning: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveInitialLevel(): LogLevel {
  const raw = process.env.LANETRACE_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return 'info';
}

const threshold: LogLevel = resolveInitialLevel();

export function log(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level.toUpperCase()}] ${message}`);
}
