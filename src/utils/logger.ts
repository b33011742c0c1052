import { getConfig, LogLevel } from './config';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[getConfig().logLevel];
}

function format(level: string, message: string): string {
  return `${new Date().toISOString()} [${level}] ${message}`;
}

/**
 * Logs debug messages to stdout.
 * @param message Message to log.
 * @param meta Optional metadata to include.
 */
export function debug(message: string, meta?: unknown): void {
  if (!enabled('debug')) return;
  // eslint-disable-next-line no-console
  console.debug(format('DEBUG', message), meta ?? '');
}

/**
 * Logs informational messages to stdout.
 * @param message Message to log.
 * @param meta Optional metadata to include.
 */
export function info(message: string, meta?: unknown): void {
  if (!enabled('info')) return;
  // eslint-disable-next-line no-console
  console.log(format('INFO', message), meta ?? '');
}

/**
 * Logs warning messages to stderr.
 * @param message Message to log.
 * @param meta Optional metadata to include.
 */
export function warn(message: string, meta?: unknown): void {
  if (!enabled('warn')) return;
  // eslint-disable-next-line no-console
  console.warn(format('WARN', message), meta ?? '');
}

/**
 * Logs error messages to stderr.
 * @param message Message to log.
 * @param meta Optional metadata to include.
 */
export function error(message: string, meta?: unknown): void {
  if (!enabled('error')) return;
  // eslint-disable-next-line no-console
  console.error(format('ERROR', message), meta ?? '');
}
