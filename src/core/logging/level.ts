import type { LogLevel } from './types.js';

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Resolve the log level from CLUSTERMON_LOG_LEVEL.
 *
 * trace | debug | info | warn | error | fatal | silent. Default: info.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env['CLUSTERMON_LOG_LEVEL']?.toLowerCase();
  const match = VALID_LEVELS.find((level) => level === raw);
  return match ?? 'info';
}
