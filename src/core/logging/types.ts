import type { Logger as PinoLogger } from 'pino';

/**
 * pino's Logger, data first:
 *   logger.info({ namespace: 'kube-system' }, 'Classified pods');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
