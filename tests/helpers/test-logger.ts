import { pino } from 'pino';
import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';

/**
 * Logger that keeps every entry in memory as parsed JSON.
 */
export function createCapturingLogger(): { readonly logger: Logger; readonly entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'trace' },
    {
      write: (line: string) => {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null) entries.push(Object.fromEntries(Object.entries(parsed)));
      },
    }
  );
  return { logger, entries };
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Logger factory for tests: every component logger is a child of one
 * capturing root.
 */
export class CapturingLoggerFactory implements ILoggerFactory {
  private readonly captured = createCapturingLogger();

  get entries(): readonly Record<string, unknown>[] {
    return this.captured.entries;
  }

  create(component: string): Logger {
    return this.captured.logger.child({ component });
  }
}
