import pino, { type DestinationStream } from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';
import { resolveLogLevel } from './level.js';

/**
 * JSON lines on stderr, written synchronously so nothing is lost when the
 * CLI exits. Stdout is left to the report.
 */
export function createPinoLogger(
  level: LogLevel = resolveLogLevel(),
  destination: DestinationStream = pino.destination({ dest: 2, sync: true })
): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    destination
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly root = createPinoLogger();

  create(component: string): Logger {
    return this.root.child({ component });
  }
}

let preContainerRoot: Logger | undefined;

/**
 * Component logger for code that runs before the container exists
 * (the CLI entry point). Shares one root across calls.
 */
export function createBootstrapLogger(component: string): Logger {
  preContainerRoot ??= createPinoLogger();
  return preContainerRoot.child({ component });
}
