export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { PinoLoggerFactory, createPinoLogger, createBootstrapLogger } from './create-logger.js';
export { resolveLogLevel } from './level.js';
