/**
 * Paths pino replaces with [REDACTED]. Bearer tokens reach the logger
 * through config dumps and request headers.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'bearerToken',
    'authorization',
    '*.token',
    '*.bearerToken',
    'config.cluster.bearerToken',
    'cluster.bearerToken',
    'headers.authorization',
    'headers.Authorization',
  ],
  censor: '[REDACTED]',
};
