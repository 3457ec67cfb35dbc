import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/** One human-readable block per error, for the CLI and for failed test output. */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid':
      return [
        error.message,
        '',
        ...(error.issues.length > 0 ? error.issues.map((i) => `  - ${i.path}: ${i.message}`) : ['  - (no details)']),
      ].join('\n');
    case 'Unexpected':
      return withCause(error.message, error.cause);
    case 'ClientInit':
      return error.cause === undefined ? error.message : withCause(error.message, error.cause);
    case 'ListFailed':
      return error.status === undefined ? error.message : `${error.message} (HTTP ${error.status})`;
    case 'Timeout':
    case 'StorageFailed':
    case 'LifecycleViolation':
      return error.message;
    default:
      return assertNever(error);
  }
}

function withCause(message: string, cause: unknown): string {
  return `${message}\nCause: ${describeCause(cause)}`;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
