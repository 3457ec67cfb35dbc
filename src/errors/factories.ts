import type {
  AppError,
  ClientInitError,
  ConfigIssue,
  ConfigInvalidError,
  LifecycleViolationError,
  ListError,
  StorageFailedError,
  TimeoutError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),

  clientInit: (message: string, cause?: unknown): ClientInitError => ({
    _tag: 'ClientInit',
    message: `Cannot create cluster client: ${message}`,
    cause,
  }),

  listFailed: (
    resource: string,
    details: string,
    options: { readonly namespace?: string; readonly status?: number } = {}
  ): ListError => ({
    _tag: 'ListFailed',
    resource,
    namespace: options.namespace,
    status: options.status,
    message: options.namespace !== undefined
      ? `Failed to list ${resource} in namespace "${options.namespace}": ${details}`
      : `Failed to list ${resource}: ${details}`,
  }),

  timeout: (operation: string, timeoutMs: number): TimeoutError => ({
    _tag: 'Timeout',
    operation,
    timeoutMs,
    message: `${operation} did not respond within ${timeoutMs}ms`,
  }),

  storageFailed: (path: string, details: string): StorageFailedError => ({
    _tag: 'StorageFailed',
    path,
    message: `Failed to write ${path}: ${details}`,
  }),

  lifecycleViolation: (plugin: string, phase: string, state: string, details: string): LifecycleViolationError => ({
    _tag: 'LifecycleViolation',
    plugin,
    phase,
    state,
    message: `Monitor test "${plugin}" cannot run ${phase} in state ${state}: ${details}`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
