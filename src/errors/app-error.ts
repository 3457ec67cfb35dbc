export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

// ============================================================================
// Cluster / collection errors
// ============================================================================

/** Cannot talk to the cluster at all. Fatal to the plugin that needed the client. */
export type ClientInitError = Readonly<{
  readonly _tag: 'ClientInit';
  readonly message: string;
  readonly cause?: unknown;
}>;

/** A single listing or fetch against the cluster API failed. */
export type ListError = Readonly<{
  readonly _tag: 'ListFailed';
  readonly resource: string;
  readonly namespace?: string;
  readonly status?: number;
  readonly message: string;
}>;

export type TimeoutError = Readonly<{
  readonly _tag: 'Timeout';
  readonly operation: string;
  readonly timeoutMs: number;
  readonly message: string;
}>;

export type StorageFailedError = Readonly<{
  readonly _tag: 'StorageFailed';
  readonly path: string;
  readonly message: string;
}>;

/** A plugin phase was invoked out of order, twice, or concurrently. */
export type LifecycleViolationError = Readonly<{
  readonly _tag: 'LifecycleViolation';
  readonly plugin: string;
  readonly phase: string;
  readonly state: string;
  readonly message: string;
}>;

/** Errors a monitor test may return from any of its phases. */
export type MonitorTestError =
  | ClientInitError
  | ListError
  | TimeoutError
  | StorageFailedError
  | UnexpectedError;

export type AppError =
  | ConfigInvalidError
  | UnexpectedError
  | ClientInitError
  | ListError
  | TimeoutError
  | StorageFailedError
  | LifecycleViolationError;
