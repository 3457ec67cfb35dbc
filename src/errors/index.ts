export type {
  AppError,
  ClientInitError,
  ConfigIssue,
  ConfigInvalidError,
  LifecycleViolationError,
  ListError,
  MonitorTestError,
  StorageFailedError,
  TimeoutError,
  UnexpectedError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
