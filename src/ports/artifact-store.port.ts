import type { ResultAsync } from 'neverthrow';
import type { StorageFailedError } from '../errors/app-error.js';

/**
 * Port: opaque run artifacts (interval dumps, reports).
 */
export interface ArtifactStorePort {
  writeText(fileName: string, content: string): ResultAsync<void, StorageFailedError>;
}
