import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { ArtifactStorePort } from '../../src/ports/artifact-store.port.js';
import type { StorageFailedError } from '../../src/errors/app-error.js';
import { Err } from '../../src/errors/factories.js';

/**
 * In-memory artifact store. Set `failWith` to make every write fail.
 */
export class InMemoryArtifactStore implements ArtifactStorePort {
  readonly files = new Map<string, string>();
  failWith: string | undefined;

  writeText(fileName: string, content: string): ResultAsync<void, StorageFailedError> {
    if (this.failWith !== undefined) {
      return errAsync(Err.storageFailed(fileName, this.failWith));
    }
    this.files.set(fileName, content);
    return okAsync(undefined);
  }
}
