import * as fs from 'fs/promises';
import * as path from 'path';
import { ResultAsync } from 'neverthrow';
import type { ArtifactStorePort } from '../../ports/artifact-store.port.js';
import type { StorageFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';

/**
 * Writes artifacts as files under one directory, creating it on first write.
 */
export class LocalArtifactStore implements ArtifactStorePort {
  constructor(private readonly directory: string) {}

  writeText(fileName: string, content: string): ResultAsync<void, StorageFailedError> {
    const target = path.join(this.directory, path.basename(fileName));
    return ResultAsync.fromPromise(
      fs.mkdir(this.directory, { recursive: true }).then(() => fs.writeFile(target, content, 'utf8')),
      (e) => Err.storageFailed(target, e instanceof Error ? e.message : String(e))
    );
  }
}
