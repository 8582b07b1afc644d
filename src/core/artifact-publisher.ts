import { readdir } from 'fs/promises';
import { join } from 'path';
import { BaseLogger } from 'pino';
import { getLogger } from '../presentation/logging';
import { UploadError } from './errors';
import { ArtifactStore } from './interfaces/artifact-store';

export type PublishedArtifact = {
  name: string;
  key: string;
  location: string;
};

export function artifactKey(remotePrefix: string, name: string): string {
  return remotePrefix ? `${remotePrefix}/${name}` : name;
}

export class ArtifactPublisher {
  #artifactStore: ArtifactStore;
  #logger: BaseLogger;

  constructor({
    artifactStore,
    logger,
  }: {
    artifactStore: ArtifactStore;
    logger?: BaseLogger;
  }) {
    this.#artifactStore = artifactStore;
    this.#logger = logger ?? getLogger();
  }

  /**
   * Uploads every file directly under `artifactsDir`, one at a time and in
   * name order. The first failure stops the remaining uploads; objects already
   * written are left in place.
   */
  async publishAll(
    artifactsDir: string,
    remotePrefix: string,
  ): Promise<PublishedArtifact[]> {
    const entries = await readdir(artifactsDir, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();

    const published: PublishedArtifact[] = [];
    for (const name of names) {
      const key = artifactKey(remotePrefix, name);
      try {
        await this.#artifactStore.upload(join(artifactsDir, name), key);
      } catch (err) {
        this.#logger.error({ err, key }, 'Artifact upload failed');
        throw new UploadError(name, { cause: err });
      }
      this.#logger.info({ key }, 'Artifact uploaded');
      published.push({
        name,
        key,
        location: this.#artifactStore.locationFor(key),
      });
    }
    return published;
  }
}
