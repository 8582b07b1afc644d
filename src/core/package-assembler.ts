import archiver from 'archiver';
import { copy, move, pathExists } from 'fs-extra';
import { createWriteStream } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { BaseLogger } from 'pino';
import { getLogger } from '../presentation/logging';
import { generateArchiveName } from '../utils';

export class PackageAssembler {
  #logger: BaseLogger;

  constructor({ logger }: { logger?: BaseLogger } = {}) {
    this.#logger = logger ?? getLogger();
  }

  /**
   * Copies the function source tree into `destDir`, then each closure entry
   * beside it. Directory entries keep their structure; anything else is copied
   * as a plain file.
   */
  async stage(
    sourceDir: string,
    closure: string[],
    destDir: string,
  ): Promise<void> {
    if (!(await pathExists(sourceDir))) {
      throw new Error(`Source directory "${sourceDir}" does not exist.`);
    }
    if (!(await stat(sourceDir)).isDirectory()) {
      throw new Error(`Source path "${sourceDir}" is not a directory.`);
    }

    await mkdir(destDir, { recursive: true });
    await copy(sourceDir, destDir);
    await this.copyClosure(closure, destDir);
    this.#logger.trace({ sourceDir, destDir }, 'Staging complete');
  }

  async copyClosure(closure: string[], destDir: string): Promise<void> {
    for (const entry of closure) {
      await copy(entry, join(destDir, basename(entry)));
    }
    this.#logger.trace({ destDir, packages: closure.length }, 'Packages staged');
  }

  /**
   * Compresses everything under `stagedDir`, with paths relative to it, into a
   * randomly named archive and moves the archive into `artifactsDir`.
   * @returns the final path of the archive
   */
  async archive(stagedDir: string, artifactsDir: string): Promise<string> {
    const archiveName = generateArchiveName();
    const scratchPath = join(dirname(stagedDir), archiveName);
    const finalPath = join(artifactsDir, archiveName);

    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(scratchPath);
      const archive = archiver('zip');

      output.once('close', () => resolve());
      output.once('error', reject);
      archive.on('warning', reject);
      archive.on('error', reject);

      archive.pipe(output);
      archive.directory(stagedDir, false);
      archive.finalize().catch(reject);
    });

    await mkdir(artifactsDir, { recursive: true });
    await move(scratchPath, finalPath);
    this.#logger.debug({ archive: finalPath }, 'Archive created');
    return finalPath;
  }
}
