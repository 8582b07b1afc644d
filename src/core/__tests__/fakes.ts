import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { pathExists } from 'fs-extra';
import { ToolUnavailableError } from '../errors';
import { ArtifactStore } from '../interfaces/artifact-store';
import {
  BuildContext,
  DependencyManager,
  Environment,
} from '../interfaces/dependency-manager';

export const fakeLogger = {
  trace: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  fatal: jest.fn(),
  silent: jest.fn(),
  level: 'trace',
};

/**
 * Stands in for a real dependency manager. Environments are plain
 * directories; "installing" writes one directory per package.
 */
export class FakeDependencyManager implements DependencyManager {
  readonly calls: string[] = [];

  baseline: string[] = ['pip', 'setuptools'];

  installed: string[] = ['requests', 'setuptools', 'six.py', 'urllib3'];

  available = true;

  installError: Error | undefined;

  async ensureAvailable(): Promise<void> {
    this.calls.push('ensureAvailable');
    if (!this.available) {
      throw new ToolUnavailableError('fake tool missing');
    }
  }

  async create(context: BuildContext, runtime: string): Promise<void> {
    this.calls.push(`create:${runtime}`);
    const environment = this.#environmentFor(context);
    await mkdir(environment.packagesDir, { recursive: true });
    for (const name of this.baseline) {
      await this.#writePackage(environment, name);
    }
    if (!(await pathExists(join(context.directory, 'Pipfile')))) {
      await writeFile(join(context.directory, 'Pipfile'), '[packages]\n');
    }
  }

  async locate(context: BuildContext): Promise<Environment> {
    this.calls.push('locate');
    return this.#environmentFor(context);
  }

  async install(environment: Environment): Promise<void> {
    this.calls.push('install');
    if (this.installError) {
      throw this.installError;
    }
    for (const name of this.installed) {
      await this.#writePackage(environment, name);
    }
  }

  async destroy(environment: Environment): Promise<void> {
    this.calls.push('destroy');
    await rm(environment.root, { recursive: true, force: true });
  }

  #environmentFor(context: BuildContext): Environment {
    const root = join(context.directory, '.venv');
    return {
      context,
      root,
      packagesDir: join(root, 'lib', 'site-packages'),
    };
  }

  async #writePackage(environment: Environment, name: string) {
    if (name.endsWith('.py')) {
      await writeFile(join(environment.packagesDir, name), `# ${name}\n`);
      return;
    }
    await mkdir(join(environment.packagesDir, name), { recursive: true });
    await writeFile(
      join(environment.packagesDir, name, '__init__.py'),
      `# ${name}\n`,
    );
  }
}

export class FakeArtifactStore implements ArtifactStore {
  readonly uploads: Array<{ localPath: string; key: string }> = [];

  /** 1-based index of the upload that fails, if any. */
  failOnUpload: number | undefined;

  async upload(localPath: string, key: string): Promise<void> {
    this.uploads.push({ localPath, key });
    if (this.uploads.length === this.failOnUpload) {
      throw new Error('access denied');
    }
  }

  locationFor(key: string): string {
    return `s3://fake-bucket/${key}`;
  }
}
