import { copy, pathExists } from 'fs-extra';
import { readdir } from 'fs/promises';
import { difference } from 'lodash';
import { join } from 'path';
import { BaseLogger } from 'pino';
import { getLogger } from '../presentation/logging';
import { BuildError, PackagingError } from './errors';
import { FunctionDescriptor } from './function-discovery';
import {
  BuildContext,
  DependencyManager,
  Environment,
} from './interfaces/dependency-manager';

/**
 * Produces the third-party packages one function needs, installed into an
 * isolated environment of its own and reduced to what a fresh environment
 * does not already provide.
 */
export class DependencyEnvironmentBuilder {
  #dependencyManager: DependencyManager;
  #logger: BaseLogger;

  constructor({
    dependencyManager,
    logger,
  }: {
    dependencyManager: DependencyManager;
    logger?: BaseLogger;
  }) {
    this.#dependencyManager = dependencyManager;
    this.#logger = logger ?? getLogger();
  }

  async hasDependencies(fn: FunctionDescriptor): Promise<boolean> {
    const manifests = await fn.tools.findManifests(fn.sourceDir);
    return manifests.length > 0;
  }

  /**
   * Copies the function's manifests, with their lock and included files, into
   * `contextDir` and provisions an empty environment there. Files the
   * dependency manager writes stay out of the function source.
   */
  async createEnvironment(
    fn: FunctionDescriptor,
    contextDir: string,
  ): Promise<Environment> {
    const context: BuildContext = { directory: contextDir };
    const manifests = await fn.tools.findManifests(fn.sourceDir);
    const supportFiles = await fn.tools.findSupportFiles(
      fn.sourceDir,
      manifests,
    );
    for (const file of [...manifests, ...supportFiles]) {
      await copy(join(fn.sourceDir, file), join(contextDir, file));
    }

    await this.#dependencyManager.create(
      context,
      fn.tools.interpreterVersion(fn.runtime),
    );
    return this.#dependencyManager.locate(context);
  }

  async baselinePackages(environment: Environment): Promise<Set<string>> {
    return new Set(await this.#listPackages(environment, false));
  }

  install(environment: Environment): Promise<void> {
    return this.#dependencyManager.install(environment);
  }

  /**
   * Absolute paths of installed package entries that are not in `baseline`.
   * Rejects when the environment's package directory does not exist.
   */
  async closure(
    environment: Environment,
    baseline: Set<string>,
  ): Promise<string[]> {
    const installed = await this.#listPackages(environment, true);
    return difference(installed, [...baseline]).map((entry) =>
      join(environment.packagesDir, entry),
    );
  }

  async destroy(environment: Environment): Promise<void> {
    try {
      await this.#dependencyManager.destroy(environment);
    } catch (err) {
      this.#logger.warn(
        { err, environment: environment.root },
        'Failed to remove dependency environment',
      );
    }
  }

  /**
   * Runs the full environment lifecycle for one function and hands the
   * resulting closure to `consume` while the environment still exists. The
   * environment is torn down once `consume` resolves; on failure it is left in
   * place for inspection.
   */
  async withDependencyClosure(
    fn: FunctionDescriptor,
    contextDir: string,
    consume: (closure: string[]) => Promise<void>,
  ): Promise<void> {
    const { environment, closure } = await this.#resolve(fn, contextDir);
    await consume(closure);
    await this.destroy(environment);
  }

  async #resolve(
    fn: FunctionDescriptor,
    contextDir: string,
  ): Promise<{ environment: Environment; closure: string[] }> {
    try {
      const environment = await this.createEnvironment(fn, contextDir);
      const baseline = await this.baselinePackages(environment);
      this.#logger.debug(
        { function: fn.name, baseline: baseline.size },
        'Dependency environment created',
      );

      await this.install(environment);
      const closure = await this.closure(environment, baseline);
      this.#logger.debug(
        { function: fn.name, packages: closure.length },
        'Dependencies installed',
      );
      return { environment, closure };
    } catch (err) {
      if (err instanceof PackagingError) {
        throw err;
      }
      throw new BuildError(fn.name, 'dependency installation failed', {
        cause: err,
      });
    }
  }

  async #listPackages(
    environment: Environment,
    required: boolean,
  ): Promise<string[]> {
    if (!(await pathExists(environment.packagesDir))) {
      if (required) {
        throw new Error(
          `Package directory "${environment.packagesDir}" does not exist after install.`,
        );
      }
      return [];
    }
    const entries = await readdir(environment.packagesDir);
    return entries.sort();
  }
}
