import { pathExists } from 'fs-extra';
import { join } from 'path';
import { BaseLogger } from 'pino';
import { exec, which } from 'shelljs';
import { ToolUnavailableError } from '../../core/errors';
import {
  BuildContext,
  DependencyManager,
  Environment,
} from '../../core/interfaces/dependency-manager';
import { getLogger } from '../../presentation/logging';
import { safeConfigGet } from '../../utils';

const PACKAGES_DIR_QUERY =
  'run python -c "import sysconfig; print(sysconfig.get_paths()[\'purelib\'])"';

/**
 * Drives pipenv. Every invocation runs in the context directory it is given,
 * with the environment created inside that directory.
 */
export class PipenvDependencyManager implements DependencyManager {
  #command: string;
  #logger: BaseLogger;

  constructor({
    command,
    logger,
  }: { command?: string; logger?: BaseLogger } = {}) {
    this.#command =
      command ?? safeConfigGet('dependencyManager.command', 'pipenv');
    this.#logger = logger ?? getLogger();
  }

  ensureAvailable(): Promise<void> {
    if (!which(this.#command)) {
      return Promise.reject(
        new ToolUnavailableError(
          `Dependency manager "${this.#command}" was not found on the PATH.`,
        ),
      );
    }
    return Promise.resolve();
  }

  async create(context: BuildContext, runtime: string): Promise<void> {
    await this.#run(`--python ${runtime}`, context);
  }

  async locate(context: BuildContext): Promise<Environment> {
    const root = await this.#run('--venv', context);
    const packagesDir = await this.#run(PACKAGES_DIR_QUERY, context);
    return { context, root, packagesDir };
  }

  async install(environment: Environment): Promise<void> {
    const { context } = environment;
    const requirements = join(context.directory, 'requirements.txt');
    await this.#run(
      (await pathExists(requirements))
        ? 'install -r requirements.txt'
        : 'install',
      context,
    );
  }

  async destroy(environment: Environment): Promise<void> {
    await this.#run('--rm', environment.context);
  }

  #run(args: string, context: BuildContext): Promise<string> {
    const command = `${this.#command} ${args}`;
    this.#logger.debug({ command, cwd: context.directory }, 'Running');

    return new Promise((resolve, reject) => {
      exec(
        command,
        {
          cwd: context.directory,
          env: {
            ...process.env,
            PIPENV_VENV_IN_PROJECT: '1',
            PIPENV_IGNORE_VIRTUALENVS: '1',
            PIPENV_NOSPIN: '1',
            PIPENV_YES: '1',
          },
          silent: true,
          async: true,
        },
        (code, stdout, stderr) => {
          if (code !== 0) {
            this.#logger.warn({ command, code, stderr }, 'Command failed');
            reject(
              new Error(`"${command}" exited with code ${code}: ${stderr.trim()}`),
            );
            return;
          }
          resolve(stdout.trim());
        },
      );
    });
  }
}
