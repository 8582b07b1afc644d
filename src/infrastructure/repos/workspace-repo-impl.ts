import { mkdir, mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join, sep } from 'path';
import { BaseLogger } from 'pino';
import { rm } from 'shelljs';
import { Workspace, WorkspaceRepo } from '../../core/interfaces/workspace-repo';
import { getLogger } from '../../presentation/logging';
import { safeConfigGet } from '../../utils';

export class WorkspaceRepoImpl implements WorkspaceRepo {
  #logger: BaseLogger;
  #root: string;

  constructor({ logger, root }: { logger?: BaseLogger; root?: string } = {}) {
    this.#logger = logger ?? getLogger();
    this.#root = root || safeConfigGet('workspace.root', '') || tmpdir();
  }

  async createWorkspace(): Promise<Workspace> {
    await mkdir(this.#root, { recursive: true });
    const root = await mkdtemp(`${this.#root}${sep}pyfn-packager-`);
    const workspace: Workspace = {
      root,
      functionsDir: join(root, 'functions'),
      artifactsDir: join(root, 'artifacts'),
    };
    await mkdir(workspace.functionsDir);
    await mkdir(workspace.artifactsDir);
    return workspace;
  }

  async createFunctionDirectory(
    workspace: Workspace,
    functionName: string,
  ): Promise<string> {
    const dir = join(workspace.functionsDir, functionName);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  removeWorkspace(workspace: Workspace): Promise<void> {
    return new Promise((resolve) => {
      rm('-rf', workspace.root);
      this.#logger.trace({ workspace: workspace.root }, 'Workspace removed');
      resolve();
    });
  }
}
