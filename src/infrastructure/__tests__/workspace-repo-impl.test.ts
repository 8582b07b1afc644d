import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { pathExists } from 'fs-extra';
import { tmpdir } from 'os';
import { basename, join, sep } from 'path';
import { BaseLogger } from 'pino';
import { WorkspaceRepoImpl } from '../repos/workspace-repo-impl';

const fakeLogger = {
  trace: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  fatal: jest.fn(),
};

describe('workspace-repo-impl', () => {
  let root: string;
  let repo: WorkspaceRepoImpl;

  beforeEach(async () => {
    root = await mkdtemp(`${tmpdir()}${sep}workspace-repo-`);
    repo = new WorkspaceRepoImpl({
      logger: fakeLogger as unknown as BaseLogger,
      root: join(root, 'builds'),
    });
  });

  afterEach(async () => {
    jest.clearAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe('createWorkspace', () => {
    it('creates a private directory with functions and artifacts subdirectories', async () => {
      // Act
      const workspace = await repo.createWorkspace();

      // Assert
      expect(basename(workspace.root)).toMatch(/^pyfn-packager-/);
      expect(workspace.functionsDir).toBe(join(workspace.root, 'functions'));
      expect(workspace.artifactsDir).toBe(join(workspace.root, 'artifacts'));
      expect((await readdir(workspace.root)).sort()).toEqual([
        'artifacts',
        'functions',
      ]);
    });

    it('creates a distinct workspace every time', async () => {
      // Act
      const first = await repo.createWorkspace();
      const second = await repo.createWorkspace();

      // Assert
      expect(first.root).not.toBe(second.root);
    });
  });

  describe('createFunctionDirectory', () => {
    it('creates the directory under the functions directory', async () => {
      // Arrange
      const workspace = await repo.createWorkspace();

      // Act
      const dir = await repo.createFunctionDirectory(workspace, 'OrdersFunction');

      // Assert
      expect(dir).toBe(join(workspace.functionsDir, 'OrdersFunction'));
      expect(await pathExists(dir)).toBe(true);
    });
  });

  describe('removeWorkspace', () => {
    it('removes the whole workspace tree', async () => {
      // Arrange
      const workspace = await repo.createWorkspace();
      await writeFile(join(workspace.artifactsDir, 'a.zip'), 'a');

      // Act
      await repo.removeWorkspace(workspace);

      // Assert
      expect(await pathExists(workspace.root)).toBe(false);
    });
  });
});
