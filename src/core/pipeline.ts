import { writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { DateTime } from 'luxon';
import { trim } from 'lodash';
import { BaseLogger } from 'pino';
import { getLogger } from '../presentation/logging';
import { safeConfigGet } from '../utils';
import {
  ArtifactPublisher,
  artifactKey,
  PublishedArtifact,
} from './artifact-publisher';
import { DependencyEnvironmentBuilder } from './dependency-environment-builder';
import { BuildError, PackagingError } from './errors';
import { discoverFunctions, FunctionDescriptor } from './function-discovery';
import { ArtifactStore } from './interfaces/artifact-store';
import { DependencyManager } from './interfaces/dependency-manager';
import { Workspace, WorkspaceRepo } from './interfaces/workspace-repo';
import { PackageAssembler } from './package-assembler';
import {
  loadTemplateFile,
  serializeTemplate,
  setCodeLocation,
  TemplateDocument,
} from './template-model';

export type PipelineState =
  | 'INIT'
  | 'TEMPLATE_LOADED'
  | 'FUNCTIONS_DISCOVERED'
  | 'SOURCE_COPIED'
  | 'DEPENDENCIES_RESOLVED'
  | 'ARCHIVED'
  | 'TEMPLATE_PATCHED'
  | 'ARTIFACTS_UPLOADED'
  | 'TEMPLATE_SERIALIZED'
  | 'CLEANUP'
  | 'DONE'
  | 'ABORTED';

export type PackageRunOptions = {
  templatePath: string;
  /** When omitted the rewritten template is only returned. */
  outputPath?: string;
  keepWorkspace?: boolean;
};

export type PackagedFunction = {
  name: string;
  archivePath: string;
  location: string;
};

export type PackageRunResult = {
  template: string;
  remotePrefix: string;
  functions: PackagedFunction[];
  /** Uploaded objects, in upload order. */
  artifacts: PublishedArtifact[];
  workspace: string;
};

export function buildRemotePrefix(now: DateTime, keyPrefix?: string): string {
  const stamp = now.toUTC().toFormat("yyyyLLdd'T'HHmmssSSS'Z'");
  const base = trim(keyPrefix ?? '', '/');
  return base ? `${base}/${stamp}` : stamp;
}

/**
 * Packages every function a template declares: one function at a time, in
 * declaration order, followed by a single upload pass and the rewrite of the
 * template. Any failure ends the run and leaves the workspace on disk.
 */
export class PackagePipeline {
  #artifactStore: ArtifactStore;
  #dependencyManager: DependencyManager;
  #environmentBuilder: DependencyEnvironmentBuilder;
  #keyPrefix: string;
  #logger: BaseLogger;
  #now: () => DateTime;
  #packageAssembler: PackageAssembler;
  #publisher: ArtifactPublisher;
  #workspaceRepo: WorkspaceRepo;

  state: PipelineState = 'INIT';

  constructor({
    artifactStore,
    dependencyManager,
    workspaceRepo,
    environmentBuilder,
    keyPrefix,
    logger,
    now,
    packageAssembler,
    publisher,
  }: {
    artifactStore: ArtifactStore;
    dependencyManager: DependencyManager;
    workspaceRepo: WorkspaceRepo;
    environmentBuilder?: DependencyEnvironmentBuilder;
    keyPrefix?: string;
    logger?: BaseLogger;
    now?: () => DateTime;
    packageAssembler?: PackageAssembler;
    publisher?: ArtifactPublisher;
  }) {
    this.#logger = logger ?? getLogger();
    this.#artifactStore = artifactStore;
    this.#dependencyManager = dependencyManager;
    this.#workspaceRepo = workspaceRepo;
    this.#environmentBuilder =
      environmentBuilder ??
      new DependencyEnvironmentBuilder({
        dependencyManager,
        logger: this.#logger,
      });
    this.#keyPrefix = keyPrefix ?? safeConfigGet('artifacts.keyPrefix', '');
    this.#now = now ?? (() => DateTime.utc());
    this.#packageAssembler =
      packageAssembler ?? new PackageAssembler({ logger: this.#logger });
    this.#publisher =
      publisher ??
      new ArtifactPublisher({ artifactStore, logger: this.#logger });
  }

  async run({
    templatePath,
    outputPath,
    keepWorkspace,
  }: PackageRunOptions): Promise<PackageRunResult> {
    this.#transition('INIT');
    await this.#dependencyManager.ensureAvailable();

    const workspace = await this.#workspaceRepo.createWorkspace();
    this.#logger.debug({ workspace: workspace.root }, 'Workspace created');

    let result: PackageRunResult;
    try {
      result = await this.#execute(workspace, templatePath, outputPath);
    } catch (err) {
      this.#transition('ABORTED');
      this.#logger.error(
        { workspace: workspace.root },
        'Packaging aborted. Workspace retained for inspection.',
      );
      throw err;
    }

    this.#transition('CLEANUP');
    if (keepWorkspace) {
      this.#logger.info({ workspace: workspace.root }, 'Workspace retained');
    } else {
      await this.#workspaceRepo.removeWorkspace(workspace);
    }
    this.#transition('DONE');
    return result;
  }

  async #execute(
    workspace: Workspace,
    templatePath: string,
    outputPath: string | undefined,
  ): Promise<PackageRunResult> {
    const resolvedTemplatePath = resolve(templatePath);
    const doc = await loadTemplateFile(resolvedTemplatePath);
    this.#transition('TEMPLATE_LOADED');

    const functions = discoverFunctions(
      doc,
      dirname(resolvedTemplatePath),
      this.#logger,
    );
    this.#transition('FUNCTIONS_DISCOVERED');
    this.#logger.info(
      { functions: functions.map((fn) => fn.name) },
      'Functions discovered',
    );

    const remotePrefix = buildRemotePrefix(this.#now(), this.#keyPrefix);
    const packaged: PackagedFunction[] = [];
    for (const fn of functions) {
      packaged.push(
        await this.#packageFunction(fn, workspace, remotePrefix, doc),
      );
    }

    const artifacts = await this.#publisher.publishAll(
      workspace.artifactsDir,
      remotePrefix,
    );
    this.#transition('ARTIFACTS_UPLOADED');

    const template = serializeTemplate(doc);
    if (outputPath) {
      await writeFile(outputPath, template);
      this.#logger.info({ outputPath }, 'Template written');
    }
    this.#transition('TEMPLATE_SERIALIZED');

    return {
      template,
      remotePrefix,
      functions: packaged,
      artifacts,
      workspace: workspace.root,
    };
  }

  async #packageFunction(
    fn: FunctionDescriptor,
    workspace: Workspace,
    remotePrefix: string,
    doc: TemplateDocument,
  ): Promise<PackagedFunction> {
    this.#logger.info(
      { function: fn.name, runtime: fn.runtime },
      'Packaging function',
    );
    try {
      const functionDir = await this.#workspaceRepo.createFunctionDirectory(
        workspace,
        fn.name,
      );
      const stagingDir = join(functionDir, 'package');

      await this.#packageAssembler.stage(fn.sourceDir, [], stagingDir);
      this.#transition('SOURCE_COPIED');

      if (await this.#environmentBuilder.hasDependencies(fn)) {
        await this.#environmentBuilder.withDependencyClosure(
          fn,
          join(functionDir, 'env'),
          (closure) => this.#packageAssembler.copyClosure(closure, stagingDir),
        );
        this.#transition('DEPENDENCIES_RESOLVED');
      }

      const archivePath = await this.#packageAssembler.archive(
        stagingDir,
        workspace.artifactsDir,
      );
      this.#transition('ARCHIVED');

      const location = this.#artifactStore.locationFor(
        artifactKey(remotePrefix, basename(archivePath)),
      );
      setCodeLocation(doc, fn.name, location);
      this.#transition('TEMPLATE_PATCHED');

      return { name: fn.name, archivePath, location };
    } catch (err) {
      if (err instanceof PackagingError) {
        throw err;
      }
      throw new BuildError(
        fn.name,
        err instanceof Error ? err.message : String(err),
        { cause: err },
      );
    }
  }

  #transition(state: PipelineState) {
    this.state = state;
    this.#logger.trace({ state }, 'Pipeline state changed');
  }
}
