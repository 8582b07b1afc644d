import { asFunction, asValue, AwilixContainer, Lifetime } from 'awilix';
import { BaseLogger } from 'pino';
import { ArtifactStore } from '../core/interfaces/artifact-store';
import { DependencyManager } from '../core/interfaces/dependency-manager';
import { WorkspaceRepo } from '../core/interfaces/workspace-repo';
import {
  PackagePipeline,
  PackageRunOptions,
  PackageRunResult,
} from '../core/pipeline';
import { PipenvDependencyManager } from '../infrastructure/repos/pipenv-dependency-manager';
import { S3ArtifactStore } from '../infrastructure/repos/s3-artifact-store';
import { WorkspaceRepoImpl } from '../infrastructure/repos/workspace-repo-impl';

export type PackagerSettings = {
  bucket?: string;
  region?: string;
  keyPrefix?: string;
};

export type Packager = {
  run: (options: PackageRunOptions) => Promise<PackageRunResult>;
};

export type Cradle = {
  logger: BaseLogger;
  settings: PackagerSettings;
  dependencyManager: DependencyManager;
  artifactStore: ArtifactStore;
  workspaceRepo: WorkspaceRepo;
  pipeline: Packager;
};

export function diContainerInit({
  diContainer,
  logger,
  settings,
}: {
  diContainer: AwilixContainer<Cradle>;
  logger: BaseLogger;
  settings: PackagerSettings;
}) {
  // Wire things up!
  diContainer.register({
    logger: asValue(logger),
    settings: asValue(settings),
    dependencyManager: asFunction(
      ({ logger }: Cradle) => new PipenvDependencyManager({ logger }),
      { lifetime: Lifetime.SINGLETON },
    ),
    artifactStore: asFunction(
      ({ settings }: Cradle) =>
        new S3ArtifactStore({
          bucket: settings.bucket,
          region: settings.region,
        }),
      { lifetime: Lifetime.SINGLETON },
    ),
    workspaceRepo: asFunction(
      ({ logger }: Cradle) => new WorkspaceRepoImpl({ logger }),
      { lifetime: Lifetime.SINGLETON },
    ),
    pipeline: asFunction(
      ({
        artifactStore,
        dependencyManager,
        logger,
        settings,
        workspaceRepo,
      }: Cradle) =>
        new PackagePipeline({
          artifactStore,
          dependencyManager,
          keyPrefix: settings.keyPrefix,
          logger,
          workspaceRepo,
        }),
      { lifetime: Lifetime.SCOPED },
    ),
  });
}
