/**
 * The directory a dependency manager operates in. Passed explicitly to every
 * call so no stage relies on the process working directory.
 */
export type BuildContext = {
  directory: string;
};

export type Environment = {
  context: BuildContext;
  /** Root of the isolated environment. */
  root: string;
  /** Directory the environment installs third-party packages into. */
  packagesDir: string;
};

export interface DependencyManager {
  /** Rejects with ToolUnavailableError when the tool is missing from the host. */
  ensureAvailable: () => Promise<void>;
  create: (context: BuildContext, runtime: string) => Promise<void>;
  locate: (context: BuildContext) => Promise<Environment>;
  install: (environment: Environment) => Promise<void>;
  destroy: (environment: Environment) => Promise<void>;
}
