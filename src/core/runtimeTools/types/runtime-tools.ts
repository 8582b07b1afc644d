export type RuntimeTools = {
  /** Language family this set of tools builds, e.g. "python". */
  readonly family: string;
  isSupported: (runtime: string) => boolean;
  /** Version argument handed to the dependency manager when creating an environment. */
  interpreterVersion: (runtime: string) => string;
  /** Manifest files present in `sourceDir`, in preference order. */
  findManifests: (sourceDir: string) => Promise<string[]>;
  /**
   * Files the manifests depend on (lock files, included requirement files),
   * relative to `sourceDir`.
   */
  findSupportFiles: (sourceDir: string, manifests: string[]) => Promise<string[]>;
};
