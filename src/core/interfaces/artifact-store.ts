export interface ArtifactStore {
  upload: (localPath: string, key: string) => Promise<void>;
  /** The reference a template uses to point at an uploaded object. */
  locationFor: (key: string) => string;
}
