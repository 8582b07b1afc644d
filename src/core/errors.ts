/**
 * Base class for every fatal packaging condition. Nothing in the pipeline
 * recovers from these; they surface to the command line and end the run.
 */
export class PackagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised before any function is built: bad settings or a bad template. */
export class ConfigurationError extends PackagingError {}

/** The template could not be read, parsed or understood. */
export class TemplateLoadError extends ConfigurationError {}

/** A function resource declares a runtime this tool cannot build. */
export class UnsupportedRuntimeError extends ConfigurationError {
  readonly resourceName: string;

  readonly runtime: string | undefined;

  constructor(resourceName: string, runtime: string | undefined) {
    super(
      runtime
        ? `Function "${resourceName}" uses unsupported runtime "${runtime}".`
        : `Function "${resourceName}" does not declare a runtime.`,
    );
    this.resourceName = resourceName;
    this.runtime = runtime;
  }
}

/** The external dependency manager cannot be found on the command search path. */
export class ToolUnavailableError extends PackagingError {}

export class BuildError extends PackagingError {
  readonly functionName: string;

  constructor(
    functionName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to build function "${functionName}": ${message}`, options);
    this.functionName = functionName;
  }
}

export class UploadError extends PackagingError {
  readonly artifact: string;

  constructor(artifact: string, options?: { cause?: unknown }) {
    super(`Failed to upload artifact "${artifact}".`, options);
    this.artifact = artifact;
  }
}
