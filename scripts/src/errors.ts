export class MigrationError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.fatal = options.fatal ?? true;
  }
}

/** Conflicting or missing options. Raised before any run is touched. */
export class ConfigurationError extends MigrationError {}

/** A destination experiment directory or run target already exists and resume was not requested. */
export class NamingCollisionError extends MigrationError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.path = path;
  }
}

/** Crash-resume could not locate the experiment it should resume into. */
export class ExperimentNotFoundError extends MigrationError {}

/**
 * A failed call to the source or destination service; fails the current run only.
 * `status` is 0 when no usable HTTP answer came back.
 */
export class RequestError extends MigrationError {
  readonly status: number;
  readonly endpoint: string;

  constructor(message: string, status: number, endpoint: string, cause?: unknown) {
    super(message, { fatal: false, cause });
    this.status = status;
    this.endpoint = endpoint;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Message of an error and, for wrapped errors, of its cause. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
}
