/**
 * Error taxonomy for a sync run.
 *
 * Run-level errors (SourceFetchError, IndexBuildError, ConfigError) abort the run.
 * Item-level errors (MappingError, WriteError) are caught by the pipeline,
 * recorded in the run report and never escalate.
 */

export class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SyncError";
  }
}

/** Environment is missing or invalid. */
export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Linear unreachable, returned GraphQL errors, or returned a payload we cannot parse. */
export class SourceFetchError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SourceFetchError";
  }
}

/**
 * Listing the target calendar failed. Proceeding with an empty index would
 * turn every item into a create, so this is fatal.
 */
export class IndexBuildError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "IndexBuildError";
  }
}

/** A single source item could not be turned into an event draft. */
export class MappingError extends SyncError {
  readonly sourceId: string;

  constructor(sourceId: string, message: string) {
    super(message);
    this.name = "MappingError";
    this.sourceId = sourceId;
  }
}

/** A create/update call still failed after the retry budget was spent. */
export class WriteError extends SyncError {
  readonly sourceId: string;
  readonly attempts: number;

  constructor(sourceId: string, attempts: number, cause: unknown) {
    super(
      `Write for ${sourceId} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      cause,
    );
    this.name = "WriteError";
    this.sourceId = sourceId;
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
