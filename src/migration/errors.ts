/**
 * Error taxonomy for discovery, planning and execution of task migrations.
 *
 * Every error carries a stable `code` so the CLI can map failures to exit
 * statuses without inspecting messages.
 */

import { getErrorMessage } from '../utils/error-utils.js';

export type MigrationErrorCode =
  | 'PARSE_ERROR'
  | 'INVALID_RANGE'
  | 'DISCOVERY_FAILED'
  | 'NO_SCRIPT_ATTACHED'
  | 'TRANSPORT_FAILURE'
  | 'MALFORMED_DOCUMENT'
  | 'INCORRECT_ATTACHMENT'
  | 'EXECUTION_FAILED'
  | 'INVALID_UPGRADES'
  | 'INVALID_PIPELINE_FILE'
  | 'INVALID_CONFIG';

export abstract class MigrationToolError extends Error {
  abstract readonly code: MigrationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  static isMigrationToolError(error: unknown): error is MigrationToolError {
    return error instanceof MigrationToolError;
  }
}

/**
 * A version string (or the version part of a tag) is malformed.
 */
export class VersionParseError extends MigrationToolError {
  readonly code = 'PARSE_ERROR';

  constructor(public readonly input: string) {
    super(`Invalid version "${input}": expected <major>.<minor>[.<patch>]`);
  }

  static isVersionParseError(error: unknown): error is VersionParseError {
    return error instanceof VersionParseError;
  }
}

export class InvalidRangeError extends MigrationToolError {
  readonly code = 'INVALID_RANGE';

  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Source version ${from} is greater than target version ${to}`);
  }

  static isInvalidRangeError(error: unknown): error is InvalidRangeError {
    return error instanceof InvalidRangeError;
  }
}

/**
 * Tag enumeration for a repository failed. No partial result is available.
 */
export class DiscoveryError extends MigrationToolError {
  readonly code = 'DISCOVERY_FAILED';

  constructor(
    public readonly repository: string,
    cause: unknown
  ) {
    super(`Cannot list tags of ${repository}: ${getErrorMessage(cause)}`, { cause });
  }

  static isDiscoveryError(error: unknown): error is DiscoveryError {
    return error instanceof DiscoveryError;
  }
}

/**
 * The tag has no migration script attached. Some versions ship none on
 * purpose, so the executor skips the step.
 */
export class NoScriptAttachedError extends MigrationToolError {
  readonly code = 'NO_SCRIPT_ATTACHED';

  constructor(
    public readonly repository: string,
    public readonly tag: string,
    reason = 'no migration script is attached'
  ) {
    super(`${repository}:${tag}: ${reason}`);
  }

  static isNoScriptAttachedError(error: unknown): error is NoScriptAttachedError {
    return error instanceof NoScriptAttachedError;
  }
}

export class TransportFailureError extends MigrationToolError {
  readonly code = 'TRANSPORT_FAILURE';

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static isTransportFailureError(error: unknown): error is TransportFailureError {
    return error instanceof TransportFailureError;
  }
}

/**
 * The registry answered, but with a document that is not the expected JSON
 * shape (tag page, manifest, referrers index).
 */
export class MalformedRegistryDocumentError extends MigrationToolError {
  readonly code = 'MALFORMED_DOCUMENT';

  constructor(
    public readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`GET ${url} returned a malformed document: ${reason}`, options);
  }

  static isMalformedRegistryDocumentError(error: unknown): error is MalformedRegistryDocumentError {
    return error instanceof MalformedRegistryDocumentError;
  }
}

/**
 * More than one referrer claims to be the migration script of a bundle, or
 * the artifact holding the script is malformed.
 */
export class IncorrectMigrationAttachmentError extends MigrationToolError {
  readonly code = 'INCORRECT_ATTACHMENT';

  static isIncorrectMigrationAttachmentError(
    error: unknown
  ): error is IncorrectMigrationAttachmentError {
    return error instanceof IncorrectMigrationAttachmentError;
  }
}

export type FetchError = NoScriptAttachedError | TransportFailureError;

export class ExecutionFailureError extends MigrationToolError {
  readonly code = 'EXECUTION_FAILED';

  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly output: string
  ) {
    super(message);
  }

  static isExecutionFailureError(error: unknown): error is ExecutionFailureError {
    return error instanceof ExecutionFailureError;
  }
}

export class InvalidUpgradesError extends MigrationToolError {
  readonly code = 'INVALID_UPGRADES';

  static isInvalidUpgradesError(error: unknown): error is InvalidUpgradesError {
    return error instanceof InvalidUpgradesError;
  }
}

export class ConfigError extends MigrationToolError {
  readonly code = 'INVALID_CONFIG';

  static isConfigError(error: unknown): error is ConfigError {
    return error instanceof ConfigError;
  }
}

/**
 * A pipeline definition is missing, unparsable or of an unsupported kind.
 */
export class PipelineFileError extends MigrationToolError {
  readonly code = 'INVALID_PIPELINE_FILE';

  static isPipelineFileError(error: unknown): error is PipelineFileError {
    return error instanceof PipelineFileError;
  }
}
