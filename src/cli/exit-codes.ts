/**
 * Process exit statuses
 */

import {
  ConfigError,
  DiscoveryError,
  IncorrectMigrationAttachmentError,
  InvalidRangeError,
  InvalidUpgradesError,
  MalformedRegistryDocumentError,
  PipelineFileError,
  TransportFailureError,
  VersionParseError,
} from '../migration/errors.js';
import type { TaskMigrationOutcome } from '../migration/orchestrator.js';

export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  InvalidInput: 2,
  DiscoveryFailure: 3,
  ExecutionFailure: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * The command line names an impossible combination of options.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Highest first when several outcomes disagree
const PRECEDENCE: readonly ExitCode[] = [
  ExitCode.ExecutionFailure,
  ExitCode.DiscoveryFailure,
  ExitCode.InvalidInput,
  ExitCode.Unexpected,
  ExitCode.Success,
];

export function exitCodeForError(error: unknown): ExitCode {
  if (
    error instanceof UsageError ||
    VersionParseError.isVersionParseError(error) ||
    InvalidRangeError.isInvalidRangeError(error) ||
    InvalidUpgradesError.isInvalidUpgradesError(error) ||
    ConfigError.isConfigError(error) ||
    PipelineFileError.isPipelineFileError(error)
  ) {
    return ExitCode.InvalidInput;
  }
  if (
    DiscoveryError.isDiscoveryError(error) ||
    TransportFailureError.isTransportFailureError(error) ||
    MalformedRegistryDocumentError.isMalformedRegistryDocumentError(error) ||
    IncorrectMigrationAttachmentError.isIncorrectMigrationAttachmentError(error)
  ) {
    return ExitCode.DiscoveryFailure;
  }
  return ExitCode.Unexpected;
}

/**
 * A failed run whose failure came from the registry is a discovery failure;
 * anything else that stopped a run happened while applying a script.
 */
export function exitCodeForOutcome(outcome: TaskMigrationOutcome): ExitCode {
  const { report } = outcome;
  if (report?.status === 'failed') {
    const code = exitCodeForError(report.error);
    return code === ExitCode.DiscoveryFailure ? code : ExitCode.ExecutionFailure;
  }
  if (outcome.error) {
    return exitCodeForError(outcome.error);
  }
  return ExitCode.Success;
}

export function mostSevereExitCode(codes: Iterable<ExitCode>): ExitCode {
  let worst: ExitCode = ExitCode.Success;
  for (const code of codes) {
    if (PRECEDENCE.indexOf(code) < PRECEDENCE.indexOf(worst)) {
      worst = code;
    }
  }
  return worst;
}
