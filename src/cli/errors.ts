/**
 * @fileoverview CLI error handling with structured envelopes
 *
 * Every failure leaves the CLI as an {@link ErrorEnvelope}: a machine-readable
 * code, a message, recovery hints and optional context. Human mode prints the
 * message with hints; `--json` prints `{"error": envelope}`.
 */

import { getErrnoCode, getErrorMessage } from '../utils/errors.js';

export type ErrorCode =
  | 'EINVALID_ARGUMENT'
  | 'EINVALID_CHOICE'
  | 'EINVALID_SELECTION'
  | 'ECONFIG_INVALID'
  | 'EMKDOCS_MISSING'
  | 'EARTICLE_NOT_FOUND'
  | 'EDESTINATION_EXISTS'
  | 'EDESTINATION_IS_DIRECTORY'
  | 'EIO'
  | 'EUNKNOWN';

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

interface ErrorMetadataEntry {
  exitCode: number;
  retryable: boolean;
  recoveryHints: string[];
}

/** Usage mistakes exit with 2, everything else with 1. */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export const ErrorMetadata: Record<ErrorCode, ErrorMetadataEntry> = {
  EINVALID_ARGUMENT: {
    exitCode: ExitCodes.USAGE,
    retryable: false,
    recoveryHints: ['Run `docshelf help <command>` for usage information.'],
  },
  EINVALID_CHOICE: {
    exitCode: ExitCodes.USAGE,
    retryable: true,
    recoveryHints: ['Enter 1, 2 or 3, or q to quit.'],
  },
  EINVALID_SELECTION: {
    exitCode: ExitCodes.USAGE,
    retryable: true,
    recoveryHints: ['Use item numbers and ranges such as `1 2 5-7`.'],
  },
  ECONFIG_INVALID: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: ['Fix the field named above in docshelf.yml, or remove the file to use defaults.'],
  },
  EMKDOCS_MISSING: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: ['Run docshelf from the site root, or pass --workspace <dir>.'],
  },
  EARTICLE_NOT_FOUND: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: ['Run `docshelf list` to see the available articles.'],
  },
  EDESTINATION_EXISTS: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: ['Pass --force to overwrite the destination file.'],
  },
  EDESTINATION_IS_DIRECTORY: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: ['Rename or remove the directory that shadows the article.'],
  },
  EIO: {
    exitCode: ExitCodes.FAILURE,
    retryable: true,
    recoveryHints: ['Check file permissions and that the paths exist.'],
  },
  EUNKNOWN: {
    exitCode: ExitCodes.FAILURE,
    retryable: false,
    recoveryHints: [],
  },
};

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(
  code: ErrorCode,
  message: string,
  context?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, context);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'retryable' | 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    context: { ...overrides.context },
  };
}

/**
 * Turn anything thrown into an envelope. Node system errors become EIO with
 * their errno code kept in the context.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, { context: error.context });
  }
  const errno = getErrnoCode(error);
  if (errno) {
    return createErrorEnvelope('EIO', getErrorMessage(error), { context: { errno } });
  }
  return createErrorEnvelope('EUNKNOWN', getErrorMessage(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return ErrorMetadata[envelope.code].exitCode;
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    value.code in ErrorMetadata &&
    'message' in value &&
    typeof value.message === 'string' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

export function formatError(envelope: ErrorEnvelope): string {
  return `Error [${envelope.code}]: ${envelope.message}`;
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  if (envelope.recoveryHints.length === 0) return formatError(envelope);
  const hints = envelope.recoveryHints.map((hint) => `  - ${hint}`);
  return [formatError(envelope), '', 'Suggestions:', ...hints].join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope });
}
