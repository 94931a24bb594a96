import {
  BlockNotFoundError,
  ConfigurationError,
  ConnectionError,
  RpcError,
  SchemaMismatchError,
  ValidationError,
} from '@xcm-indexer/core';

/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** The node does not know the requested block */
  NOT_FOUND: 4,

  /** Network or node error */
  NETWORK_ERROR: 6,

  /** Node did not answer in time */
  TIMEOUT: 10,

  /** Invalid environment or stale schema artifact */
  CONFIG_ERROR: 11,

  /** Interrupted with Ctrl-C */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const ERROR_CODES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  4: 'NOT_FOUND',
  6: 'NETWORK_ERROR',
  10: 'TIMEOUT',
  11: 'CONFIG_ERROR',
  130: 'INTERRUPTED',
};

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}

/**
 * Exit code a command reports for a failure.
 */
export function exitCodeFor(error: Error): ExitCode {
  if (error instanceof BlockNotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof SchemaMismatchError || error instanceof ConfigurationError) return ExitCodes.CONFIG_ERROR;
  if (error instanceof ValidationError) return ExitCodes.INVALID_ARGS;
  if (error instanceof ConnectionError) {
    return error.code === 'REQUEST_TIMEOUT' ? ExitCodes.TIMEOUT : ExitCodes.NETWORK_ERROR;
  }
  if (error instanceof RpcError) return ExitCodes.NETWORK_ERROR;
  return ExitCodes.GENERAL_ERROR;
}
