import pc from 'picocolors';

import type { CommandContext } from './command-runtime.js';
import { exitCodeFor, exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The node does not know this block. Check the hash, or query a node that keeps older blocks.',
  NETWORK_ERROR: 'Could not talk to the node. Check XCM_INDEXER_RPC_URL and your connection.',
  TIMEOUT: 'The node did not answer in time. Raise XCM_INDEXER_RPC_TIMEOUT_MS or try another node.',
  CONFIG_ERROR:
    'If the node runs a new runtime, regenerate the schema artifact with `xcm-indexer update-schema` and review the changes before indexing.',
};

/**
 * Write a CLI error to stderr with contextual tips.
 */
export function printCliError(error: Error, exitCode: ExitCode): void {
  process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

  const tip = ERROR_TIPS[exitCodeToErrorCode(exitCode)];
  if (tip) {
    process.stderr.write(`\n${pc.dim(tip)}\n`);
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
  }
}

/**
 * Display a CLI error and exit.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  printCliError(error, exitCode);
  process.exit(exitCode);
}

/**
 * Print a failed command's error and set the code runCommand exits with.
 */
export function failCommand(ctx: CommandContext, error: Error): void {
  const exitCode = exitCodeFor(error);
  printCliError(error, exitCode);
  ctx.exitCode = exitCode;
}
