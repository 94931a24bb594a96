import { getErrorMessage } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';

import { ExitCodes } from './exit-codes.js';

const logger = getLogger('command-runtime');

/**
 * Manages SIGINT handling and cleanup for CLI commands.
 *
 * - `onCleanup()`: LIFO stack, runs during dispose
 * - `onAbort()`: SIGINT: fn() sync → await dispose → exit(130)
 * - `dispose()`: remove SIGINT, run stack. Idempotent. Throws on cleanup failures.
 */
export class CommandContext {
  exitCode = 0;

  private disposed = false;
  private cleanupStack: (() => Promise<void>)[] = [];
  private sigintHandler: (() => void) | undefined;

  /**
   * Register a cleanup function. Runs in LIFO order during dispose().
   */
  onCleanup(fn: () => Promise<void>): void {
    this.cleanupStack.push(fn);
  }

  /**
   * Register a SIGINT handler. On Ctrl-C: fn() runs synchronously,
   * then dispose fires as void promise, then process.exit(130).
   */
  onAbort(fn: () => void): void {
    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
    }

    this.sigintHandler = () => {
      if (this.sigintHandler) {
        process.off('SIGINT', this.sigintHandler);
      }

      try {
        fn();
      } catch (error) {
        logger.error({ error }, 'Abort callback threw during SIGINT');
      }

      this.dispose()
        .catch((error: unknown) => {
          logger.error({ error }, 'Error during abort dispose');
        })
        .finally(() => {
          process.exit(ExitCodes.INTERRUPTED);
        });
    };

    process.on('SIGINT', this.sigintHandler);
  }

  /**
   * Remove SIGINT handler and run the cleanup stack (LIFO).
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
      this.sigintHandler = undefined;
    }

    const errors: Error[] = [];
    for (let fn = this.cleanupStack.pop(); fn; fn = this.cleanupStack.pop()) {
      try {
        await fn();
      } catch (error) {
        logger.error({ error }, 'Cleanup function failed');
        errors.push(error instanceof Error ? error : new Error(getErrorMessage(error)));
      }
    }

    const [first] = errors;
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Multiple cleanup failures');
    }
    if (first) {
      throw first;
    }
  }
}

/**
 * Run a CLI command with automatic resource cleanup.
 *
 * Does NOT catch fn errors; they propagate to the caller.
 * Dispose always runs. If both fn and dispose fail, the fn error takes priority
 * (dispose error is logged). If only dispose fails, that error propagates.
 */
export async function runCommand(fn: (ctx: CommandContext) => Promise<void>): Promise<void> {
  const ctx = new CommandContext();
  let fnError: unknown;

  try {
    await fn(ctx);
  } catch (error) {
    fnError = error;
  }

  try {
    await ctx.dispose();
  } catch (disposeError) {
    if (fnError) {
      logger.error({ error: disposeError }, 'Cleanup failed (original error takes priority)');
    } else {
      fnError = disposeError;
    }
  }

  if (fnError) {
    if (fnError instanceof Error) throw fnError;
    throw new Error(getErrorMessage(fnError, 'Command failed'));
  }

  if (ctx.exitCode !== 0) {
    process.exit(ctx.exitCode);
  }
}
