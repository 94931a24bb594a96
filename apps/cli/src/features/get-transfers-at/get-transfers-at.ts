import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError, failCommand } from '../shared/cli-error.js';
import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { loadIndexerConfig, openAssetHub } from '../shared/node-connection.js';
import { GetTransfersAtCommandOptionsSchema } from '../shared/schemas.js';
import { createTransferSink } from '../shared/transfer-sink.js';

import { GetTransfersAtHandler } from './get-transfers-at-handler.js';

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = z.infer<typeof GetTransfersAtCommandOptionsSchema>;

/**
 * Register the get-transfers-at command.
 */
export function registerGetTransfersAtCommand(program: Command): void {
  program
    .command('get-transfers-at')
    .description('Print the cross-chain transfers of one finalized block as a JSON array')
    .requiredOption('--block-hash <hash>', 'Block hash (0x followed by 64 hex digits)')
    .action(async (_options: unknown, command: Command) => {
      await executeGetTransfersAtCommand(command.optsWithGlobals());
    });
}

async function executeGetTransfersAtCommand(rawOptions: unknown): Promise<void> {
  const parseResult = GetTransfersAtCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    displayCliError(new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }
  const options: CommandOptions = parseResult.data;

  const config = loadIndexerConfig();
  if (config.isErr()) {
    displayCliError(config.error, ExitCodes.CONFIG_ERROR);
  }

  try {
    await runCommand(async (ctx) => {
      const source = await openAssetHub(config.value, { verifySchema: true });
      if (source.isErr()) {
        failCommand(ctx, source.error);
        return;
      }
      ctx.onCleanup(() => source.value.close());

      const transfers = await new GetTransfersAtHandler(source.value).execute({ blockHash: options.blockHash });
      if (transfers.isErr()) {
        failCommand(ctx, transfers.error);
        return;
      }

      const written = await createTransferSink(options.outputFile, 'write').write(transfers.value);
      if (written.isErr()) {
        failCommand(ctx, written.error);
      }
    });
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }

  process.exit(ExitCodes.SUCCESS);
}
