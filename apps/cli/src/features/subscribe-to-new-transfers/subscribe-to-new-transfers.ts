import { getLogger } from '@xcm-indexer/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError, failCommand } from '../shared/cli-error.js';
import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { loadIndexerConfig, openAssetHub } from '../shared/node-connection.js';
import { SubscribeCommandOptionsSchema } from '../shared/schemas.js';
import { createTransferSink } from '../shared/transfer-sink.js';

import { SubscribeToNewTransfersHandler } from './subscribe-to-new-transfers-handler.js';

const logger = getLogger('SubscribeToNewTransfersCommand');

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = z.infer<typeof SubscribeCommandOptionsSchema>;

/**
 * Register the subscribe-to-new-transfers command.
 */
export function registerSubscribeToNewTransfersCommand(program: Command): void {
  program
    .command('subscribe-to-new-transfers')
    .description('Follow finalized blocks and print one JSON array of transfers per block')
    .action(async (_options: unknown, command: Command) => {
      await executeSubscribeCommand(command.optsWithGlobals());
    });
}

async function executeSubscribeCommand(rawOptions: unknown): Promise<void> {
  const parseResult = SubscribeCommandOptionsSchema.safeParse(rawOptions);
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

      const controller = new AbortController();
      ctx.onAbort(() => controller.abort());

      const handler = new SubscribeToNewTransfersHandler(source.value, createTransferSink(options.outputFile, 'append'), {
        reconnectBaseDelayMs: config.value.reconnectBaseDelayMs,
        reconnectMaxDelayMs: config.value.reconnectMaxDelayMs,
      });
      logger.info({ rpcUrl: config.value.rpcUrl }, 'Following finalized blocks');

      const result = await handler.execute(controller.signal);
      logger.info(handler.written, 'Subscription ended');
      if (result.isErr()) {
        failCommand(ctx, result.error);
      }
    });
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }

  process.exit(ExitCodes.SUCCESS);
}
