import path from 'node:path';

import type { Command } from 'commander';
import pc from 'picocolors';
import type { z } from 'zod';

import { displayCliError, failCommand } from '../shared/cli-error.js';
import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { loadIndexerConfig, openAssetHub } from '../shared/node-connection.js';
import { UpdateSchemaCommandOptionsSchema } from '../shared/schemas.js';

import { UpdateSchemaHandler, type UpdateSchemaResult } from './update-schema-handler.js';

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = z.infer<typeof UpdateSchemaCommandOptionsSchema>;

/**
 * Register the update-schema command.
 */
export function registerUpdateSchemaCommand(program: Command): void {
  program
    .command('update-schema')
    .description("Fingerprint the node's runtime and store it as the schema artifact")
    .option('--schema-path <path>', 'Where to write the artifact (defaults to XCM_INDEXER_SCHEMA_PATH)')
    .action(async (rawOptions: unknown) => {
      await executeUpdateSchemaCommand(rawOptions);
    });
}

async function executeUpdateSchemaCommand(rawOptions: unknown): Promise<void> {
  const parseResult = UpdateSchemaCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    displayCliError(new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }
  const options: CommandOptions = parseResult.data;

  const config = loadIndexerConfig();
  if (config.isErr()) {
    displayCliError(config.error, ExitCodes.CONFIG_ERROR);
  }
  const schemaPath = options.schemaPath ? path.resolve(options.schemaPath) : config.value.schemaPath;

  try {
    await runCommand(async (ctx) => {
      const source = await openAssetHub(config.value, { verifySchema: false });
      if (source.isErr()) {
        failCommand(ctx, source.error);
        return;
      }
      ctx.onCleanup(() => source.value.close());

      const result = await new UpdateSchemaHandler(source.value).execute({ schemaPath });
      if (result.isErr()) {
        failCommand(ctx, result.error);
        return;
      }
      displayTextOutput(result.value);
    });
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }

  process.exit(ExitCodes.SUCCESS);
}

function displayTextOutput(result: UpdateSchemaResult): void {
  process.stdout.write(
    `${pc.green('✓')} Wrote schema for ${result.specName} v${result.specVersion} to ${result.schemaPath}\n`
  );

  if (!result.changedItems) return;
  if (result.changedItems.length === 0) {
    process.stdout.write(pc.dim('  No decoded item changed since the previous artifact.\n'));
    return;
  }
  process.stdout.write(`  Changed since the previous artifact:\n`);
  for (const item of result.changedItems) {
    process.stdout.write(`    ${pc.yellow('•')} ${item}\n`);
  }
  process.stdout.write(pc.dim('  Check the decoders for these items before indexing.\n'));
}
