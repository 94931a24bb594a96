import { Command } from 'commander';

import { registerGetTransfersAtCommand } from './features/get-transfers-at/get-transfers-at.js';
import { registerSubscribeToNewTransfersCommand } from './features/subscribe-to-new-transfers/subscribe-to-new-transfers.js';
import { registerUpdateSchemaCommand } from './features/update-schema/update-schema.js';

export const SCHEMA_BOOTSTRAP_HELP = `
get-transfers-at and subscribe-to-new-transfers check the node's runtime
against a schema artifact. Create it once before the first run:

  $ xcm-indexer update-schema

It is written to XCM_INDEXER_SCHEMA_PATH (default artifacts/asset-hub-schema.json).`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('xcm-indexer')
    .description('Cross-chain transfers seen from Polkadot Asset Hub')
    .version('0.1.0')
    .option('-o, --output-file <path>', 'Write transfer JSON to a file instead of stdout (appended when subscribing)')
    .addHelpText('afterAll', SCHEMA_BOOTSTRAP_HELP);

  registerGetTransfersAtCommand(program);
  registerSubscribeToNewTransfersCommand(program);
  registerUpdateSchemaCommand(program);

  return program;
}
