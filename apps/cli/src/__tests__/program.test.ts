import { describe, expect, it } from 'vitest';

import { createProgram, SCHEMA_BOOTSTRAP_HELP } from '../program.js';

describe('createProgram', () => {
  it('registers the indexer commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      'get-transfers-at',
      'subscribe-to-new-transfers',
      'update-schema',
    ]);
  });

  it('passes the global output file to subcommands', () => {
    const program = createProgram();
    const getTransfersAt = program.commands.find((command) => command.name() === 'get-transfers-at');
    program.parseOptions(['-o', 'out.json']);

    expect(getTransfersAt?.optsWithGlobals()).toEqual({ outputFile: 'out.json' });
  });

  it('tells how to create the schema artifact in every help page', () => {
    const getTransfersAt = createProgram().commands.find((command) => command.name() === 'get-transfers-at');
    let output = '';
    getTransfersAt?.configureOutput({ writeOut: (text) => (output += text) });

    getTransfersAt?.outputHelp();

    expect(output).toContain('Usage: xcm-indexer get-transfers-at [options]');
    expect(output.endsWith(`${SCHEMA_BOOTSTRAP_HELP}\n`)).toBe(true);
  });
});
