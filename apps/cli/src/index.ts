#!/usr/bin/env node
import { getLogger } from '@xcm-indexer/logger';

import { createProgram } from './program.js';

const logger = getLogger('CLI');

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error({ error }, 'CLI failed');
    process.exit(1);
  });
