#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { logger } from './utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error instanceof Error ? error : undefined);
    process.exit(1);
  });
