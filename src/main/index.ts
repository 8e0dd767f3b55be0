#!/usr/bin/env tsx
import { runCli } from './cli/runCli';
import { logger } from './utils/logger';
import { getErrorMessage } from './utils/errors';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure:', getErrorMessage(error));
    process.exitCode = 1;
  });
