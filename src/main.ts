#!/usr/bin/env -S node --import tsx
import { createCLI } from './cli/index.js';
import { isSyncError, safeErrorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const code = isSyncError(error) ? ` [${error.code}]` : '';
    logger.error(`Command failed${code}: ${safeErrorMessage(error)}`);
    console.error(safeErrorMessage(error));
    process.exit(1);
  });
