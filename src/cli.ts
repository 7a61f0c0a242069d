#!/usr/bin/env node

/**
 * api-doc-schema - print the schema of an HTML API documentation page as JSON
 */

import { createProgram } from './cli/program.js';
import { logger } from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.cli.error('Extraction failed', { error });
    process.exitCode = 1;
  });
