#!/usr/bin/env node

/**
 * Vector Plus CLI
 *
 * Draft, validate and evaluate strategy configuration files.
 */

import * as dotenv from 'dotenv';
import chalk from 'chalk';
import { isStrategyConfigError } from '../common/errors';
import { createLogger, setLogLevel } from '../common/logger';
import { createProgram } from './program';

// Load environment variables
dotenv.config();
if (process.env.LOG_LEVEL) {
  setLogLevel(process.env.LOG_LEVEL);
}

const logger = createLogger('CLI');

function reportError(error: unknown): void {
  if (isStrategyConfigError(error)) {
    console.error(chalk.red(`❌ ${error.message}`));
    logger.debug(`${error.code}: ${error.stack ?? error.message}`, error.details ?? {});
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`❌ Unexpected error: ${message}`));
  logger.debug(error instanceof Error && error.stack ? error.stack : message);
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportError(error);
    process.exitCode = 1;
  });
