#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { runCLI } from './cli/index.js';
import { isCalculatorError } from './core/errors.js';
import { logError, cliLogger } from './utils/logger.js';

async function main(): Promise<void> {
  await runCLI(process.argv.slice(2));
}

main().catch((error: unknown) => {
  if (isCalculatorError(error)) {
    logError(cliLogger, error);
  }
  console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
