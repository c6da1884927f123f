#!/usr/bin/env node
import { runCli } from './cli.js';
import { errorMessage } from './utils/errors.js';
import { printError } from './utils/logger.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  printError(`Unexpected error: ${errorMessage(err)}`);
  process.exitCode = 1;
}
