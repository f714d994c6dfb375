#!/usr/bin/env node
import { flushLoggers, getLogger } from '@gradebook/logger';
import { Command } from 'commander';

import { registerEventsCommand } from './features/events/events.js';
import { registerImportCommand } from './features/import/import.js';
import { registerResultsCommand } from './features/results/results.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('gradebook').description('Exam result ingestion').version('0.1.0');

  registerEventsCommand(program);
  registerImportCommand(program);
  registerResultsCommand(program);

  await program.parseAsync();
  flushLoggers();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
