import path from 'node:path';

import { GradeImportService } from '@gradebook/ingestion';
import type { Command } from 'commander';

import { errorToExitCode } from '../shared/command-execution.js';
import { withDataContext } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ImportCommandOptionsSchema, formatOptionsError } from '../shared/schemas.js';

import { ImportHandler } from './import-handler.js';
import {
  buildImportHandlerParams,
  describeAbort,
  formatFailure,
  outcomeExitCode,
  toImportCommandResult,
} from './import-utils.js';

/**
 * Register the import command.
 */
export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Import a results file for one exam event as a single submission')
    .argument('<file>', 'Results file, one "<student id> ... <grade>" line per student')
    .requiredOption('--event <id>', 'Exam event the results belong to')
    .requiredOption('--user <id>', 'User submitting the results')
    .option('--policy <policy>', 'strict (all lines or nothing) or best-effort (skip bad lines)', 'strict')
    .option('--keep-blank-lines', 'Treat blank lines as parse failures instead of skipping them')
    .option('--json', 'Output results in JSON format')
    .action(async (file: string, options: unknown) => {
      await executeImportCommand(file, options);
    });
}

async function executeImportCommand(file: string, rawOptions: unknown): Promise<void> {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = ImportCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    output.error('import', new Error(formatOptionsError(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');
  const params = buildImportHandlerParams(file, options);

  output.intro('gradebook import');
  const spinner = output.spinner();
  spinner?.start(`Importing ${path.basename(file)} into exam event ${params.examEventId}...`);

  const result = await withDataContext((dataContext) =>
    new ImportHandler(new GradeImportService(dataContext)).execute(params)
  );

  if (result.isErr()) {
    spinner?.stop('Import failed');
    output.error('import', result.error, errorToExitCode(result.error));
    return;
  }

  const outcome = result.value;
  const exitCode = outcomeExitCode(outcome);

  if (output.isJsonMode()) {
    if (outcome.state === 'aborted') {
      const abortError = new Error(describeAbort(outcome) ?? 'Submission aborted');
      output.error('import', abortError, exitCode, toImportCommandResult(outcome));
      return;
    }
    output.json('import', toImportCommandResult(outcome));
    return;
  }

  spinner?.stop(outcome.state === 'committed' ? 'Import complete' : 'Import rolled back');

  if (outcome.failures.length > 0) {
    output.note(outcome.failures.map(formatFailure).join('\n'), 'Unparsed lines');
  }
  if (outcome.skipped.length > 0) {
    output.log(`Skipped ${outcome.skipped.length} blank line(s)`);
  }

  if (outcome.state === 'aborted') {
    output.error('import', new Error(describeAbort(outcome) ?? 'Submission aborted'), exitCode);
    return;
  }

  output.outro(`Committed ${outcome.committedCount} result(s) as transaction ${outcome.transactionId}`);
}
