import type { GradeResultRow } from '@gradebook/core';
import type { Command } from 'commander';
import type { Result } from 'neverthrow';

import { errorToExitCode } from '../shared/command-execution.js';
import { withDataContext } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ResultsCommandOptionsSchema, formatOptionsError } from '../shared/schemas.js';

import { formatGrade, formatResultRow } from './results-utils.js';

/**
 * Register the results command.
 */
export function registerResultsCommand(program: Command): void {
  program
    .command('results')
    .description('Show committed grade results for a transaction or an exam event')
    .option('--transaction <id>', 'Transaction id reported by import')
    .option('--event <id>', 'Exam event id')
    .option('--json', 'Output results in JSON format')
    .action(async (options: unknown) => {
      await executeResultsCommand(options);
    });
}

async function executeResultsCommand(rawOptions: unknown): Promise<void> {
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = ResultsCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    output.error('results', new Error(formatOptionsError(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const { event, json, transaction } = validationResult.data;
  const output = new OutputManager(json ? 'json' : 'text');

  const result = await withDataContext((dataContext): Promise<Result<GradeResultRow[], Error>> =>
    transaction !== undefined
      ? dataContext.gradeResults.findByTransactionId(transaction)
      : dataContext.gradeResults.findByExamEventId(event ?? 0)
  );
  if (result.isErr()) {
    output.error('results', result.error, errorToExitCode(result.error));
    return;
  }

  const rows = result.value;
  const scope = transaction !== undefined ? `transaction ${transaction}` : `exam event ${event}`;

  if (output.isJsonMode()) {
    output.json(
      'results',
      rows.map((row) => ({ ...row, gradeText: formatGrade(row.grade) })),
      { count: rows.length, scope }
    );
    return;
  }

  if (rows.length === 0) {
    output.outro(`No committed results for ${scope}`);
    return;
  }

  output.note(rows.map(formatResultRow).join('\n'), `${rows.length} result(s) for ${scope}`);
}
