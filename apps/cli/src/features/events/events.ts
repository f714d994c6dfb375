import type { Command } from 'commander';

import { errorToExitCode } from '../shared/command-execution.js';
import { withDataContext } from '../shared/database-utils.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import {
  EventsAddCommandOptionsSchema,
  EventsListCommandOptionsSchema,
  formatOptionsError,
} from '../shared/schemas.js';

import { formatExamEvent, toExamEventJson } from './events-utils.js';

/**
 * Register the events command group (add, list).
 */
export function registerEventsCommand(program: Command): void {
  const events = program.command('events').description('Manage exam events');

  events
    .command('add')
    .description('Create an exam event to import results into')
    .requiredOption('--name <name>', 'Exam event name')
    .requiredOption('--date <date>', 'Date of the exam (YYYY-MM-DD)')
    .option('--notes <text>', 'Free-form notes')
    .option('--json', 'Output results in JSON format')
    .action(async (options: unknown) => {
      await executeEventsAddCommand(options);
    });

  events
    .command('list')
    .description('List exam events by date')
    .option('--json', 'Output results in JSON format')
    .action(async (options: unknown) => {
      await executeEventsListCommand(options);
    });
}

function isJsonRequested(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}

async function executeEventsAddCommand(rawOptions: unknown): Promise<void> {
  const validationResult = EventsAddCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonRequested(rawOptions) ? 'json' : 'text');
    output.error('events-add', new Error(formatOptionsError(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const result = await withDataContext((dataContext) =>
    dataContext.examEvents.create({ name: options.name, notes: options.notes, date: options.date })
  );
  if (result.isErr()) {
    output.error('events-add', result.error, errorToExitCode(result.error));
    return;
  }

  if (output.isJsonMode()) {
    output.json('events-add', toExamEventJson(result.value));
    return;
  }

  output.outro(`Created exam event ${formatExamEvent(result.value)}`);
}

async function executeEventsListCommand(rawOptions: unknown): Promise<void> {
  const validationResult = EventsListCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonRequested(rawOptions) ? 'json' : 'text');
    output.error('events-list', new Error(formatOptionsError(validationResult.error)), ExitCodes.INVALID_ARGS);
    return;
  }

  const output = new OutputManager(validationResult.data.json ? 'json' : 'text');

  const result = await withDataContext((dataContext) => dataContext.examEvents.findAll());
  if (result.isErr()) {
    output.error('events-list', result.error, errorToExitCode(result.error));
    return;
  }

  if (output.isJsonMode()) {
    output.json('events-list', result.value.map(toExamEventJson), { count: result.value.length });
    return;
  }

  if (result.value.length === 0) {
    output.outro('No exam events yet. Create one with `gradebook events add`.');
    return;
  }

  output.note(result.value.map(formatExamEvent).join('\n'), `${result.value.length} exam event(s)`);
}
