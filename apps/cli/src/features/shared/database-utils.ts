import { GradebookDataContext } from '@gradebook/data';
import { getDatabasePath } from '@gradebook/env';
import { getLogger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

const logger = getLogger('database-utils');

/**
 * Execute a function with an initialized data context, closing it afterwards.
 *
 * Opens gradebook.db in the data directory (see GRADEBOOK_DATA_DIR).
 */
export async function withDataContext<T>(
  fn: (dataContext: GradebookDataContext) => Promise<Result<T, Error>>,
  dbPath: string = getDatabasePath()
): Promise<Result<T, Error>> {
  const contextResult = await GradebookDataContext.initialize(dbPath);
  if (contextResult.isErr()) {
    return err(contextResult.error);
  }

  const dataContext = contextResult.value;
  try {
    return await fn(dataContext);
  } finally {
    const closeResult = await dataContext.close();
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close database');
    }
  }
}
