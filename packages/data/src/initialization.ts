import { getLogger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { closeDatabase, createDatabase, type KyselyDB } from './database.js';
import { runMigrations } from './migrations/run-migrations.js';

const logger = getLogger('DatabaseInitialization');

/**
 * Open the database and bring its schema up to date.
 */
export async function initializeDatabase(dbPath: string): Promise<Result<KyselyDB, Error>> {
  const dbResult = createDatabase(dbPath);
  if (dbResult.isErr()) return err(dbResult.error);
  const db = dbResult.value;

  const migrationResult = await runMigrations(db);
  if (migrationResult.isErr()) {
    const closeResult = await closeDatabase(db);
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close database after migration failure');
    }
    return err(migrationResult.error);
  }

  logger.debug('Database initialization completed');
  return ok(db);
}
