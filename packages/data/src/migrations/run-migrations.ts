import { getErrorMessage, wrapError } from '@gradebook/core';
import { getLogger } from '@gradebook/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { migrations as defaultMigrations } from './index.js';

const logger = getLogger('Migrations');

/**
 * Run all pending migrations.
 *
 * Migrations come from a static record instead of FileMigrationProvider, whose
 * dynamic `import()` cannot resolve the .js → .ts mapping under Vitest.
 */
export async function runMigrations<DB>(
  db: Kysely<DB>,
  migrations: Record<string, Migration> = defaultMigrations
): Promise<Result<void, Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        logger.debug(`Migration "${result.migrationName}" executed successfully`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(`Migration failed: ${getErrorMessage(error, 'Unknown migration error')}`));
    }

    return ok();
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
