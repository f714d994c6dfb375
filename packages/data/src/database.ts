import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@gradebook/core';
import { getLogger } from '@gradebook/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { DatabaseSchema } from './schema/database-schema.js';

export type KyselyDB = Kysely<DatabaseSchema>;

const logger = getLogger('GradebookDatabase');

/**
 * Open (or create) the SQLite database at `dbPath` and wrap it in Kysely.
 * `':memory:'` gives a private in-memory database.
 */
export function createDatabase(dbPath: string): Result<KyselyDB, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    // SqliteDialect hands out its single connection under a mutex, so an open
    // ControlledTransaction holds it until commit or rollback.
    return ok(
      new Kysely<DatabaseSchema>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

export async function closeDatabase(db: KyselyDB): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok();
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'Failed to close database');
  }
}
