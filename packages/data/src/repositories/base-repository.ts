import { getLogger, type Logger } from '@gradebook/logger';

import type { KyselyDB } from '../database.js';

export abstract class BaseRepository {
  protected db: KyselyDB;
  protected logger: Logger;

  constructor(db: KyselyDB, repositoryName: string) {
    this.db = db;
    this.logger = getLogger(repositoryName);
  }

  /**
   * Calendar date in ISO form ('YYYY-MM-DD', UTC) for date columns
   */
  protected toDateColumn(date: Date): string {
    return date.toISOString().slice(0, 10);
  }
}
