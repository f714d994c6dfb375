import { IdSchema, ValidationError, wrapError } from '@gradebook/core';
import type { Selectable } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import type { KyselyDB } from '../database.js';
import type { ExamEventsTable } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';

export const CreateExamEventSchema = z.object({
  name: z.string().trim().min(1, { message: 'Exam event name is required' }),
  notes: z.string().trim().optional(),
  date: z.date(),
});

export type CreateExamEventParams = z.input<typeof CreateExamEventSchema>;

/**
 * An exam session that grade results refer to.
 */
export interface ExamEvent {
  id: number;
  name: string;
  notes: string | undefined;
  date: string;
  createdAt: Date;
}

export class ExamEventRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'ExamEventRepository');
  }

  async create(params: CreateExamEventParams): Promise<Result<ExamEvent, Error>> {
    const parsed = CreateExamEventSchema.safeParse(params);
    if (!parsed.success) {
      return err(new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; ')));
    }
    const { date, name, notes } = parsed.data;

    try {
      const row = await this.db
        .insertInto('exam_events')
        .values({
          name,
          notes: notes && notes.length > 0 ? notes : null,
          event_date: this.toDateColumn(date),
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      this.logger.info({ examEventId: row.id }, `Created exam event "${row.name}"`);
      return ok(this.toExamEvent(row));
    } catch (error) {
      return wrapError(error, 'Failed to create exam event');
    }
  }

  async findById(examEventId: number): Promise<Result<ExamEvent | undefined, Error>> {
    if (!IdSchema.safeParse(examEventId).success) {
      return ok(undefined);
    }

    try {
      const row = await this.db.selectFrom('exam_events').selectAll().where('id', '=', examEventId).executeTakeFirst();
      return ok(row ? this.toExamEvent(row) : undefined);
    } catch (error) {
      return wrapError(error, 'Failed to find exam event by ID');
    }
  }

  async findAll(): Promise<Result<ExamEvent[], Error>> {
    try {
      const rows = await this.db.selectFrom('exam_events').selectAll().orderBy('event_date').orderBy('id').execute();
      return ok(rows.map((row) => this.toExamEvent(row)));
    } catch (error) {
      return wrapError(error, 'Failed to list exam events');
    }
  }

  private toExamEvent(row: Selectable<ExamEventsTable>): ExamEvent {
    return {
      id: row.id,
      name: row.name,
      notes: row.notes ?? undefined,
      date: row.event_date,
      // SQLite datetime('now') is UTC without a zone designator
      createdAt: new Date(`${row.created_at.replace(' ', 'T')}Z`),
    };
  }
}
