import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('exam_events')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('notes', 'text')
    .addColumn('event_date', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .execute();

  await db.schema
    .createTable('transactions')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('user_id', 'integer', (col) => col.notNull())
    .addColumn('transaction_date', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('grade_results')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('student_id', 'integer', (col) => col.notNull())
    .addColumn('exam_event_id', 'integer', (col) => col.notNull().references('exam_events.id'))
    .addColumn('grade', 'integer', (col) => col.notNull())
    .addColumn('transaction_id', 'integer', (col) => col.notNull().references('transactions.id'))
    .addCheckConstraint('grade_results_student_id_valid', sql`student_id BETWEEN 1000000 AND 9999999`)
    .addCheckConstraint('grade_results_grade_valid', sql`grade BETWEEN 10 AND 100`)
    .execute();

  await db.schema.createIndex('idx_grade_results_transaction_id').on('grade_results').column('transaction_id').execute();
  await db.schema.createIndex('idx_grade_results_exam_event_id').on('grade_results').column('exam_event_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('grade_results').execute();
  await db.schema.dropTable('transactions').execute();
  await db.schema.dropTable('exam_events').execute();
}
