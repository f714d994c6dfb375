export { GradebookDataContext } from './data-context.js';
export { closeDatabase, createDatabase, type KyselyDB } from './database.js';
export { initializeDatabase } from './initialization.js';
export { migrations } from './migrations/index.js';
export { runMigrations } from './migrations/run-migrations.js';
export * from './repositories/index.js';
export type { DatabaseSchema, ExamEventsTable, GradeResultsTable, TransactionsTable } from './schema/database-schema.js';
export { KyselyTransactionHandle, type BeginSubmissionParams } from './transaction/kysely-transaction-handle.js';
export { createTestDatabase, createTestDataContext, seedExamEvent } from './__tests__/test-utils.js';
