export { BaseRepository } from './base-repository.js';
export {
  CreateExamEventSchema,
  ExamEventRepository,
  type CreateExamEventParams,
  type ExamEvent,
} from './exam-event-repository.js';
export { GradeResultRepository, toGradeResultRow } from './grade-result-repository.js';
export { TransactionRecordRepository, type TransactionRecord } from './transaction-record-repository.js';
