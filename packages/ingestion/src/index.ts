export {
  ParserContextSchema,
  ResultLineParser,
  scaleGrade,
  splitLines,
  type ParserContext,
} from './features/parsing/result-line-parser.js';
export { GradeBatchCommitter, type GradeBatchCommitterOptions } from './features/commit/grade-batch-committer.js';
export {
  GradeImportService,
  type GradeImportStore,
  type ImportLinesParams,
} from './features/import/grade-import-service.js';
