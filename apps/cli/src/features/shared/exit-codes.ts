/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Exam event, transaction or input file not found */
  NOT_FOUND: 4,

  /** Database could not be opened or queried */
  DATABASE_ERROR: 7,

  /** Submission was rejected and rolled back */
  VALIDATION_ERROR: 8,

  /** Commit or abort failed; whether the rows were applied is unknown */
  UNCERTAIN_STATE: 12,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

