import { readFile } from 'node:fs/promises';

import type { SubmissionOutcome, SubmissionPolicy } from '@gradebook/core';
import { NotFoundError, getErrorMessage } from '@gradebook/core';
import { splitLines, type GradeImportService } from '@gradebook/ingestion';
import { getLogger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

export interface ImportHandlerParams {
  filePath: string;
  examEventId: number;
  userId: number;
  policy: SubmissionPolicy;
  skipBlankLines: boolean;
}

/**
 * Import handler - reads a results file and submits it as one transaction.
 */
export class ImportHandler {
  private readonly logger = getLogger('ImportHandler');

  constructor(private readonly importService: GradeImportService) {}

  async execute(params: ImportHandlerParams): Promise<Result<SubmissionOutcome, Error>> {
    let text: string;
    try {
      text = await readFile(params.filePath, 'utf8');
    } catch (error) {
      return err(new NotFoundError(`Cannot read ${params.filePath}: ${getErrorMessage(error)}`, undefined, { cause: error }));
    }

    const lines = splitLines(text);
    this.logger.debug({ filePath: params.filePath, lines: lines.length }, 'Read results file');

    return this.importService.importLines({
      lines,
      examEventId: params.examEventId,
      userId: params.userId,
      policy: params.policy,
      skipBlankLines: params.skipBlankLines,
    });
  }
}
