import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Numeric id passed as a command-line string.
 */
export const IdOptionSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int({ message: 'must be a whole number' })
  .positive({ message: 'must be a positive number' });

export const IsoDateOptionSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: '--date must be in YYYY-MM-DD format' })
  .refine(
    (value) => {
      const date = new Date(`${value}T00:00:00Z`);
      // Rejects days that roll over into the next month, like 2026-02-30
      return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
    },
    { message: '--date is not a valid calendar date' }
  )
  .transform((value) => new Date(`${value}T00:00:00Z`));

export const SubmissionPolicySchema = z.enum(['strict', 'best-effort'], {
  errorMap: () => ({ message: '--policy must be "strict" or "best-effort"' }),
});

/**
 * Import command options
 */
export const ImportCommandOptionsSchema = z
  .object({
    event: IdOptionSchema,
    user: IdOptionSchema,
    policy: SubmissionPolicySchema.default('strict'),
    keepBlankLines: z.boolean().optional(),
  })
  .extend(JsonFlagSchema.shape);

/**
 * Events add command options
 */
export const EventsAddCommandOptionsSchema = z
  .object({
    name: z.string().trim().min(1, { message: '--name is required' }),
    date: IsoDateOptionSchema,
    notes: z.string().optional(),
  })
  .extend(JsonFlagSchema.shape);

/**
 * Events list command options
 */
export const EventsListCommandOptionsSchema = JsonFlagSchema;

/**
 * Results command options
 */
export const ResultsCommandOptionsSchema = z
  .object({
    transaction: IdOptionSchema.optional(),
    event: IdOptionSchema.optional(),
  })
  .extend(JsonFlagSchema.shape)
  .refine((data) => data.transaction !== undefined || data.event !== undefined, {
    message: 'Either --transaction or --event is required',
  })
  .refine((data) => !(data.transaction !== undefined && data.event !== undefined), {
    message: 'Cannot specify both --transaction and --event',
  });

/**
 * First issue of a failed parse, prefixed with its option name.
 */
export function formatOptionsError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid options';

  const [field] = issue.path;
  if (field === undefined || issue.message.startsWith('--')) {
    return issue.message;
  }

  const flag = String(field).replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
  return `--${flag} ${issue.message}`;
}
