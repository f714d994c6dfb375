import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  GRADEBOOK_DATA_DIR: z.string().trim().min(1).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

export const DATABASE_FILENAME = 'gradebook.db';

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access and caches the result.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Directory holding the gradebook database.
 *
 * GRADEBOOK_DATA_DIR when set, otherwise `<cwd>/data`.
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.GRADEBOOK_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getDatabasePath(): string {
  return path.join(getDataDirectory(), DATABASE_FILENAME);
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}
