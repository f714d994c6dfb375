import { z } from 'zod';

// Numeric values follow pino's defaults; audit sits above error so it is never filtered out
export const logLevelsSchema = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  audit: 60,
} as const;

export type LogLevelName = keyof typeof logLevelsSchema;

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_AUDIT_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid audit log directory name' }).default('logs'),
  // Off under test so no transport worker threads are spawned
  LOGGER_AUDIT_LOG_ENABLED: booleanFlag(process.env['NODE_ENV'] === 'test' ? 'false' : 'true'),
  LOGGER_AUDIT_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid audit log file name' }).default('audit'),
  LOGGER_AUDIT_LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  LOGGER_CONSOLE_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('gradebook.log'),
  LOGGER_LOG_LEVEL: z
    .string()
    .toLowerCase()
    .refine((val: string): val is LogLevelName => Object.keys(logLevelsSchema).includes(val), {
      message: 'Invalid log level',
    })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().default('gradebook'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
