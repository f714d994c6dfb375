import fs from 'node:fs';
import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { logLevelsSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

/**
 * Category logger. Carries the custom `audit` level used for
 * committed submissions on top of pino's standard methods.
 */
export type Logger = pino.Logger<'audit'>;

const env = validateLoggerEnv(process.env);

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

/**
 * Pads or truncates a category to a fixed width; long labels keep
 * their tail and get a leading ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  // VITEST is set after this module may already have validated NODE_ENV
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

export function buildTransportTargets(config: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (config.LOGGER_CONSOLE_ENABLED) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { ignore: 'pid,hostname,category,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stdout for log collectors
      targets.push({ level: 'trace', options: { destination: 1 }, target: 'pino/file' });
    }
  }

  if (config.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${config.LOGGER_AUDIT_LOG_DIRNAME}/${config.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (config.LOGGER_AUDIT_LOG_ENABLED) {
    targets.push({
      level: 'audit',
      options: {
        file: `./${config.LOGGER_AUDIT_LOG_DIRNAME}/${config.LOGGER_AUDIT_LOG_FILENAME}_${os.hostname()}.log`,
        frequency: 'daily',
        limit: { count: config.LOGGER_AUDIT_LOG_RETENTION_DAYS },
        mkdir: true,
        size: '10m',
      },
      target: 'pino-roll',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions<'audit'> = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    customLevels: logLevelsSchema,
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    useOnlyCustomLevels: true,
  };

  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino<'audit'>(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(env);
  if (targets.length === 0) {
    return pino.pino<'audit'>({ ...pinoConfig, enabled: false });
  }

  if (env.LOGGER_FILE_LOG_ENABLED || env.LOGGER_AUDIT_LOG_ENABLED) {
    fs.mkdirSync(env.LOGGER_AUDIT_LOG_DIRNAME, { recursive: true });
  }

  return pino.pino<'audit'>({ ...pinoConfig, transport: { targets } });
}

/**
 * Returns the logger for a category, creating the root logger on first use.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Flushes buffered output of the root logger. Call before process exit.
 */
export function flushLoggers(): void {
  rootLogger?.flush();
}
