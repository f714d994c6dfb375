export { getLogger, flushLoggers, formatLabel, buildTransportTargets, type Logger } from './logger.js';
export { logLevelsSchema, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig, type LogLevelName } from './env.schema.js';
