export {
  DATABASE_FILENAME,
  getDataDirectory,
  getDatabasePath,
  getNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './config.js';
