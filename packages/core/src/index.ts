/**
 * @stagekeep/core
 *
 * Store capability, hashing, codec and shared infrastructure
 * for differential change tracking
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Hashing
export * from './hashing/index.js';

// Payload codec
export * from './codec/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export { Logger, silentLogger, createRunId, serializeField } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';

// Configuration
export {
  ConfigError,
  expandEnvVars,
  formatZodError,
  parseDatabaseConfig,
  loadConfigFile,
  configFromEnv,
  databaseConfigSchema,
  storeConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
  logFormatSchema,
} from './config.js';
export type {
  EnvExpansionOptions,
  StoreConfig,
  LoggingConfig,
  DatabaseConfig,
  DatabaseConfigInput,
} from './config.js';

// Store building blocks
export * from './store/index.js';
