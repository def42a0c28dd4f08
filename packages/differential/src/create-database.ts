/**
 * Build a DiffDatabase from configuration
 */

import type { DatabaseConfig, DatabaseConfigInput, StoreConfig, TransactionalStore } from '@stagekeep/core';
import { Logger, parseDatabaseConfig } from '@stagekeep/core';
import { createMemoryStore } from '@stagekeep/store-memory';
import { createSqliteStore } from '@stagekeep/store-sqlite';
import { DiffDatabase } from './database.js';

/**
 * Create the store a configuration names
 */
export function createStore(config: StoreConfig): TransactionalStore {
  switch (config.driver) {
    case 'memory':
      return createMemoryStore();
    case 'sqlite':
      return createSqliteStore(config.path, { busyTimeoutMs: config.busyTimeoutMs });
    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown store driver: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Create a database from raw or parsed configuration.
 * @throws ConfigError when the configuration is invalid
 */
export function createDatabase(config: DatabaseConfigInput | DatabaseConfig = {}): DiffDatabase {
  const parsed = parseDatabaseConfig(config);
  const logger = new Logger({ level: parsed.logging.level, format: parsed.logging.format });
  const store = createStore(parsed.store);

  logger.debug('database created', { driver: parsed.store.driver });
  return new DiffDatabase({ store, logger });
}
