/**
 * @stagekeep/store-sqlite
 *
 * Durable transactional store on SQLite
 */

import { SqliteStore, type SqliteStoreOptions } from './sqlite-store.js';

export { SqliteStore } from './sqlite-store.js';
export type { SqliteStoreOptions } from './sqlite-store.js';

/**
 * Factory function to open (or create) a SQLite store
 *
 * @param path - Database file, or ':memory:'
 */
export function createSqliteStore(
  path: string,
  options: Omit<SqliteStoreOptions, 'path'> = {}
): SqliteStore {
  return new SqliteStore({ ...options, path });
}

// Re-export core types for convenience
export type {
  TransactionalStore,
  StoreTransaction,
  KVBucket,
  KVCursor,
  KVEntry,
} from '@stagekeep/core';
