/**
 * @stagekeep/store-memory
 *
 * In-process transactional store for tests and ephemeral namespaces
 */

import { MemoryStore } from './memory-store.js';

export { MemoryStore } from './memory-store.js';

/**
 * Factory function to create an empty MemoryStore
 */
export function createMemoryStore(): MemoryStore {
  return new MemoryStore();
}

// Re-export core types for convenience
export type {
  TransactionalStore,
  StoreTransaction,
  KVBucket,
  KVCursor,
  KVEntry,
} from '@stagekeep/core';
