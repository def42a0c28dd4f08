/**
 * @stagekeep/differential
 *
 * Change detection and staged apply for identifiable objects
 */

export { DiffDatabase } from './database.js';
export type { DiffDatabaseOptions } from './database.js';
export { Differential } from './differential.js';
export { BoundedQueue } from './bounded-queue.js';
export { raceAbort } from './stream.js';
export { createDatabase, createStore } from './create-database.js';
export {
  COMMITTED_BUCKET,
  PENDING_BUCKET,
  PAYLOADS_BUCKET,
  CONFLICTS_BUCKET,
  USER_BUCKET,
  META_BUCKET,
} from './tables.js';
export type {
  ApplyFn,
  ApplyOptions,
  ApplyReport,
  DifferentialOptions,
  PendingChange,
  StageSource,
  StreamStageOptions,
  StreamStageResult,
} from './types.js';

// Re-export core for convenience
export * from '@stagekeep/core';
