/**
 * Shared types for tracked objects and their digests
 */

/** Caller-assigned identity of a tracked object */
export type ObjectId = string | number | bigint | Uint8Array;

/** Fixed-width digest of an object's structural content */
export type ContentHash = Uint8Array;

/** Width of a ContentHash in bytes */
export const CONTENT_HASH_BYTES = 8;

/** Extracts the ID of a tracked object */
export type KeyFn<T> = (item: T) => ObjectId;

/** Committed and pending digests recorded for one ID */
export interface EntryState {
  committed?: ContentHash;
  pending?: ContentHash;
}

/** Persisted conflict-tracking mode of a namespace */
export interface ConflictTrackingState {
  enabled: boolean;
  /** Increments each time tracking is enabled; 0 when it never was */
  epoch: number;
}
