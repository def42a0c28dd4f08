/**
 * Differential Types
 *
 * Types for staging objects and applying pending changes.
 */

import type {
  ApplyCancellation,
  ApplyError,
  ApplyFailure,
  ContentHash,
  KeyFn,
  Logger,
  PayloadCodec,
} from '@stagekeep/core';

/** Options for opening a differential namespace */
export interface DifferentialOptions<T> {
  /** Property holding the object's ID (default: 'id'); ignored when keyOf is given */
  keyField?: string;
  /** Extracts the object's ID */
  keyOf?: KeyFn<T>;
  /** Payload codec (default: MessagePack) */
  codec?: PayloadCodec<T>;
  /** Logger for this namespace (default: the database logger) */
  logger?: Logger;
}

/** A staged change handed to the apply callback */
export interface PendingChange<T> {
  readonly id: Uint8Array;
  readonly hash: ContentHash;
  /** Serialized payload as stored */
  readonly bytes: Uint8Array;
  /**
   * Decode the payload. Decoding happens once; later calls return the same value.
   * @throws DiffError DECODING_FAILED
   */
  decode(): T;
}

/**
 * Applies one pending change downstream. Throwing (or rejecting) marks the
 * item as failed; it stays pending for the next run.
 */
export type ApplyFn<T> = (id: Uint8Array, change: PendingChange<T>) => void | Promise<void>;

export interface ApplyOptions {
  /** Stops the run between items; items already promoted are kept */
  signal?: AbortSignal;
}

/** Outcome of an apply run */
export interface ApplyReport {
  /** Number of items promoted to committed */
  applied: number;
  /** Items whose callback failed, in key order */
  failures: ApplyFailure[];
  /** Set when the run stopped because the signal aborted */
  cancelled?: ApplyCancellation;
  /** Undefined when there were no failures and no cancellation */
  error?: ApplyError;
}

export interface StreamStageOptions {
  /** Aborting discards everything staged by the run */
  signal?: AbortSignal;
}

/** Outcome of a committed streaming stage */
export interface StreamStageResult {
  /** Objects read from the source */
  received: number;
  /** Objects that created or replaced a pending entry */
  updated: number;
}

/** Source for streaming stage; a null or undefined item ends the stream */
export type StageSource<T> = Iterable<T | null | undefined> | AsyncIterable<T | null | undefined>;
