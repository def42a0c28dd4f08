/**
 * Conflict-tracking mode, persisted in the namespace's meta bucket.
 *
 * The mode is read back inside every staging transaction, so it is exactly
 * as durable as the transaction that changed it.
 */

import type { ConflictTrackingState, KVBucket, StoreTransaction } from '@stagekeep/core';
import { utf8 } from '@stagekeep/core';
import { CONFLICTS_BUCKET } from './tables.js';

const ENABLED_KEY = utf8('conflict-tracking');
const EPOCH_KEY = utf8('conflict-epoch');

function encodeEpoch(epoch: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, epoch, false);
  return bytes;
}

function decodeEpoch(bytes: Uint8Array | undefined): number {
  if (!bytes || bytes.length !== 4) return 0;
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, false);
}

export async function readConflictState(meta: KVBucket): Promise<ConflictTrackingState> {
  const [enabled, epoch] = await Promise.all([meta.get(ENABLED_KEY), meta.get(EPOCH_KEY)]);
  return {
    enabled: enabled !== undefined,
    epoch: decodeEpoch(epoch),
  };
}

async function clearMarkers(tx: StoreTransaction, namespace: string): Promise<void> {
  await tx.deleteBucket(namespace, CONFLICTS_BUCKET);
  await tx.createBucketIfNotExists(namespace, CONFLICTS_BUCKET);
}

/**
 * Clear all markers and start a new epoch.
 * @returns The new epoch number
 */
export async function enableConflictTracking(
  tx: StoreTransaction,
  namespace: string,
  meta: KVBucket
): Promise<number> {
  await clearMarkers(tx, namespace);

  const { epoch } = await readConflictState(meta);
  const next = epoch + 1;
  await meta.put(EPOCH_KEY, encodeEpoch(next));
  await meta.put(ENABLED_KEY, Uint8Array.of(1));
  return next;
}

export async function disableConflictTracking(
  tx: StoreTransaction,
  namespace: string,
  meta: KVBucket
): Promise<void> {
  await meta.delete(ENABLED_KEY);
  await clearMarkers(tx, namespace);
}
