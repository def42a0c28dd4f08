/**
 * Bucket layout of a differential namespace
 */

import type { KVBucket, StoreTransaction } from '@stagekeep/core';
import { DiffError } from '@stagekeep/core';

/** ID → hash of the last applied version */
export const COMMITTED_BUCKET = '_committed';
/** ID → hash of the latest staged version */
export const PENDING_BUCKET = '_pending';
/** Hash → serialized payload of a pending version */
export const PAYLOADS_BUCKET = '_payloads';
/** ID → hash staged in the current conflict-tracking epoch */
export const CONFLICTS_BUCKET = '_conflicts';
/** Free-form caller data */
export const USER_BUCKET = '_user';
/** Persisted namespace mode */
export const META_BUCKET = '_meta';

const BUCKETS = [
  COMMITTED_BUCKET,
  PENDING_BUCKET,
  PAYLOADS_BUCKET,
  CONFLICTS_BUCKET,
  USER_BUCKET,
  META_BUCKET,
] as const;

export interface DiffTables {
  committed: KVBucket;
  pending: KVBucket;
  payloads: KVBucket;
  conflicts: KVBucket;
  user: KVBucket;
  meta: KVBucket;
}

/**
 * Create the namespace and any of its buckets that are missing.
 */
export async function createTables(tx: StoreTransaction, namespace: string): Promise<void> {
  await tx.createNamespaceIfNotExists(namespace);
  for (const name of BUCKETS) {
    await tx.createBucketIfNotExists(namespace, name);
  }
}

async function requireBucket(
  tx: StoreTransaction,
  namespace: string,
  name: string
): Promise<KVBucket> {
  const bucket = await tx.bucket(namespace, name);
  if (!bucket) {
    throw new DiffError({
      code: 'NAMESPACE_NOT_FOUND',
      message: `Differential '${namespace}' does not exist or is missing bucket '${name}'`,
      namespace,
      suggestion: 'Open the differential again; it may have been deleted.',
    });
  }
  return bucket;
}

/**
 * Open the buckets of an existing namespace.
 * @throws DiffError NAMESPACE_NOT_FOUND
 */
export async function openTables(tx: StoreTransaction, namespace: string): Promise<DiffTables> {
  return {
    committed: await requireBucket(tx, namespace, COMMITTED_BUCKET),
    pending: await requireBucket(tx, namespace, PENDING_BUCKET),
    payloads: await requireBucket(tx, namespace, PAYLOADS_BUCKET),
    conflicts: await requireBucket(tx, namespace, CONFLICTS_BUCKET),
    user: await requireBucket(tx, namespace, USER_BUCKET),
    meta: await requireBucket(tx, namespace, META_BUCKET),
  };
}
