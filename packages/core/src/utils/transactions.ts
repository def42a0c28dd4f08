/**
 * Managed transactions: commit when the callback resolves, roll back when it throws.
 */

import type { StoreTransaction, TransactionalStore } from '../interfaces/index.js';

/**
 * Run `fn` in a read transaction.
 */
export async function view<T>(
  store: TransactionalStore,
  fn: (tx: StoreTransaction) => Promise<T>
): Promise<T> {
  const tx = await store.begin(false);
  try {
    return await fn(tx);
  } finally {
    await tx.rollback();
  }
}

/**
 * Run `fn` in a write transaction and commit its changes.
 * Any error from `fn` or from the commit leaves nothing applied.
 */
export async function update<T>(
  store: TransactionalStore,
  fn: (tx: StoreTransaction) => Promise<T>
): Promise<T> {
  const tx = await store.begin(true);
  try {
    const result = await fn(tx);
    await tx.commit();
    return result;
  } finally {
    await tx.rollback();
  }
}
