import type { KVBucket, StoreTransaction, TransactionalStore } from '@stagekeep/core';
import { DiffError } from '@stagekeep/core';
import { createMemoryStore } from '@stagekeep/store-memory';
import { createSqliteStore } from '@stagekeep/store-sqlite';

export interface Order {
  id: string;
  total: number;
  note?: string;
}

export const storeFactories: Array<[string, () => TransactionalStore]> = [
  ['memory', () => createMemoryStore()],
  ['sqlite', () => createSqliteStore(':memory:')],
];

class FlakyTransaction implements StoreTransaction {
  constructor(
    private readonly inner: StoreTransaction,
    private readonly owner: FlakyStore
  ) {}

  get writable(): boolean {
    return this.inner.writable;
  }

  get closed(): boolean {
    return this.inner.closed;
  }

  listNamespaces(): Promise<string[]> {
    return this.inner.listNamespaces();
  }

  hasNamespace(namespace: string): Promise<boolean> {
    return this.inner.hasNamespace(namespace);
  }

  createNamespaceIfNotExists(namespace: string): Promise<void> {
    return this.inner.createNamespaceIfNotExists(namespace);
  }

  deleteNamespace(namespace: string): Promise<boolean> {
    return this.inner.deleteNamespace(namespace);
  }

  bucket(namespace: string, name: string): Promise<KVBucket | undefined> {
    return this.inner.bucket(namespace, name);
  }

  createBucketIfNotExists(namespace: string, name: string): Promise<KVBucket> {
    return this.inner.createBucketIfNotExists(namespace, name);
  }

  deleteBucket(namespace: string, name: string): Promise<boolean> {
    return this.inner.deleteBucket(namespace, name);
  }

  onCommit(hook: () => void): void {
    this.inner.onCommit(hook);
  }

  async commit(): Promise<void> {
    if (this.owner.failCommits) {
      await this.inner.rollback();
      throw new DiffError({ code: 'STORAGE_ERROR', message: 'Commit failed: disk I/O error' });
    }
    await this.inner.commit();
  }

  rollback(): Promise<void> {
    return this.inner.rollback();
  }
}

/**
 * Store whose commits can be made to fail on demand.
 */
export class FlakyStore implements TransactionalStore {
  failCommits = false;

  constructor(private readonly inner: TransactionalStore) {}

  async begin(writable: boolean): Promise<StoreTransaction> {
    return new FlakyTransaction(await this.inner.begin(writable), this);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

export function ids(keys: Uint8Array[]): string[] {
  const decoder = new TextDecoder();
  return keys.map((key) => decoder.decode(key));
}

/** A promise that never settles, for sources that stall */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
