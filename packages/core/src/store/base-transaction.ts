/**
 * Base class for store transactions
 * Handles common functionality: open/closed state, read-only guards, commit hooks
 */

import type { KVBucket, StoreTransaction } from '../interfaces/index.js';
import { DiffError } from '../errors/index.js';

export abstract class BaseTransaction implements StoreTransaction {
  private isClosed = false;
  private readonly commitHooks: Array<() => void> = [];

  constructor(readonly writable: boolean) {}

  get closed(): boolean {
    return this.isClosed;
  }

  abstract listNamespaces(): Promise<string[]>;
  abstract hasNamespace(namespace: string): Promise<boolean>;
  abstract createNamespaceIfNotExists(namespace: string): Promise<void>;
  abstract deleteNamespace(namespace: string): Promise<boolean>;
  abstract bucket(namespace: string, name: string): Promise<KVBucket | undefined>;
  abstract createBucketIfNotExists(namespace: string, name: string): Promise<KVBucket>;
  abstract deleteBucket(namespace: string, name: string): Promise<boolean>;

  /** Make the transaction's writes durable. Throwing leaves nothing applied. */
  protected abstract persist(): Promise<void>;

  /** Discard the transaction's writes */
  protected abstract discard(): Promise<void>;

  /** Release locks and connections held by the transaction */
  protected abstract release(): void;

  onCommit(hook: () => void): void {
    this.assertOpen();
    this.commitHooks.push(hook);
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (!this.writable) {
      throw new DiffError({
        code: 'READ_ONLY_TRANSACTION',
        message: 'Cannot commit a read-only transaction',
        suggestion: 'Call rollback() to end a read transaction.',
      });
    }

    this.isClosed = true;
    try {
      await this.persist();
    } catch (err) {
      try {
        await this.discard();
      } finally {
        this.release();
      }
      throw new DiffError({
        code: 'STORAGE_ERROR',
        message: `Commit failed: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
    this.release();

    for (const hook of this.commitHooks) {
      hook();
    }
  }

  async rollback(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    try {
      await this.discard();
    } finally {
      this.release();
    }
  }

  assertOpen(): void {
    if (this.isClosed) {
      throw new DiffError({
        code: 'TRANSACTION_CLOSED',
        message: 'Transaction has already been committed or rolled back',
      });
    }
  }

  assertWritable(): void {
    this.assertOpen();
    if (!this.writable) {
      throw new DiffError({
        code: 'READ_ONLY_TRANSACTION',
        message: 'Cannot modify data in a read-only transaction',
        suggestion: 'Use a write transaction (update) for modifications.',
      });
    }
  }
}
