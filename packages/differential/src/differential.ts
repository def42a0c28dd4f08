/**
 * Differential
 *
 * Change tracking for one namespace: stage objects whose content changed
 * since they were last applied, then apply the staged versions through a
 * callback and promote the ones that succeed.
 */

import type {
  ConflictTrackingState,
  EntryState,
  KVBucket,
  Logger,
  ObjectId,
  PayloadCodec,
  StoreTransaction,
  TransactionalStore,
} from '@stagekeep/core';
import {
  ApplyError,
  DiffError,
  applyLimitSchema,
  bytesEqual,
  createRunId,
  hashOf,
  update,
  view,
} from '@stagekeep/core';
import { applyPending } from './apply.js';
import {
  disableConflictTracking,
  enableConflictTracking,
  readConflictState,
} from './conflict-mode.js';
import { requireId } from './keys.js';
import { stageItem } from './stage.js';
import { stageStream } from './stream.js';
import { openTables, type DiffTables } from './tables.js';
import type {
  ApplyFn,
  ApplyOptions,
  ApplyReport,
  StageSource,
  StreamStageOptions,
  StreamStageResult,
} from './types.js';

export interface DifferentialInit<T> {
  name: string;
  store: TransactionalStore;
  codec: PayloadCodec<T>;
  keyOf: (item: T) => Uint8Array;
  logger: Logger;
}

export class Differential<T> {
  readonly name: string;
  private readonly store: TransactionalStore;
  private readonly codec: PayloadCodec<T>;
  private readonly keyOf: (item: T) => Uint8Array;
  private readonly logger: Logger;

  constructor(init: DifferentialInit<T>) {
    this.name = init.name;
    this.store = init.store;
    this.codec = init.codec;
    this.keyOf = init.keyOf;
    this.logger = init.logger.child({ namespace: init.name });
  }

  // ============================================================================
  // Staging
  // ============================================================================

  /**
   * Stage one object in its own transaction.
   * @returns true when the object differs from both its committed and pending versions
   * @throws ConflictingKeyError when conflict tracking rejects the ID
   */
  async add(item: T): Promise<boolean> {
    return update(this.store, (tx) => this.addInTransaction(tx, item));
  }

  /**
   * Stage one object inside a caller-managed write transaction.
   */
  async addInTransaction(tx: StoreTransaction, item: T): Promise<boolean> {
    const tables = await openTables(tx, this.name);
    return stageItem(tables, this.stageContext(), item);
  }

  /**
   * Stage every object from `source` in a single transaction. Any error or
   * cancellation discards the whole run.
   */
  async addStream(
    source: StageSource<T>,
    options: StreamStageOptions = {}
  ): Promise<StreamStageResult> {
    const runId = createRunId();
    const log = this.logger.child({ runId });

    const tx = await this.store.begin(true);
    try {
      const tables = await openTables(tx, this.name);
      const result = await stageStream(
        tables,
        { ...this.stageContext(), logger: log },
        source,
        options.signal
      );
      await tx.commit();
      log.debug('stream staged', { received: result.received, updated: result.updated });
      return result;
    } catch (error) {
      log.warn('stream stage rolled back', { error });
      throw error;
    } finally {
      await tx.rollback();
    }
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * Whether `candidate` differs from the last applied version of `id`.
   * Pending versions are not considered.
   */
  async changed(id: ObjectId, candidate: T): Promise<boolean> {
    const key = requireId(id, this.name);
    const hash = hashOf(candidate, { seed: key });
    const committed = await this.withTables(false, (tables) => tables.committed.get(key));
    return !bytesEqual(committed, hash);
  }

  /** Number of IDs with an applied version */
  async countTracking(): Promise<number> {
    return this.withTables(false, (tables) => tables.committed.count());
  }

  /** Number of IDs waiting to be applied */
  async countChanges(): Promise<number> {
    return this.withTables(false, (tables) => tables.pending.count());
  }

  /** Committed and pending hashes of one ID */
  async state(id: ObjectId): Promise<EntryState> {
    const key = requireId(id, this.name);
    return this.withTables(false, async (tables) => {
      const [committed, pending] = await Promise.all([
        tables.committed.get(key),
        tables.pending.get(key),
      ]);
      return {
        ...(committed ? { committed } : {}),
        ...(pending ? { pending } : {}),
      };
    });
  }

  /** Pending IDs in the order an apply run visits them */
  async pendingIds(): Promise<Uint8Array[]> {
    return this.withTables(false, async (tables) => {
      const ids: Uint8Array[] = [];
      const cursor = tables.pending.cursor();
      for (let entry = await cursor.first(); entry; entry = await cursor.next()) {
        ids.push(entry.key);
      }
      return ids;
    });
  }

  // ============================================================================
  // Apply
  // ============================================================================

  /**
   * Apply every pending change.
   */
  async each(fn: ApplyFn<T>, options: ApplyOptions = {}): Promise<ApplyReport> {
    return this.eachN(fn, 0, options);
  }

  /**
   * Apply pending changes until `n` have been promoted (all when n <= 0).
   * Per-item failures are reported, not thrown; storage errors and a missing
   * payload reject and discard every promotion of the run.
   */
  async eachN(fn: ApplyFn<T>, n: number, options: ApplyOptions = {}): Promise<ApplyReport> {
    const limit = applyLimitSchema.safeParse(n);
    if (!limit.success) {
      throw new DiffError({
        code: 'INVALID_OPTIONS',
        message: `Apply limit must be an integer, got ${n}`,
        namespace: this.name,
      });
    }

    const runId = createRunId();
    const log = this.logger.child({ runId });

    const tx = await this.store.begin(true);
    try {
      const tables = await openTables(tx, this.name);
      const outcome = await applyPending(
        tables,
        { namespace: this.name, codec: this.codec, logger: log },
        fn,
        { limit: limit.data, signal: options.signal }
      );

      tx.onCommit(() => {
        log.info('apply run committed', {
          applied: outcome.applied,
          failed: outcome.failures.length,
          cancelled: outcome.cancelled !== undefined,
        });
      });
      await tx.commit();

      const hasError = outcome.failures.length > 0 || outcome.cancelled !== undefined;
      return {
        ...outcome,
        error: hasError ? new ApplyError(this.name, outcome.failures, outcome.cancelled) : undefined,
      };
    } catch (error) {
      log.error('apply run failed', { error });
      throw error;
    } finally {
      await tx.rollback();
    }
  }

  // ============================================================================
  // Conflict tracking
  // ============================================================================

  /**
   * Start a new conflict-tracking epoch, clearing earlier markers.
   * @returns The new epoch number
   */
  async enableConflictTracking(): Promise<number> {
    return update(this.store, async (tx) => {
      const tables = await openTables(tx, this.name);
      const epoch = await enableConflictTracking(tx, this.name, tables.meta);
      tx.onCommit(() => this.logger.info('conflict tracking enabled', { epoch }));
      return epoch;
    });
  }

  async disableConflictTracking(): Promise<void> {
    await update(this.store, async (tx) => {
      const tables = await openTables(tx, this.name);
      await disableConflictTracking(tx, this.name, tables.meta);
      tx.onCommit(() => this.logger.info('conflict tracking disabled'));
    });
  }

  async conflictTracking(): Promise<ConflictTrackingState> {
    return this.withTables(false, (tables) => readConflictState(tables.meta));
  }

  // ============================================================================
  // User data
  // ============================================================================

  /** Read the namespace's free-form bucket */
  async viewUserData<R>(fn: (bucket: KVBucket) => Promise<R>): Promise<R> {
    return this.withTables(false, (tables) => fn(tables.user));
  }

  /** Write the namespace's free-form bucket; commits when `fn` resolves */
  async updateUserData<R>(fn: (bucket: KVBucket) => Promise<R>): Promise<R> {
    return this.withTables(true, (tables) => fn(tables.user));
  }

  private stageContext() {
    return { namespace: this.name, codec: this.codec, keyOf: this.keyOf };
  }

  private withTables<R>(writable: boolean, fn: (tables: DiffTables) => Promise<R>): Promise<R> {
    const run = async (tx: StoreTransaction) => fn(await openTables(tx, this.name));
    return writable ? update(this.store, run) : view(this.store, run);
  }
}
