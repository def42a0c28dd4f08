/**
 * Transactional Store Interface
 *
 * The differential engine is written against this capability only.
 * A store holds named namespaces; each namespace holds named buckets of
 * byte keys mapped to byte values, iterated in ascending byte order.
 * Implementations: @stagekeep/store-memory, @stagekeep/store-sqlite.
 */

/** A key/value pair returned by a cursor */
export interface KVEntry {
  key: Uint8Array;
  value: Uint8Array;
}

/**
 * Forward cursor over a bucket.
 *
 * Cursors are seek based: next() returns the first entry after the last key
 * returned, so the current entry may be deleted (or others inserted) while
 * iterating without invalidating the cursor.
 */
export interface KVCursor {
  /** Position on the smallest key */
  first(): Promise<KVEntry | undefined>;

  /** Advance past the last returned key */
  next(): Promise<KVEntry | undefined>;
}

/**
 * A bucket within a namespace, scoped to the transaction that opened it
 */
export interface KVBucket {
  readonly name: string;

  /**
   * Get a value by key
   * @returns The value, or undefined if not found
   */
  get(key: Uint8Array): Promise<Uint8Array | undefined>;

  /**
   * Set a value
   * @throws DiffError READ_ONLY_TRANSACTION in a read transaction
   */
  put(key: Uint8Array, value: Uint8Array): Promise<void>;

  /**
   * Delete a key
   * @returns True if the key existed
   */
  delete(key: Uint8Array): Promise<boolean>;

  /** Number of keys in the bucket */
  count(): Promise<number>;

  /** Open a forward cursor */
  cursor(): KVCursor;
}

/**
 * A read or read-write transaction.
 *
 * Write transactions are exclusive per store. Nothing a write transaction
 * does is visible to other transactions until commit().
 */
export interface StoreTransaction {
  readonly writable: boolean;

  /** True after commit() or rollback() */
  readonly closed: boolean;

  listNamespaces(): Promise<string[]>;
  hasNamespace(namespace: string): Promise<boolean>;
  createNamespaceIfNotExists(namespace: string): Promise<void>;

  /**
   * Delete a namespace and all of its buckets
   * @returns True if the namespace existed
   */
  deleteNamespace(namespace: string): Promise<boolean>;

  /** Get an existing bucket, or undefined if it (or the namespace) does not exist */
  bucket(namespace: string, name: string): Promise<KVBucket | undefined>;

  /** Get or create a bucket in an existing namespace */
  createBucketIfNotExists(namespace: string, name: string): Promise<KVBucket>;

  /**
   * Delete a bucket and its contents
   * @returns True if the bucket existed
   */
  deleteBucket(namespace: string, name: string): Promise<boolean>;

  /**
   * Register a function to run after this transaction commits successfully.
   * Hooks never run on rollback.
   */
  onCommit(hook: () => void): void;

  /**
   * Make all changes durable and release the transaction.
   * A failed commit leaves nothing applied and closes the transaction.
   */
  commit(): Promise<void>;

  /** Discard all changes. A no-op on a closed transaction. */
  rollback(): Promise<void>;
}

/**
 * A handle on a transactional store. Safe for concurrent use by multiple callers.
 */
export interface TransactionalStore {
  /**
   * Begin a transaction. A write transaction waits until any
   * prior write transaction has committed or rolled back.
   */
  begin(writable: boolean): Promise<StoreTransaction>;

  /** Release resources; further use raises STORE_CLOSED */
  close(): Promise<void>;
}
