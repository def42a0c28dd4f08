/**
 * In-memory TransactionalStore
 *
 * Copy-on-write snapshots: read transactions see the state committed when
 * they began and never wait; a write transaction copies each table the
 * first time it modifies it and publishes its tables on commit.
 * No persistence - data is lost when the store is garbage collected.
 */

import type {
  KVBucket,
  KVCursor,
  KVEntry,
  StoreTransaction,
  TransactionalStore,
} from '@stagekeep/core';
import { BaseTransaction, DiffError, WriteLock, fromHex } from '@stagekeep/core';
import { MemoryTable } from './memory-table.js';

type NamespaceState = Map<string, MemoryTable>;
type StoreState = Map<string, NamespaceState>;

function bucketMissing(namespace: string, name: string): DiffError {
  return new DiffError({
    code: 'STORAGE_ERROR',
    message: `Bucket '${name}' no longer exists`,
    namespace,
  });
}

function namespaceMissing(namespace: string): DiffError {
  return new DiffError({
    code: 'NAMESPACE_NOT_FOUND',
    message: `Namespace '${namespace}' does not exist`,
    namespace,
    suggestion: 'Create the namespace before creating buckets in it.',
  });
}

class MemoryTransaction extends BaseTransaction {
  private readonly owned = new Set<MemoryTable>();

  constructor(
    private readonly state: StoreState,
    writable: boolean,
    private readonly publish: (state: StoreState) => void,
    private readonly releaseLock: () => void
  ) {
    super(writable);
  }

  /** Current table for reading */
  table(namespace: string, name: string): MemoryTable | undefined {
    this.assertOpen();
    return this.state.get(namespace)?.get(name);
  }

  /** Current table for writing, copied on first modification */
  writableTable(namespace: string, name: string): MemoryTable | undefined {
    this.assertWritable();
    const ns = this.state.get(namespace);
    const table = ns?.get(name);
    if (!ns || !table) return undefined;
    if (this.owned.has(table)) return table;

    const copy = table.clone();
    ns.set(name, copy);
    this.owned.add(copy);
    return copy;
  }

  async listNamespaces(): Promise<string[]> {
    this.assertOpen();
    return Array.from(this.state.keys()).sort();
  }

  async hasNamespace(namespace: string): Promise<boolean> {
    this.assertOpen();
    return this.state.has(namespace);
  }

  async createNamespaceIfNotExists(namespace: string): Promise<void> {
    this.assertWritable();
    if (!this.state.has(namespace)) {
      this.state.set(namespace, new Map());
    }
  }

  async deleteNamespace(namespace: string): Promise<boolean> {
    this.assertWritable();
    return this.state.delete(namespace);
  }

  async bucket(namespace: string, name: string): Promise<KVBucket | undefined> {
    this.assertOpen();
    if (!this.state.get(namespace)?.has(name)) return undefined;
    return new MemoryBucket(this, namespace, name);
  }

  async createBucketIfNotExists(namespace: string, name: string): Promise<KVBucket> {
    this.assertWritable();
    const ns = this.state.get(namespace);
    if (!ns) throw namespaceMissing(namespace);

    if (!ns.has(name)) {
      const table = new MemoryTable();
      ns.set(name, table);
      this.owned.add(table);
    }
    return new MemoryBucket(this, namespace, name);
  }

  async deleteBucket(namespace: string, name: string): Promise<boolean> {
    this.assertWritable();
    return this.state.get(namespace)?.delete(name) ?? false;
  }

  protected async persist(): Promise<void> {
    this.publish(this.state);
  }

  protected async discard(): Promise<void> {
    this.owned.clear();
  }

  protected release(): void {
    this.releaseLock();
  }
}

class MemoryBucket implements KVBucket {
  constructor(
    private readonly tx: MemoryTransaction,
    private readonly namespace: string,
    readonly name: string
  ) {}

  readTable(): MemoryTable {
    const table = this.tx.table(this.namespace, this.name);
    if (!table) throw bucketMissing(this.namespace, this.name);
    return table;
  }

  async get(key: Uint8Array): Promise<Uint8Array | undefined> {
    const value = this.readTable().get(key);
    // Return a copy to prevent external mutation
    return value ? new Uint8Array(value) : undefined;
  }

  async put(key: Uint8Array, value: Uint8Array): Promise<void> {
    const table = this.tx.writableTable(this.namespace, this.name);
    if (!table) throw bucketMissing(this.namespace, this.name);
    table.put(key, new Uint8Array(value));
  }

  async delete(key: Uint8Array): Promise<boolean> {
    const table = this.tx.writableTable(this.namespace, this.name);
    if (!table) throw bucketMissing(this.namespace, this.name);
    return table.delete(key);
  }

  async count(): Promise<number> {
    return this.readTable().size;
  }

  cursor(): KVCursor {
    return new MemoryCursor(this);
  }
}

class MemoryCursor implements KVCursor {
  private lastKey?: string;

  constructor(private readonly bucket: MemoryBucket) {}

  async first(): Promise<KVEntry | undefined> {
    return this.position(undefined);
  }

  async next(): Promise<KVEntry | undefined> {
    if (this.lastKey === undefined) return this.first();
    return this.position(this.lastKey);
  }

  private position(from: string | undefined): KVEntry | undefined {
    const table = this.bucket.readTable();
    const hexKey = table.keyAfter(from);
    if (hexKey === undefined) return undefined;

    const value = table.getHex(hexKey);
    if (!value) return undefined;

    this.lastKey = hexKey;
    return { key: fromHex(hexKey), value: new Uint8Array(value) };
  }
}

/**
 * In-memory TransactionalStore implementation.
 */
export class MemoryStore implements TransactionalStore {
  private state: StoreState = new Map();
  private readonly writeLock = new WriteLock();
  private isClosed = false;

  async begin(writable: boolean): Promise<StoreTransaction> {
    this.assertOpen();

    if (!writable) {
      return new MemoryTransaction(this.snapshot(), false, () => undefined, () => undefined);
    }

    const release = await this.writeLock.acquire();
    if (this.isClosed) {
      release();
      this.assertOpen();
    }

    return new MemoryTransaction(
      this.snapshot(),
      true,
      (next) => {
        this.state = next;
      },
      release
    );
  }

  async close(): Promise<void> {
    this.isClosed = true;
    this.state = new Map();
  }

  /**
   * Number of namespaces (for testing)
   */
  get namespaceCount(): number {
    return this.state.size;
  }

  /** Fresh namespace maps over the committed tables */
  private snapshot(): StoreState {
    const copy: StoreState = new Map();
    for (const [name, ns] of this.state) {
      copy.set(name, new Map(ns));
    }
    return copy;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new DiffError({
        code: 'STORE_CLOSED',
        message: 'Store has been closed',
      });
    }
  }
}
