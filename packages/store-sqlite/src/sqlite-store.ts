/**
 * SQLite TransactionalStore
 *
 * Wrapper around better-sqlite3. Write transactions run as BEGIN IMMEDIATE
 * on the writer connection and are admitted one at a time. File databases
 * use WAL and pooled read-only connections; each read transaction holds one
 * for its lifetime inside a deferred BEGIN, so every read in it sees the same
 * committed snapshot without waiting. An in-memory database has one
 * connection, so its reads are admitted like writes.
 */

import Database from 'better-sqlite3';
import type {
  KVBucket,
  KVCursor,
  KVEntry,
  StoreTransaction,
  TransactionalStore,
} from '@stagekeep/core';
import { BaseTransaction, DiffError, WriteLock, wrapError } from '@stagekeep/core';
import { SCHEMA_SQL, SqliteStatements, type EntryRow } from './statements.js';

export interface SqliteStoreOptions {
  /** Database file, or ':memory:' */
  path: string;
  /** How long a connection waits on a locked database file (default: 5000) */
  busyTimeoutMs?: number;
}

interface ReaderConnection {
  db: Database.Database;
  statements: SqliteStatements;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function toEntry(row: EntryRow): KVEntry {
  return {
    key: new Uint8Array(row.key),
    value: row.value ? new Uint8Array(row.value) : new Uint8Array(0),
  };
}

/**
 * Run a driver call, converting driver failures into DiffError
 */
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw wrapError(err, 'STORAGE_ERROR', { operation: `SQLite ${operation}` });
  }
}

class SqliteTransaction extends BaseTransaction {
  constructor(
    private readonly db: Database.Database,
    readonly statements: SqliteStatements,
    writable: boolean,
    private readonly releaseLock: () => void
  ) {
    super(writable);
  }

  async listNamespaces(): Promise<string[]> {
    this.assertOpen();
    return guard('list namespaces', () => this.statements.listNamespaces.all().map((r) => r.name));
  }

  async hasNamespace(namespace: string): Promise<boolean> {
    this.assertOpen();
    return guard('namespace lookup', () => this.statements.hasNamespace.get(namespace) !== undefined);
  }

  async createNamespaceIfNotExists(namespace: string): Promise<void> {
    this.assertWritable();
    guard('create namespace', () => this.statements.insertNamespace.run(namespace));
  }

  async deleteNamespace(namespace: string): Promise<boolean> {
    this.assertWritable();
    return guard('delete namespace', () => {
      this.statements.deleteNamespaceEntries.run(namespace);
      this.statements.deleteNamespaceBuckets.run(namespace);
      return this.statements.deleteNamespace.run(namespace).changes > 0;
    });
  }

  async bucket(namespace: string, name: string): Promise<KVBucket | undefined> {
    this.assertOpen();
    const exists = guard('bucket lookup', () => this.statements.hasBucket.get(namespace, name));
    return exists ? new SqliteBucket(this, namespace, name) : undefined;
  }

  async createBucketIfNotExists(namespace: string, name: string): Promise<KVBucket> {
    this.assertWritable();
    if (!(await this.hasNamespace(namespace))) {
      throw new DiffError({
        code: 'NAMESPACE_NOT_FOUND',
        message: `Namespace '${namespace}' does not exist`,
        namespace,
        suggestion: 'Create the namespace before creating buckets in it.',
      });
    }
    guard('create bucket', () => this.statements.insertBucket.run(namespace, name));
    return new SqliteBucket(this, namespace, name);
  }

  async deleteBucket(namespace: string, name: string): Promise<boolean> {
    this.assertWritable();
    return guard('delete bucket', () => {
      this.statements.deleteBucketEntries.run(namespace, name);
      return this.statements.deleteBucket.run(namespace, name).changes > 0;
    });
  }

  protected async persist(): Promise<void> {
    this.db.exec('COMMIT');
  }

  protected async discard(): Promise<void> {
    // Also ends the read snapshot of a pooled reader
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  protected release(): void {
    this.releaseLock();
  }
}

class SqliteBucket implements KVBucket {
  constructor(
    private readonly tx: SqliteTransaction,
    private readonly namespace: string,
    readonly name: string
  ) {}

  async get(key: Uint8Array): Promise<Uint8Array | undefined> {
    this.tx.assertOpen();
    const row = guard('get', () => this.tx.statements.get.get(this.namespace, this.name, toBuffer(key)));
    if (!row) return undefined;
    return row.value ? new Uint8Array(row.value) : new Uint8Array(0);
  }

  async put(key: Uint8Array, value: Uint8Array): Promise<void> {
    this.tx.assertWritable();
    guard('put', () =>
      this.tx.statements.put.run(this.namespace, this.name, toBuffer(key), toBuffer(value))
    );
  }

  async delete(key: Uint8Array): Promise<boolean> {
    this.tx.assertWritable();
    return guard(
      'delete',
      () => this.tx.statements.delete.run(this.namespace, this.name, toBuffer(key)).changes > 0
    );
  }

  async count(): Promise<number> {
    this.tx.assertOpen();
    const row = guard('count', () => this.tx.statements.count.get(this.namespace, this.name));
    return row?.n ?? 0;
  }

  cursor(): KVCursor {
    return new SqliteCursor(this.tx, this.namespace, this.name);
  }
}

class SqliteCursor implements KVCursor {
  private lastKey?: Buffer;

  constructor(
    private readonly tx: SqliteTransaction,
    private readonly namespace: string,
    private readonly bucket: string
  ) {}

  async first(): Promise<KVEntry | undefined> {
    this.tx.assertOpen();
    return this.track(guard('cursor', () => this.tx.statements.first.get(this.namespace, this.bucket)));
  }

  async next(): Promise<KVEntry | undefined> {
    const lastKey = this.lastKey;
    if (lastKey === undefined) return this.first();
    this.tx.assertOpen();
    return this.track(
      guard('cursor', () => this.tx.statements.after.get(this.namespace, this.bucket, lastKey))
    );
  }

  private track(row: EntryRow | undefined): KVEntry | undefined {
    if (!row) return undefined;
    this.lastKey = row.key;
    return toEntry(row);
  }
}

/**
 * SQLite-backed TransactionalStore implementation.
 */
export class SqliteStore implements TransactionalStore {
  private readonly writer: Database.Database;
  private readonly readerPath?: string;
  private readonly readers: ReaderConnection[] = [];
  private readonly idleReaders: ReaderConnection[] = [];
  private readonly busyTimeoutMs: number;
  private readonly writerStatements: SqliteStatements;
  private readonly writeLock = new WriteLock();
  private isClosed = false;

  constructor(options: SqliteStoreOptions) {
    const inMemory = options.path === ':memory:' || options.path === '';
    const timeout = options.busyTimeoutMs ?? 5000;
    this.busyTimeoutMs = timeout;

    this.writer = guard('open', () => new Database(options.path, { timeout }));
    guard('initialize', () => {
      if (!inMemory) {
        this.writer.pragma('journal_mode = WAL');
      }
      this.writer.exec(SCHEMA_SQL);
    });
    this.writerStatements = guard('prepare', () => new SqliteStatements(this.writer));

    if (!inMemory) {
      this.readerPath = options.path;
      this.idleReaders.push(this.openReader(options.path));
    }
  }

  async begin(writable: boolean): Promise<StoreTransaction> {
    this.assertOpen();

    if (!writable && this.readerPath !== undefined) {
      const reader = this.idleReaders.pop() ?? this.openReader(this.readerPath);
      try {
        guard('begin', () => reader.db.exec('BEGIN DEFERRED'));
      } catch (err) {
        this.idleReaders.push(reader);
        throw err;
      }
      return new SqliteTransaction(reader.db, reader.statements, false, () => {
        this.idleReaders.push(reader);
      });
    }

    const release = await this.writeLock.acquire();
    if (this.isClosed) {
      release();
      this.assertOpen();
    }

    if (writable) {
      try {
        guard('begin', () => this.writer.exec('BEGIN IMMEDIATE'));
      } catch (err) {
        release();
        throw err;
      }
    }

    return new SqliteTransaction(this.writer, this.writerStatements, writable, release);
  }

  async close(): Promise<void> {
    if (this.isClosed) return;

    // Let an in-flight writer finish before closing the connections
    const release = await this.writeLock.acquire();
    try {
      this.isClosed = true;
      for (const reader of this.readers.splice(0)) {
        reader.db.close();
      }
      this.idleReaders.length = 0;
      this.writer.close();
    } finally {
      release();
    }
  }

  private openReader(path: string): ReaderConnection {
    const db = guard(
      'open reader',
      () => new Database(path, { timeout: this.busyTimeoutMs, readonly: true, fileMustExist: true })
    );
    const reader = { db, statements: guard('prepare', () => new SqliteStatements(db)) };
    this.readers.push(reader);
    return reader;
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
