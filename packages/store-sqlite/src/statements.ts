/**
 * Schema and prepared statements for one SQLite connection.
 *
 * Entries live in a single WITHOUT ROWID table keyed by
 * (namespace, bucket, key). SQLite orders BLOBs with memcmp, so cursor
 * order is the lexicographic byte order of the keys.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS kv_namespaces (
    name TEXT NOT NULL PRIMARY KEY
  ) WITHOUT ROWID;

  CREATE TABLE IF NOT EXISTS kv_buckets (
    namespace TEXT NOT NULL,
    name TEXT NOT NULL,
    PRIMARY KEY (namespace, name)
  ) WITHOUT ROWID;

  CREATE TABLE IF NOT EXISTS kv_entries (
    namespace TEXT NOT NULL,
    bucket TEXT NOT NULL,
    key BLOB NOT NULL,
    value BLOB,
    PRIMARY KEY (namespace, bucket, key)
  ) WITHOUT ROWID;
`;

export interface EntryRow {
  key: Buffer;
  value: Buffer | null;
}

type BucketParams = [namespace: string, bucket: string];
type KeyParams = [namespace: string, bucket: string, key: Buffer];

export class SqliteStatements {
  readonly listNamespaces: Database.Statement<[], { name: string }>;
  readonly hasNamespace: Database.Statement<[string], { found: number }>;
  readonly insertNamespace: Database.Statement<[string]>;
  readonly deleteNamespace: Database.Statement<[string]>;
  readonly deleteNamespaceBuckets: Database.Statement<[string]>;
  readonly deleteNamespaceEntries: Database.Statement<[string]>;

  readonly hasBucket: Database.Statement<BucketParams, { found: number }>;
  readonly insertBucket: Database.Statement<BucketParams>;
  readonly deleteBucket: Database.Statement<BucketParams>;
  readonly deleteBucketEntries: Database.Statement<BucketParams>;

  readonly get: Database.Statement<KeyParams, { value: Buffer | null }>;
  readonly put: Database.Statement<[string, string, Buffer, Buffer]>;
  readonly delete: Database.Statement<KeyParams>;
  readonly count: Database.Statement<BucketParams, { n: number }>;
  readonly first: Database.Statement<BucketParams, EntryRow>;
  readonly after: Database.Statement<KeyParams, EntryRow>;

  constructor(db: Database.Database) {
    this.listNamespaces = db.prepare<[], { name: string }>(
      'SELECT name FROM kv_namespaces ORDER BY name'
    );
    this.hasNamespace = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM kv_namespaces WHERE name = ?'
    );
    this.insertNamespace = db.prepare<[string]>(
      'INSERT OR IGNORE INTO kv_namespaces (name) VALUES (?)'
    );
    this.deleteNamespace = db.prepare<[string]>('DELETE FROM kv_namespaces WHERE name = ?');
    this.deleteNamespaceBuckets = db.prepare<[string]>(
      'DELETE FROM kv_buckets WHERE namespace = ?'
    );
    this.deleteNamespaceEntries = db.prepare<[string]>(
      'DELETE FROM kv_entries WHERE namespace = ?'
    );

    this.hasBucket = db.prepare<BucketParams, { found: number }>(
      'SELECT 1 AS found FROM kv_buckets WHERE namespace = ? AND name = ?'
    );
    this.insertBucket = db.prepare<BucketParams>(
      'INSERT OR IGNORE INTO kv_buckets (namespace, name) VALUES (?, ?)'
    );
    this.deleteBucket = db.prepare<BucketParams>(
      'DELETE FROM kv_buckets WHERE namespace = ? AND name = ?'
    );
    this.deleteBucketEntries = db.prepare<BucketParams>(
      'DELETE FROM kv_entries WHERE namespace = ? AND bucket = ?'
    );

    this.get = db.prepare<KeyParams, { value: Buffer | null }>(
      'SELECT value FROM kv_entries WHERE namespace = ? AND bucket = ? AND key = ?'
    );
    this.put = db.prepare<[string, string, Buffer, Buffer]>(`
      INSERT INTO kv_entries (namespace, bucket, key, value) VALUES (?, ?, ?, ?)
      ON CONFLICT (namespace, bucket, key) DO UPDATE SET value = excluded.value
    `);
    this.delete = db.prepare<KeyParams>(
      'DELETE FROM kv_entries WHERE namespace = ? AND bucket = ? AND key = ?'
    );
    this.count = db.prepare<BucketParams, { n: number }>(
      'SELECT COUNT(*) AS n FROM kv_entries WHERE namespace = ? AND bucket = ?'
    );
    this.first = db.prepare<BucketParams, EntryRow>(
      'SELECT key, value FROM kv_entries WHERE namespace = ? AND bucket = ? ORDER BY key LIMIT 1'
    );
    this.after = db.prepare<KeyParams, EntryRow>(
      'SELECT key, value FROM kv_entries WHERE namespace = ? AND bucket = ? AND key > ? ORDER BY key LIMIT 1'
    );
  }
}
