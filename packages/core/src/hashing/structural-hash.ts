/**
 * Structural Hasher
 *
 * Computes a fixed-width digest of a value's content. Equal content gives
 * equal digests regardless of object key order or Map/Set insertion order,
 * in this process and any other.
 *
 * The value is written as a tagged, length-prefixed token stream into
 * SHA-256 and the digest is truncated to CONTENT_HASH_BYTES. The digest is
 * for change detection only and makes no collision-resistance claim.
 */

import { createHash, type Hash } from 'node:crypto';
import { CONTENT_HASH_BYTES, type ContentHash } from '../types/index.js';
import { HashingError } from '../errors/index.js';
import { compareBytes } from '../utils/bytes.js';

const Tag = {
  Nil: 0x00,
  False: 0x01,
  True: 0x02,
  Number: 0x03,
  BigInt: 0x04,
  String: 0x05,
  Bytes: 0x06,
  Date: 0x07,
  Array: 0x08,
  Object: 0x09,
  Map: 0x0a,
  Set: 0x0b,
  Seed: 0x0c,
} as const;

type Tag = (typeof Tag)[keyof typeof Tag];

export interface HashOptions {
  /** Bytes mixed in before the value, e.g. the object's ID */
  seed?: Uint8Array;
}

function writeTag(hash: Hash, tag: Tag): void {
  hash.update(Uint8Array.of(tag));
}

function writeLength(hash: Hash, length: number): void {
  const buf = Buffer.allocUnsafe(4);
  buf.writeUInt32BE(length, 0);
  hash.update(buf);
}

function writeString(hash: Hash, value: string): void {
  const bytes = Buffer.from(value, 'utf8');
  writeLength(hash, bytes.length);
  hash.update(bytes);
}

function describeKey(path: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

class StructuralHasher {
  private readonly ancestors = new Set<object>();

  digest(value: unknown, path: string, seed?: Uint8Array): Uint8Array {
    const hash = createHash('sha256');
    if (seed) {
      writeTag(hash, Tag.Seed);
      writeLength(hash, seed.length);
      hash.update(seed);
    }
    this.write(hash, value, path);
    return new Uint8Array(hash.digest());
  }

  private write(hash: Hash, value: unknown, path: string): void {
    switch (typeof value) {
      case 'undefined':
        writeTag(hash, Tag.Nil);
        return;
      case 'boolean':
        writeTag(hash, value ? Tag.True : Tag.False);
        return;
      case 'number': {
        writeTag(hash, Tag.Number);
        const buf = Buffer.allocUnsafe(8);
        // -0 and 0 are the same value; all NaNs share one encoding
        buf.writeDoubleBE(Object.is(value, -0) ? 0 : value, 0);
        hash.update(buf);
        return;
      }
      case 'bigint':
        writeTag(hash, Tag.BigInt);
        writeString(hash, value.toString());
        return;
      case 'string':
        writeTag(hash, Tag.String);
        writeString(hash, value);
        return;
      case 'function':
        throw new HashingError(path, 'functions are not hashable');
      case 'symbol':
        throw new HashingError(path, 'symbols are not hashable');
      case 'object':
        if (value === null) {
          writeTag(hash, Tag.Nil);
          return;
        }
        this.writeObject(hash, value, path);
        return;
    }
  }

  private writeObject(hash: Hash, value: object, path: string): void {
    if (value instanceof Uint8Array) {
      writeTag(hash, Tag.Bytes);
      writeLength(hash, value.length);
      hash.update(value);
      return;
    }

    if (value instanceof Date) {
      const time = value.getTime();
      if (Number.isNaN(time)) {
        throw new HashingError(path, 'invalid date');
      }
      writeTag(hash, Tag.Date);
      const buf = Buffer.allocUnsafe(8);
      buf.writeDoubleBE(time, 0);
      hash.update(buf);
      return;
    }

    if (this.ancestors.has(value)) {
      throw new HashingError(path, 'cyclic reference');
    }

    this.ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        writeTag(hash, Tag.Array);
        writeLength(hash, value.length);
        // Holes hash as nil
        for (let index = 0; index < value.length; index++) {
          const item: unknown = value[index];
          this.write(hash, item, `${path}[${index}]`);
        }
      } else if (value instanceof Map) {
        const entries: Uint8Array[] = [];
        for (const [key, item] of value) {
          entries.push(this.digest([key, item], `${path}<map>`));
        }
        this.writeUnordered(hash, Tag.Map, entries);
      } else if (value instanceof Set) {
        const members: Uint8Array[] = [];
        for (const item of value) {
          members.push(this.digest(item, `${path}<set>`));
        }
        this.writeUnordered(hash, Tag.Set, members);
      } else {
        const keys = Object.keys(value)
          .filter((key) => Reflect.get(value, key) !== undefined)
          .sort();
        writeTag(hash, Tag.Object);
        writeLength(hash, keys.length);
        for (const key of keys) {
          writeString(hash, key);
          this.write(hash, Reflect.get(value, key), describeKey(path, key));
        }
      }
    } finally {
      this.ancestors.delete(value);
    }
  }

  private writeUnordered(hash: Hash, tag: Tag, digests: Uint8Array[]): void {
    digests.sort(compareBytes);
    writeTag(hash, tag);
    writeLength(hash, digests.length);
    for (const digest of digests) {
      hash.update(digest);
    }
  }
}

/**
 * Compute the content hash of a value.
 *
 * @throws HashingError if the value contains functions, symbols,
 * invalid dates or cycles
 */
export function hashOf(value: unknown, options: HashOptions = {}): ContentHash {
  const full = new StructuralHasher().digest(value, '$', options.seed);
  return full.slice(0, CONTENT_HASH_BYTES);
}
