/**
 * A sorted byte-keyed table. Keys are held as lowercase hex, whose string
 * order matches the byte order of the keys.
 */

import { toHex } from '@stagekeep/core';

export class MemoryTable {
  private readonly entries: Map<string, Uint8Array>;
  private sorted?: string[];

  constructor(entries?: Map<string, Uint8Array>) {
    this.entries = entries ?? new Map();
  }

  get size(): number {
    return this.entries.size;
  }

  clone(): MemoryTable {
    return new MemoryTable(new Map(this.entries));
  }

  get(key: Uint8Array): Uint8Array | undefined {
    return this.entries.get(toHex(key));
  }

  getHex(hexKey: string): Uint8Array | undefined {
    return this.entries.get(hexKey);
  }

  put(key: Uint8Array, value: Uint8Array): void {
    const hexKey = toHex(key);
    if (!this.entries.has(hexKey)) {
      this.sorted = undefined;
    }
    this.entries.set(hexKey, value);
  }

  delete(key: Uint8Array): boolean {
    const deleted = this.entries.delete(toHex(key));
    if (deleted) {
      this.sorted = undefined;
    }
    return deleted;
  }

  /** Smallest key greater than `hexKey`; with no `hexKey`, the smallest key */
  keyAfter(hexKey: string | undefined): string | undefined {
    const keys = this.sortedKeys();
    if (hexKey === undefined) return keys[0];

    let lo = 0;
    let hi = keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const candidate = keys[mid] ?? '';
      if (candidate <= hexKey) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return keys[lo];
  }

  private sortedKeys(): string[] {
    if (!this.sorted) {
      this.sorted = Array.from(this.entries.keys()).sort();
    }
    return this.sorted;
  }
}
