/**
 * Byte-string helpers shared by the stores and the engine.
 */

import type { ObjectId } from '../types/index.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Compare two byte strings in lexicographic order (shorter prefix first).
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const minLen = Math.min(a.length, b.length);

  for (let i = 0; i < minLen; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }

  return a.length - b.length;
}

export function bytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }

  return true;
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

export function fromHex(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

export function utf8(value: string): Uint8Array {
  return textEncoder.encode(value);
}

export function fromUtf8(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * Normalize a caller-supplied ID to its byte form.
 * Strings are UTF-8 encoded; numbers and bigints use their decimal text.
 * Returns undefined for values that cannot identify an object.
 */
export function idToBytes(id: ObjectId): Uint8Array | undefined {
  let bytes: Uint8Array;

  if (typeof id === 'string') {
    bytes = utf8(id);
  } else if (typeof id === 'number') {
    if (!Number.isFinite(id)) return undefined;
    bytes = utf8(String(id));
  } else if (typeof id === 'bigint') {
    bytes = utf8(id.toString());
  } else {
    bytes = new Uint8Array(id);
  }

  return bytes.length > 0 ? bytes : undefined;
}
