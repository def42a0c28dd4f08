/**
 * Object ID resolution
 */

import type { KeyFn, ObjectId } from '@stagekeep/core';
import { DiffError, idToBytes, keyFieldSchema } from '@stagekeep/core';

function readKeyField(item: unknown, field: string): ObjectId | undefined {
  if (typeof item !== 'object' || item === null) return undefined;
  const value: unknown = Reflect.get(item, field);
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  return undefined;
}

/**
 * Convert an ID to its key bytes.
 * @throws DiffError INVALID_OBJECT_ID for empty or unusable IDs
 */
export function requireId(id: ObjectId | undefined, namespace: string): Uint8Array {
  const bytes = id === undefined ? undefined : idToBytes(id);
  if (!bytes) {
    throw new DiffError({
      code: 'INVALID_OBJECT_ID',
      message: 'Object ID must be a non-empty string, finite number, bigint or byte array',
      namespace,
      suggestion: 'Set keyField or keyOf so that every staged object has a usable ID.',
    });
  }
  return bytes;
}

/**
 * Build the function that maps a staged object to its key bytes.
 */
export function createKeyResolver<T>(
  namespace: string,
  options: { keyField?: string; keyOf?: KeyFn<T> }
): (item: T) => Uint8Array {
  const { keyOf } = options;
  if (keyOf) {
    return (item) => requireId(keyOf(item), namespace);
  }

  const parsed = keyFieldSchema.safeParse(options.keyField ?? 'id');
  if (!parsed.success) {
    throw new DiffError({
      code: 'INVALID_OPTIONS',
      message: 'keyField must be a non-empty string',
      namespace,
    });
  }
  const field = parsed.data;
  return (item) => requireId(readKeyField(item, field), namespace);
}
