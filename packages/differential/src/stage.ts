/**
 * Stage operation
 *
 * Records the latest version of one object as pending unless its content
 * matches what is already committed or pending.
 */

import type { PayloadCodec } from '@stagekeep/core';
import { ConflictingKeyError, bytesEqual, hashOf } from '@stagekeep/core';
import type { DiffTables } from './tables.js';
import { readConflictState } from './conflict-mode.js';

export interface StageContext<T> {
  namespace: string;
  codec: PayloadCodec<T>;
  keyOf: (item: T) => Uint8Array;
}

/**
 * Stage one object using the tables of an open write transaction.
 * @returns true when a pending entry was created or replaced
 */
export async function stageItem<T>(
  tables: DiffTables,
  ctx: StageContext<T>,
  item: T
): Promise<boolean> {
  const id = ctx.keyOf(item);
  const hash = hashOf(item, { seed: id });

  const mode = await readConflictState(tables.meta);
  if (mode.enabled) {
    const marker = await tables.conflicts.get(id);
    if (marker && !bytesEqual(marker, hash)) {
      throw new ConflictingKeyError(ctx.namespace, id, mode.epoch);
    }
  }

  if (bytesEqual(await tables.committed.get(id), hash)) {
    return false;
  }

  const pending = await tables.pending.get(id);
  if (bytesEqual(pending, hash)) {
    return false;
  }

  // Encode before the first write so a codec failure changes nothing
  const payload = ctx.codec.encode(item);

  if (pending) {
    await tables.payloads.delete(pending);
  }
  await tables.pending.put(id, hash);
  await tables.payloads.put(hash, payload);

  if (mode.enabled) {
    await tables.conflicts.put(id, hash);
  }
  return true;
}
