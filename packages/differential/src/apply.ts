/**
 * Apply driver
 *
 * Walks pending entries in key order, hands each to the caller's callback
 * and promotes the ones that succeed. Runs inside the caller's write
 * transaction; committing is left to the caller.
 */

import type { ApplyCancellation, ApplyFailure, Logger, PayloadCodec } from '@stagekeep/core';
import { InconsistentStateError } from '@stagekeep/core';
import type { DiffTables } from './tables.js';
import type { ApplyFn, PendingChange } from './types.js';

export interface ApplyContext<T> {
  namespace: string;
  codec: PayloadCodec<T>;
  logger: Logger;
}

export interface ApplyRunOptions {
  /** Maximum number of promotions; unbounded when <= 0 */
  limit: number;
  signal?: AbortSignal;
}

export interface ApplyOutcome {
  applied: number;
  failures: ApplyFailure[];
  cancelled?: ApplyCancellation;
}

function createPendingChange<T>(
  id: Uint8Array,
  hash: Uint8Array,
  bytes: Uint8Array,
  codec: PayloadCodec<T>
): PendingChange<T> {
  let decoded: { value: T } | undefined;
  return {
    id,
    hash,
    bytes,
    decode() {
      if (!decoded) {
        decoded = { value: codec.decode(bytes) };
      }
      return decoded.value;
    },
  };
}

export async function applyPending<T>(
  tables: DiffTables,
  ctx: ApplyContext<T>,
  fn: ApplyFn<T>,
  options: ApplyRunOptions
): Promise<ApplyOutcome> {
  const { limit, signal } = options;
  const failures: ApplyFailure[] = [];
  let applied = 0;
  let cancelled: ApplyCancellation | undefined;

  const cursor = tables.pending.cursor();
  for (let entry = await cursor.first(); entry; entry = await cursor.next()) {
    if (limit > 0 && applied >= limit) break;

    if (signal?.aborted) {
      cancelled = { reason: signal.reason };
      break;
    }

    const { key: id, value: hash } = entry;
    const payload = await tables.payloads.get(hash);
    if (!payload) {
      throw new InconsistentStateError(ctx.namespace, id, hash);
    }

    // Copies, so the callback cannot alter the keys promoted below
    const callerId = id.slice();
    try {
      await fn(callerId, createPendingChange(id.slice(), hash.slice(), payload, ctx.codec));
    } catch (error) {
      ctx.logger.warn('apply callback failed', { id, error });
      failures.push({ id, error });
      continue;
    }

    await tables.committed.put(id, hash);
    await tables.pending.delete(id);
    await tables.payloads.delete(hash);
    applied++;
  }

  return { applied, failures, ...(cancelled ? { cancelled } : {}) };
}
