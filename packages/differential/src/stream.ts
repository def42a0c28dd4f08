/**
 * Streaming stage: stage every object a source yields, in one transaction.
 */

import type { Logger } from '@stagekeep/core';
import { DiffError } from '@stagekeep/core';
import type { DiffTables } from './tables.js';
import { stageItem, type StageContext } from './stage.js';
import type { StageSource, StreamStageResult } from './types.js';

export function cancelledError(reason: unknown, namespace?: string): DiffError {
  return new DiffError({
    code: 'CANCELLED',
    message: 'Operation was cancelled',
    namespace,
    cause: reason,
  });
}

/**
 * Settle with `promise`, or reject with a CANCELLED error as soon as
 * `signal` aborts, whichever comes first.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelledError(signal.reason));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    // Still observed after an abort, so a late rejection is never unhandled
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function isAsyncIterable<T>(source: StageSource<T>): source is AsyncIterable<T | null | undefined> {
  return typeof Reflect.get(source, Symbol.asyncIterator) === 'function';
}

function toAsyncIterator<T>(source: StageSource<T>): AsyncIterator<T | null | undefined> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const iterator = source[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
    return: async () => {
      iterator.return?.();
      return { done: true, value: undefined };
    },
  };
}

export interface StreamContext<T> extends StageContext<T> {
  logger: Logger;
}

/**
 * Stage items until the source ends, yields null/undefined, or the signal
 * aborts. Cancellation and errors propagate; the caller owns the transaction.
 */
export async function stageStream<T>(
  tables: DiffTables,
  ctx: StreamContext<T>,
  source: StageSource<T>,
  signal?: AbortSignal
): Promise<StreamStageResult> {
  const iterator = toAsyncIterator(source);
  let received = 0;
  let updated = 0;
  let exhausted = false;

  try {
    for (;;) {
      if (signal?.aborted) {
        throw cancelledError(signal.reason, ctx.namespace);
      }

      const next = await raceAbort(iterator.next(), signal);
      if (next.done) {
        exhausted = true;
        break;
      }
      if (next.value === null || next.value === undefined) {
        break;
      }

      received++;
      if (await stageItem(tables, ctx, next.value)) {
        updated++;
      }
    }
  } finally {
    if (!exhausted && iterator.return) {
      // Release the source without waiting on it; a pending next() would block return()
      iterator.return().catch((error: unknown) => {
        ctx.logger.warn('closing stream source failed', { error });
      });
    }
  }

  return { received, updated };
}
