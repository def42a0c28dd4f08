/**
 * DiffDatabase
 *
 * Handle on a transactional store holding any number of differential
 * namespaces.
 */

import { z } from 'zod';
import type { Logger, StoreTransaction, TransactionalStore } from '@stagekeep/core';
import {
  DiffError,
  createMsgpackCodec,
  formatZodError,
  keyFieldSchema,
  namespaceNameSchema,
  silentLogger,
  update,
  view,
} from '@stagekeep/core';
import { Differential } from './differential.js';
import { createKeyResolver } from './keys.js';
import { createTables } from './tables.js';
import type { DifferentialOptions } from './types.js';

export interface DiffDatabaseOptions {
  store: TransactionalStore;
  logger?: Logger;
}

const openOptionsSchema = z.object({
  keyField: keyFieldSchema.optional(),
  keyOf: z.function().optional(),
  codec: z
    .object({
      encode: z.function(),
      decode: z.function(),
    })
    .passthrough()
    .optional(),
});

function validateName(name: string): string {
  const parsed = namespaceNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new DiffError({
      code: 'INVALID_OPTIONS',
      message: formatZodError('Differential name', parsed.error),
      suggestion: 'Use a non-empty name of at most 255 characters.',
    });
  }
  return parsed.data;
}

export class DiffDatabase {
  private readonly store: TransactionalStore;
  private readonly logger: Logger;

  constructor(options: DiffDatabaseOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Open a differential, creating its namespace on first use.
   */
  async open<T>(name: string, options: DifferentialOptions<T> = {}): Promise<Differential<T>> {
    const namespace = validateName(name);

    const parsed = openOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new DiffError({
        code: 'INVALID_OPTIONS',
        message: formatZodError(`Options for '${namespace}'`, parsed.error),
        namespace,
      });
    }

    const keyOf = createKeyResolver(namespace, options);
    const logger = options.logger ?? this.logger;

    const created = await update(this.store, async (tx) => {
      const existed = await tx.hasNamespace(namespace);
      await createTables(tx, namespace);
      return !existed;
    });
    logger.debug(created ? 'differential created' : 'differential opened', { namespace });

    return new Differential<T>({
      name: namespace,
      store: this.store,
      codec: options.codec ?? createMsgpackCodec<T>(),
      keyOf,
      logger,
    });
  }

  /**
   * Remove a differential and everything staged or committed in it.
   * @returns Whether it existed
   */
  async delete(name: string): Promise<boolean> {
    const namespace = validateName(name);
    const existed = await update(this.store, (tx) => tx.deleteNamespace(namespace));
    if (existed) {
      this.logger.info('differential deleted', { namespace });
    }
    return existed;
  }

  /** Names of all differentials in the store */
  async list(): Promise<string[]> {
    return view(this.store, (tx) => tx.listNamespaces());
  }

  /** Run `fn` in a read transaction */
  async view<R>(fn: (tx: StoreTransaction) => Promise<R>): Promise<R> {
    return view(this.store, fn);
  }

  /** Run `fn` in a write transaction that commits when it resolves */
  async update<R>(fn: (tx: StoreTransaction) => Promise<R>): Promise<R> {
    return update(this.store, fn);
  }

  /**
   * Begin a transaction managed by the caller, who must commit or roll it back.
   */
  async begin(writable: boolean): Promise<StoreTransaction> {
    return this.store.begin(writable);
  }

  async close(): Promise<void> {
    await this.store.close();
    this.logger.debug('database closed');
  }
}
