import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { StoreTransaction, TransactionalStore } from '../src/index.js';
import { DiffError, fromUtf8, update, utf8, view } from '../src/index.js';

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(DiffError);
  await expect(promise).rejects.toMatchObject({ code });
}

async function bucketOf(tx: StoreTransaction, ns: string, name: string) {
  const bucket = await tx.bucket(ns, name);
  if (!bucket) throw new Error(`bucket ${ns}/${name} missing`);
  return bucket;
}

/**
 * Behaviour every TransactionalStore implementation must share.
 */
export function describeStoreContract(
  label: string,
  createStore: () => TransactionalStore | Promise<TransactionalStore>
): void {
  describe(`${label} store contract`, () => {
    let store: TransactionalStore;

    beforeEach(async () => {
      store = await createStore();
      await update(store, async (tx) => {
        await tx.createNamespaceIfNotExists('ns');
        await tx.createBucketIfNotExists('ns', 'items');
      });
    });

    afterEach(async () => {
      await store.close();
    });

    it('stores and reads values', async () => {
      await update(store, async (tx) => {
        const items = await bucketOf(tx, 'ns', 'items');
        await items.put(utf8('a'), utf8('one'));
        await items.put(utf8('a'), utf8('uno'));
        await items.put(utf8('b'), new Uint8Array());
      });

      await view(store, async (tx) => {
        const items = await bucketOf(tx, 'ns', 'items');
        expect(fromUtf8((await items.get(utf8('a'))) ?? new Uint8Array())).toBe('uno');
        expect(await items.get(utf8('b'))).toEqual(new Uint8Array());
        expect(await items.get(utf8('c'))).toBeUndefined();
        expect(await items.count()).toBe(2);
      });
    });

    it('discards writes on rollback', async () => {
      const tx = await store.begin(true);
      const items = await bucketOf(tx, 'ns', 'items');
      await items.put(utf8('a'), utf8('one'));
      await tx.rollback();

      const count = await view(store, async (r) => (await bucketOf(r, 'ns', 'items')).count());
      expect(count).toBe(0);
    });

    it('iterates keys in byte order', async () => {
      await update(store, async (tx) => {
        const items = await bucketOf(tx, 'ns', 'items');
        for (const key of ['b', 'ab', 'a', 'c']) {
          await items.put(utf8(key), utf8(key.toUpperCase()));
        }
      });

      const seen = await view(store, async (tx) => {
        const cursor = (await bucketOf(tx, 'ns', 'items')).cursor();
        const keys: string[] = [];
        for (let entry = await cursor.first(); entry; entry = await cursor.next()) {
          keys.push(`${fromUtf8(entry.key)}=${fromUtf8(entry.value)}`);
        }
        return keys;
      });

      expect(seen).toEqual(['a=A', 'ab=AB', 'b=B', 'c=C']);
    });

    it('allows deleting the current entry while iterating', async () => {
      const visited = await update(store, async (tx) => {
        const items = await bucketOf(tx, 'ns', 'items');
        for (const key of ['1', '2', '3']) {
          await items.put(utf8(key), utf8(key));
        }

        const keys: string[] = [];
        const cursor = items.cursor();
        for (let entry = await cursor.first(); entry; entry = await cursor.next()) {
          keys.push(fromUtf8(entry.key));
          await items.delete(entry.key);
        }
        return keys;
      });

      expect(visited).toEqual(['1', '2', '3']);
      const count = await view(store, async (tx) => (await bucketOf(tx, 'ns', 'items')).count());
      expect(count).toBe(0);
    });

    it('reports delete results', async () => {
      await update(store, async (tx) => {
        const items = await bucketOf(tx, 'ns', 'items');
        await items.put(utf8('a'), utf8('1'));
        expect(await items.delete(utf8('a'))).toBe(true);
        expect(await items.delete(utf8('a'))).toBe(false);
      });
    });

    it('manages namespaces and buckets', async () => {
      await update(store, async (tx) => {
        await tx.createNamespaceIfNotExists('other');
        await tx.createBucketIfNotExists('other', 'x');
        await tx.createBucketIfNotExists('other', 'x');
      });

      expect(await view(store, (tx) => tx.listNamespaces())).toEqual(['ns', 'other']);

      await update(store, async (tx) => {
        expect(await tx.deleteBucket('other', 'x')).toBe(true);
        expect(await tx.bucket('other', 'x')).toBeUndefined();
        expect(await tx.deleteNamespace('other')).toBe(true);
        expect(await tx.deleteNamespace('other')).toBe(false);
      });

      expect(await view(store, (tx) => tx.hasNamespace('other'))).toBe(false);
    });

    it('removes bucket contents with the namespace', async () => {
      await update(store, async (tx) => {
        await (await bucketOf(tx, 'ns', 'items')).put(utf8('a'), utf8('1'));
        await tx.deleteNamespace('ns');
        await tx.createNamespaceIfNotExists('ns');
        const items = await tx.createBucketIfNotExists('ns', 'items');
        expect(await items.count()).toBe(0);
      });
    });

    it('refuses buckets in a missing namespace', async () => {
      const tx = await store.begin(true);
      try {
        await expectCode(tx.createBucketIfNotExists('missing', 'x'), 'NAMESPACE_NOT_FOUND');
      } finally {
        await tx.rollback();
      }
    });

    it('refuses writes in a read transaction', async () => {
      const tx = await store.begin(false);
      try {
        const items = await bucketOf(tx, 'ns', 'items');
        await expectCode(items.put(utf8('a'), utf8('1')), 'READ_ONLY_TRANSACTION');
        await expectCode(tx.createNamespaceIfNotExists('x'), 'READ_ONLY_TRANSACTION');
        await expectCode(tx.commit(), 'READ_ONLY_TRANSACTION');
      } finally {
        await tx.rollback();
      }
    });

    it('refuses use after commit and ignores a late rollback', async () => {
      const tx = await store.begin(true);
      const items = await bucketOf(tx, 'ns', 'items');
      await tx.commit();

      expect(tx.closed).toBe(true);
      await expectCode(items.get(utf8('a')), 'TRANSACTION_CLOSED');
      await expectCode(tx.commit(), 'TRANSACTION_CLOSED');
      await expect(tx.rollback()).resolves.toBeUndefined();
    });

    it('runs commit hooks only after a commit', async () => {
      const calls: string[] = [];

      const committed = await store.begin(true);
      committed.onCommit(() => calls.push('committed'));
      await committed.commit();

      const rolledBack = await store.begin(true);
      rolledBack.onCommit(() => calls.push('rolled back'));
      await rolledBack.rollback();

      expect(calls).toEqual(['committed']);
    });

    it('admits one writer at a time', async () => {
      const order: string[] = [];
      const first = await store.begin(true);

      const second = store.begin(true).then(async (tx) => {
        order.push('second begins');
        await tx.rollback();
      });

      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('first commits');
      await first.commit();
      await second;

      expect(order).toEqual(['first commits', 'second begins']);
    });

    it('refuses new transactions after close', async () => {
      await store.close();
      await expectCode(store.begin(false), 'STORE_CLOSED');
      await expectCode(store.begin(true), 'STORE_CLOSED');
    });
  });
}
