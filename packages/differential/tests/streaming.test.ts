import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  BoundedQueue,
  ConflictingKeyError,
  DiffDatabase,
  DiffError,
  raceAbort,
  type Differential,
} from '../src/index.js';
import { ids, never, storeFactories, type Order } from './helpers.js';

const orders: Order[] = [
  { id: 'a', total: 10 },
  { id: 'b', total: 20 },
  { id: 'c', total: 30 },
];

describe.each(storeFactories)('addStream (%s store)', (_label, createStore) => {
  let db: DiffDatabase;
  let diff: Differential<Order>;

  beforeEach(async () => {
    db = new DiffDatabase({ store: createStore() });
    diff = await db.open<Order>('orders');
  });

  afterEach(async () => {
    await db.close();
  });

  it('stages an iterable until it is exhausted', async () => {
    await diff.add({ id: 'a', total: 10 });

    const result = await diff.addStream(orders);
    expect(result).toEqual({ received: 3, updated: 2 });
    expect(ids(await diff.pendingIds())).toEqual(['a', 'b', 'c']);
  });

  it('stops at a null item', async () => {
    const [a, b, c] = orders;
    const result = await diff.addStream([a, b, null, c]);
    expect(result).toEqual({ received: 2, updated: 2 });
    expect(ids(await diff.pendingIds())).toEqual(['a', 'b']);
  });

  it('consumes a bounded queue fed by a producer', async () => {
    const queue = new BoundedQueue<Order>(1);
    const producer = (async () => {
      for (const order of orders) {
        await queue.push(order);
      }
      queue.close();
    })();

    const result = await diff.addStream(queue);
    await producer;

    expect(result).toEqual({ received: 3, updated: 3 });
    expect(await diff.countChanges()).toBe(3);
  });

  it('rolls back everything when the source fails', async () => {
    async function* failing(): AsyncGenerator<Order> {
      yield { id: 'a', total: 10 };
      yield { id: 'b', total: 20 };
      throw new Error('source broke');
    }

    await expect(diff.addStream(failing())).rejects.toThrow('source broke');
    expect(await diff.countChanges()).toBe(0);
  });

  it('rolls back everything when staging fails', async () => {
    await diff.enableConflictTracking();

    const source = [
      { id: 'a', total: 10 },
      { id: 'b', total: 20 },
      { id: 'a', total: 11 },
    ];
    await expect(diff.addStream(source)).rejects.toBeInstanceOf(ConflictingKeyError);
    expect(await diff.countChanges()).toBe(0);

    // Markers from the failed run were rolled back too
    expect(await diff.add({ id: 'a', total: 11 })).toBe(true);
  });

  it('rolls back everything when cancelled while waiting', async () => {
    const queue = new BoundedQueue<Order>(4);
    await queue.push({ id: 'a', total: 10 });

    const controller = new AbortController();
    const run = diff.addStream(queue, { signal: controller.signal });
    setTimeout(() => controller.abort('shutdown'), 20);

    await expect(run).rejects.toMatchObject({ code: 'CANCELLED', cause: 'shutdown' });
    expect(queue.closed).toBe(true);
    expect(await diff.countChanges()).toBe(0);
  });

  it('refuses to start with an aborted signal', async () => {
    await expect(
      diff.addStream(orders, { signal: AbortSignal.abort('early') })
    ).rejects.toMatchObject({ code: 'CANCELLED', cause: 'early' });
    expect(await diff.countChanges()).toBe(0);
  });
});

describe('raceAbort', () => {
  it('passes through without a signal', async () => {
    await expect(raceAbort(Promise.resolve(5))).resolves.toBe(5);
  });

  it('settles with the promise when it wins', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
    await expect(raceAbort(Promise.reject(new Error('failed')), controller.signal)).rejects.toThrow(
      'failed'
    );
  });

  it('rejects with CANCELLED when the signal aborts first', async () => {
    const controller = new AbortController();
    const raced = raceAbort(never<number>(), controller.signal);
    controller.abort('stop');

    await expect(raced).rejects.toBeInstanceOf(DiffError);
    await expect(raced).rejects.toMatchObject({ code: 'CANCELLED', cause: 'stop' });
  });
});
