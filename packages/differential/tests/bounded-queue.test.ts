import { describe, expect, it } from 'vitest';
import { BoundedQueue, DiffError } from '../src/index.js';

async function drain<T>(queue: BoundedQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) {
    items.push(item);
  }
  return items;
}

describe('BoundedQueue', () => {
  it('delivers buffered items after close', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);
    queue.close();

    expect(await drain(queue)).toEqual([1, 2]);
  });

  it('hands items straight to a waiting consumer', async () => {
    const queue = new BoundedQueue<string>(1);
    const iterator = queue[Symbol.asyncIterator]();

    const pending = iterator.next();
    await queue.push('x');

    expect(await pending).toEqual({ value: 'x', done: false });
    expect(queue.size).toBe(0);
  });

  it('makes producers wait while full', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);

    let pushed = false;
    const second = queue.push(2).then(() => {
      pushed = true;
    });
    await Promise.resolve();
    expect(pushed).toBe(false);
    expect(queue.size).toBe(1);

    const iterator = queue[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 1, done: false });
    await second;
    expect(pushed).toBe(true);
    expect(await iterator.next()).toEqual({ value: 2, done: false });
  });

  it('rejects pushes after close', async () => {
    const queue = new BoundedQueue<number>(1);
    queue.close();

    await expect(queue.push(1)).rejects.toBeInstanceOf(DiffError);
    await expect(queue.push(1)).rejects.toMatchObject({ code: 'QUEUE_CLOSED' });
  });

  it('rejects producers blocked when the queue closes', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);
    queue.close();

    await expect(blocked).rejects.toMatchObject({ code: 'QUEUE_CLOSED' });
    expect(await drain(queue)).toEqual([1]);
  });

  it('ends a waiting consumer on close', async () => {
    const queue = new BoundedQueue<number>(2);
    const consumed = drain(queue);
    await queue.push(7);
    queue.close();

    expect(await consumed).toEqual([7]);
  });

  it('closes and empties when the consumer stops', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);

    for await (const item of queue) {
      expect(item).toBe(1);
      break;
    }

    expect(queue.closed).toBe(true);
    expect(queue.size).toBe(0);
  });

  it('validates capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(
      'Queue capacity must be an integer between 1 and 1000000, got 0'
    );
    expect(() => new BoundedQueue<number>(1.5)).toThrow(DiffError);
  });
});
