/**
 * Bounded Queue
 *
 * Async-iterable channel between producers and a single consumer such as
 * Differential.addStream. push() waits while the buffer is full.
 */

import { DiffError, queueCapacitySchema } from '@stagekeep/core';

interface BlockedPush<T> {
  item: T;
  resolve: () => void;
  reject: (error: DiffError) => void;
}

function queueClosed(): DiffError {
  return new DiffError({
    code: 'QUEUE_CLOSED',
    message: 'Cannot push to a closed queue',
  });
}

export class BoundedQueue<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private readonly buffer: Array<{ item: T }> = [];
  private readonly blockedPushes: BlockedPush<T>[] = [];
  private readonly waitingPulls: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private isClosed = false;

  constructor(capacity: number) {
    const parsed = queueCapacitySchema.safeParse(capacity);
    if (!parsed.success) {
      throw new DiffError({
        code: 'INVALID_OPTIONS',
        message: `Queue capacity must be an integer between 1 and 1000000, got ${capacity}`,
      });
    }
    this.capacity = parsed.data;
  }

  /** Buffered items not yet consumed */
  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Add an item, waiting while the buffer is full.
   * @throws DiffError QUEUE_CLOSED if the queue is or becomes closed
   */
  async push(item: T): Promise<void> {
    if (this.isClosed) throw queueClosed();

    const pull = this.waitingPulls.shift();
    if (pull) {
      pull({ value: item, done: false });
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ item });
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.blockedPushes.push({ item, resolve, reject });
    });
  }

  /**
   * Stop accepting items. Buffered items are still delivered; producers
   * blocked on a full buffer are rejected with QUEUE_CLOSED.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const blocked of this.blockedPushes.splice(0)) {
      blocked.reject(queueClosed());
    }
    for (const pull of this.waitingPulls.splice(0)) {
      pull({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      const blocked = this.blockedPushes.shift();
      if (blocked) {
        this.buffer.push({ item: blocked.item });
        blocked.resolve();
      }
      return Promise.resolve({ value: head.item, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waitingPulls.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        this.buffer.length = 0;
        return { value: undefined, done: true };
      },
    };
  }
}
