import { describe, expect, it } from 'vitest';
import {
  WriteLock,
  bytesEqual,
  compareBytes,
  fromHex,
  fromUtf8,
  idToBytes,
  toHex,
  utf8,
} from '../src/index.js';

describe('byte helpers', () => {
  it('orders byte strings lexicographically with prefixes first', () => {
    const keys = [utf8('b'), utf8('ab'), utf8('a'), new Uint8Array([0xff]), new Uint8Array([0x00])];
    const sorted = [...keys].sort(compareBytes).map(toHex);
    expect(sorted).toEqual(['00', '61', '6162', '62', 'ff']);
  });

  it('compares contents', () => {
    expect(bytesEqual(utf8('abc'), fromHex('616263'))).toBe(true);
    expect(bytesEqual(utf8('abc'), utf8('abd'))).toBe(false);
    expect(bytesEqual(utf8('abc'), undefined)).toBe(false);
    expect(bytesEqual(undefined, undefined)).toBe(true);
  });

  it('hex-encodes views over a larger buffer', () => {
    const backing = new Uint8Array([1, 2, 3, 4]);
    expect(toHex(backing.subarray(1, 3))).toBe('0203');
  });

  it('normalizes IDs', () => {
    expect(fromUtf8(idToBytes('order-1') ?? new Uint8Array())).toBe('order-1');
    expect(fromUtf8(idToBytes(42) ?? new Uint8Array())).toBe('42');
    expect(fromUtf8(idToBytes(9007199254740993n) ?? new Uint8Array())).toBe('9007199254740993');
    expect(idToBytes(new Uint8Array([7]))).toEqual(new Uint8Array([7]));
  });

  it('rejects IDs that cannot identify an object', () => {
    expect(idToBytes('')).toBeUndefined();
    expect(idToBytes(new Uint8Array())).toBeUndefined();
    expect(idToBytes(Number.NaN)).toBeUndefined();
    expect(idToBytes(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe('WriteLock', () => {
  it('admits writers one at a time in arrival order', async () => {
    const lock = new WriteLock();
    const order: string[] = [];

    const release = await lock.acquire();
    const waiters = ['second', 'third'].map(async (name) => {
      const releaseNext = await lock.acquire();
      order.push(name);
      releaseNext();
    });

    order.push('first');
    release();
    await Promise.all(waiters);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('ignores a second release', async () => {
    const lock = new WriteLock();
    const first = await lock.acquire();
    first();

    const second = await lock.acquire();
    first();

    let thirdAcquired = false;
    const third = lock.acquire().then((release) => {
      thirdAcquired = true;
      release();
    });
    await Promise.resolve();
    expect(thirdAcquired).toBe(false);

    second();
    await third;
    expect(thirdAcquired).toBe(true);
  });
});
