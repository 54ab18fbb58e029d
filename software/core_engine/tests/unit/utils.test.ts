import { describe, it, expect } from '@jest/globals';
import { settlesWithin } from '../../src/context';
import { Mutex } from '../../src/utils/Mutex';
import { RingBuffer } from '../../src/utils/RingBuffer';

describe('RingBuffer', () => {
  it('evicts the oldest entry when full', () => {
    const ring = new RingBuffer<number>(3);
    expect(ring.push(1)).toBeUndefined();
    ring.push(2);
    ring.push(3);
    expect(ring.push(4)).toBe(1);
    expect(ring.toArray()).toEqual([2, 3, 4]);
    expect(ring.size).toBe(3);
  });

  it('returns the newest entries oldest-first from tail()', () => {
    const ring = new RingBuffer<string>(4);
    ['a', 'b', 'c', 'd', 'e'].forEach((x) => ring.push(x));
    expect(ring.tail(2)).toEqual(['d', 'e']);
    expect(ring.tail(10)).toEqual(['b', 'c', 'd', 'e']);
    expect(ring.tail(0)).toEqual([]);
  });

  it('drain() empties the buffer', () => {
    const ring = new RingBuffer<number>(2);
    ring.push(7);
    expect(ring.drain()).toEqual([7]);
    expect(ring.size).toBe(0);
    expect(ring.toArray()).toEqual([]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrow(RangeError);
  });
});

describe('Mutex', () => {
  it('runs critical sections in call order', async () => {
    const mutex = new Mutex();
    const log: string[] = [];

    const slow = mutex.lock(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      log.push('slow');
    });
    const fast = mutex.lock(() => {
      log.push('fast');
    });

    expect(mutex.isLocked).toBe(true);
    await Promise.all([slow, fast]);
    expect(log).toEqual(['slow', 'fast']);
    expect(mutex.isLocked).toBe(false);
  });

  it('keeps working after a section rejects', async () => {
    const mutex = new Mutex();
    await expect(mutex.lock(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(mutex.lock(async () => 42)).resolves.toBe(42);
  });
});

describe('settlesWithin', () => {
  it('reports whether the promise settled before the deadline', async () => {
    await expect(settlesWithin(Promise.resolve(), 50)).resolves.toBe(true);
    await expect(settlesWithin(Promise.reject(new Error('x')), 50)).resolves.toBe(true);
    await expect(settlesWithin(new Promise(() => undefined), 10)).resolves.toBe(false);
  });
});
