import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../runtime/keyed-mutex';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks with the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('a', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const slow = mutex.runExclusive('a', async () => {
      await gate.promise;
      order.push('a');
    });
    await mutex.runExclusive('b', async () => {
      order.push('b');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the chain going after a failure and forgets idle keys', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('a', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });
});
