import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../src/lock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run tasks for one key in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run('a', async () => {
      order.push('second');
    });

    expect(lock.is_busy('a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should not hold other keys back', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run('a', () => gate.promise);

    await expect(lock.run('b', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('should keep going after a failed task', async () => {
    const lock = new KeyedLock();
    const failed = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'recovered');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  it('should release the key once idle', async () => {
    const lock = new KeyedLock();
    await lock.run('a', async () => 1);
    await Promise.resolve();
    expect(lock.is_busy('a')).toBe(false);
  });
});
