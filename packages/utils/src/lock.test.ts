import { describe, it, expect } from 'vitest';
import { KeyedLock } from './lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs work on the same key one at a time, in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('out.flac', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('out.flac', async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not hold up work on other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run('a.flac', () => gate.promise);

    await expect(lock.run('b.flac', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('releases the key when the work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a.flac', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(lock.isLocked('a.flac')).toBe(false);
    await expect(lock.run('a.flac', async () => 1)).resolves.toBe(1);
  });
});
