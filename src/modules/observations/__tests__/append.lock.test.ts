import { describe, it, expect } from 'vitest';
import { StorageError } from '../../../common/errors.js';
import { AppendLock } from '../storage/append.lock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('AppendLock', () => {

  it('should run jobs one at a time in arrival order', async () => {
    const lock = new AppendLock(1000);
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive(async () => {
      events.push('second:start');
      return 2;
    });

    await new Promise(r => setTimeout(r, 10));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should release the lock when a job rejects', async () => {
    const lock = new AppendLock(1000);

    await expect(lock.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should time out a waiter without running its job', async () => {
    const lock = new AppendLock(20);
    const gate = deferred();
    let ran = false;

    const holder = lock.runExclusive(() => gate.promise);
    const waiter = lock.runExclusive(async () => {
      ran = true;
    });

    await expect(waiter).rejects.toBeInstanceOf(StorageError);
    await expect(waiter).rejects.toThrow('lock timeout after 20ms');
    expect(ran).toBe(false);

    gate.resolve();
    await holder;
  });

  it('should hand on a timed-out slot to later waiters', async () => {
    const lock = new AppendLock(20);
    const gate = deferred();

    const holder = lock.runExclusive(() => gate.promise);
    const timedOut = lock.runExclusive(async () => 'never');
    await expect(timedOut).rejects.toThrow('lock timeout');

    gate.resolve();
    await holder;

    await expect(lock.runExclusive(async () => 'after')).resolves.toBe('after');
  });
});
