import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run work on the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const started = deferred();
    const gate = deferred();

    const first = mutex.runExclusive('event-1', async () => {
      log.push('first:start');
      started.resolve();
      await gate.promise;
      log.push('first:end');
    });
    const second = mutex.runExclusive('event-1', async () => {
      log.push('second');
    });

    await started.promise;
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block work on other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('event-1', () => gate.promise);
    const other = await mutex.runExclusive('event-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await held;
  });

  it('should release the lock when work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('event-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('event-1')).toBe(false);
    await expect(mutex.runExclusive('event-1', async () => 42)).resolves.toBe(42);
  });

  it('should reject with the timeout error and never start the work', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    let started = false;

    const held = mutex.runExclusive('event-1', () => gate.promise);
    const waiting = mutex.runExclusive(
      'event-1',
      async () => {
        started = true;
      },
      { timeoutMs: 10, onTimeout: () => new Error('lock timeout') }
    );

    await expect(waiting).rejects.toThrow('lock timeout');
    expect(started).toBe(false);

    gate.resolve();
    await held;
  });

  it('should keep later callers behind the holder after a timeout', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const gate = deferred();

    const held = mutex.runExclusive('event-1', async () => {
      await gate.promise;
      log.push('first:end');
    });
    await expect(
      mutex.runExclusive('event-1', async () => undefined, { timeoutMs: 10 })
    ).rejects.toThrow('Lock not acquired within 10ms');

    expect(mutex.isLocked('event-1')).toBe(true);
    const third = mutex.runExclusive('event-1', async () => {
      log.push('third');
    });

    gate.resolve();
    await Promise.all([held, third]);

    expect(log).toEqual(['first:end', 'third']);
  });

  it('should report a held key as locked', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('event-1', () => gate.promise);
    expect(mutex.isLocked('event-1')).toBe(true);

    gate.resolve();
    await held;
    expect(mutex.isLocked('event-1')).toBe(false);
  });
});
