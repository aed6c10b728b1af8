import { KeyedLock } from './keyed-lock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run work for the same key one at a time in submission order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('requester-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.runExclusive('requester-1', async () => {
      events.push('second:start');
      return 2;
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block work under a different key', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.runExclusive('a', async () => {
      await gate.promise;
      events.push('a');
    });
    await lock.runExclusive('b', async () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['b', 'a']);
  });

  it('should release the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('k', async () => 'after')).resolves.toBe(
      'after',
    );
    expect(lock.size).toBe(0);
  });

  it('should hold a key acquired directly until it is released', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const release = await lock.acquire('day');
    const waiting = lock.runExclusive('day', async () => {
      events.push('waiting');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual([]);

    release();
    await waiting;
    expect(events).toEqual(['waiting']);
    expect(lock.size).toBe(0);
  });
});
