import { InMemoryLockService } from './in-memory-lock.service';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('InMemoryLockService', () => {
  it('should run work for the same key one at a time', async () => {
    const locks = new InMemoryLockService();
    const log: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = locks.withLock('draw:raffle-1', async () => {
      log.push('first:start');
      await firstGate;
      log.push('first:end');
    });
    const second = locks.withLock('draw:raffle-1', async () => {
      log.push('second');
    });

    await tick();
    expect(log).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.size).toBe(0);
  });

  it('should not make different keys wait on each other', async () => {
    const locks = new InMemoryLockService();
    let releaseFirst: () => void = () => undefined;
    const held = locks.withLock(
      'a',
      () =>
        new Promise<void>((resolve) => {
          releaseFirst = resolve;
        }),
    );

    await expect(locks.withLock('b', async () => 'done')).resolves.toBe('done');

    releaseFirst();
    await held;
  });

  it('should release the key when the work fails', async () => {
    const locks = new InMemoryLockService();

    await expect(
      locks.withLock('a', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(locks.withLock('a', async () => 42)).resolves.toBe(42);
    expect(locks.size).toBe(0);
  });
});
