import { Injectable } from '@nestjs/common';
import { LockService } from './lock.service';

/**
 * Keyed mutex for a single process. Each key keeps a promise chain; a caller
 * waits for the tail of its key's chain and becomes the new tail.
 */
@Injectable()
export class InMemoryLockService implements LockService {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a holder or waiters. */
  get size(): number {
    return this.tails.size;
  }
}
