export interface LockService {
  /**
   * Run `work` while holding the named lock. Callers using different keys
   * never wait on each other.
   */
  withLock<T>(key: string, work: () => Promise<T>): Promise<T>;
}

export const LOCK_SERVICE = 'LOCK_SERVICE';
