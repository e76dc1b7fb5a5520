import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RedisService } from '../../redis/redis.service';
import { ConfigService } from '../../database/config.service';
import { PersistenceConflictError } from '../errors';
import { LockService } from './lock.service';

const KEY_PREFIX = 'raffle-engine:lock:';
const RETRY_DELAY_MS = 50;

/**
 * Lock shared by every instance of the service. Acquired with SET NX PX and
 * released only by the token that acquired it.
 */
@Injectable()
export class RedisLockService implements LockService {
  private readonly logger = new Logger(RedisLockService.name);

  constructor(
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const lockKey = `${KEY_PREFIX}${key}`;
    const token = randomUUID();
    const deadline = Date.now() + this.configService.lockWaitMs;

    while (!(await this.redisService.acquireLock(lockKey, token, this.configService.lockTtlMs))) {
      if (Date.now() >= deadline) {
        throw new PersistenceConflictError(`Timed out waiting for lock ${key}`);
      }
      await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
    }

    try {
      return await work();
    } finally {
      const released = await this.redisService.releaseLock(lockKey, token);
      if (!released) {
        this.logger.warn(`Lock ${key} expired before release`);
      }
    }
  }
}
