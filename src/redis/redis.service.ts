import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { ConfigService } from '../database/config.service';

/** Deletes the key only while it still holds the caller's token. */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const url = this.configService.redisUrl;

    if (!url) {
      this.logger.warn(
        'REDIS_URL is not set. Ticket issuance locks are held in-process only; ' +
        'run a single instance of the service.',
      );
      return;
    }

    this.client = new Redis(url, {
      lazyConnect: true,
      retryStrategy: (times) => Math.min(times * 500, 5000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      connectTimeout: 10000,
      reconnectOnError: (err) => {
        const targetErrors = ['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNREFUSED'];
        return targetErrors.some((e) => err.message.includes(e));
      },
    });

    this.client.on('connect', () => this.logger.log('Redis connected'));
    this.client.on('reconnecting', (ms: number) =>
      this.logger.warn(`Redis reconnecting in ${ms}ms`),
    );
    this.client.on('error', (err) => {
      if (err.message?.includes('ECONNRESET')) {
        this.logger.warn('Redis ECONNRESET, reconnecting');
      } else {
        this.logger.error('Redis error:', err);
      }
    });
  }

  onModuleDestroy() {
    this.client?.disconnect();
  }

  /**
   * Try to take a lock key for `ttlMs`. Resolves false when another holder has it.
   */
  async acquireLock(key: string, token: string, ttlMs: number): Promise<boolean> {
    const result = await this.requireClient().set(key, token, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  async releaseLock(key: string, token: string): Promise<boolean> {
    const removed = await this.requireClient().eval(RELEASE_SCRIPT, 1, key, token);
    return removed === 1;
  }

  private requireClient(): Redis {
    if (!this.client) {
      throw new Error('Redis is not configured');
    }
    return this.client;
  }
}
