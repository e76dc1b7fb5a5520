import { Global, Module } from '@nestjs/common';
import { ConfigService } from '../../database/config.service';
import { RedisService } from '../../redis/redis.service';
import { InMemoryLockService } from './in-memory-lock.service';
import { LOCK_SERVICE, LockService } from './lock.service';
import { RedisLockService } from './redis-lock.service';

@Global()
@Module({
  providers: [
    {
      provide: LOCK_SERVICE,
      useFactory: (configService: ConfigService, redisService: RedisService): LockService =>
        configService.redisUrl
          ? new RedisLockService(redisService, configService)
          : new InMemoryLockService(),
      inject: [ConfigService, RedisService],
    },
  ],
  exports: [LOCK_SERVICE],
})
export class LockModule {}
