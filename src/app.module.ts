import { Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CommonModule } from './common/common.module';
import { LockModule } from './common/locks/lock.module';
import { DatabaseModule } from './database/database.module';
import { DrawsModule } from './draws/draws.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { RafflesModule } from './raffles/raffles.module';
import { RedisModule } from './redis/redis.module';
import { TicketsModule } from './tickets/tickets.module';

@Module({
  imports: [
    EventEmitterModule.forRoot({ wildcard: false }),
    ScheduleModule.forRoot(),
    RedisModule,
    DatabaseModule,
    CommonModule,
    LockModule,
    TicketsModule,
    DrawsModule,
    RafflesModule,
    OrchestratorModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
