import { Module, Global } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule } from './config.module';
import { ConfigService } from './config.service';
import { MongoTransactionRunner } from './mongo-transaction.runner';
import { TRANSACTION_RUNNER } from './transaction';

@Global()
@Module({
  imports: [
    ConfigModule,
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: async (configService: ConfigService) => ({
        uri: configService.mongoUri,
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [
    {
      provide: TRANSACTION_RUNNER,
      useClass: MongoTransactionRunner,
    },
  ],
  exports: [MongooseModule, TRANSACTION_RUNNER],
})
export class DatabaseModule {}
