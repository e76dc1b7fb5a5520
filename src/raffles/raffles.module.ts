import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { DrawsModule } from '../draws/draws.module';
import { TicketsModule } from '../tickets/tickets.module';
import { RafflesService } from './application/raffles.service';
import { RAFFLE_REPOSITORY } from './domain/raffle.repository';
import { MongoRaffleRepository } from './infrastructure/repositories/mongo-raffle.repository';
import { RaffleDocument, RaffleSchema } from './infrastructure/schemas/raffle.schema';
import { RafflesController } from './presentation/raffles.controller';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: RaffleDocument.name, schema: RaffleSchema },
    ]),
    TicketsModule,
    DrawsModule,
  ],
  controllers: [RafflesController],
  providers: [
    RafflesService,
    {
      provide: RAFFLE_REPOSITORY,
      useClass: MongoRaffleRepository,
    },
  ],
  exports: [RafflesService, RAFFLE_REPOSITORY],
})
export class RafflesModule {}
