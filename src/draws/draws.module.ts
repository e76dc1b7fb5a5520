import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { DrawEngineService } from './application/draw-engine.service';
import { WINNER_REPOSITORY } from './domain/winner.repository';
import { MongoWinnerRepository } from './infrastructure/repositories/mongo-winner.repository';
import { WinnerDocument, WinnerSchema } from './infrastructure/schemas/winner.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: WinnerDocument.name, schema: WinnerSchema },
    ]),
  ],
  providers: [
    DrawEngineService,
    {
      provide: WINNER_REPOSITORY,
      useClass: MongoWinnerRepository,
    },
  ],
  exports: [DrawEngineService],
})
export class DrawsModule {}
