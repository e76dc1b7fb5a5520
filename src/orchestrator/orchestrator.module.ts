import { Module } from '@nestjs/common';
import { DrawsModule } from '../draws/draws.module';
import { RafflesModule } from '../raffles/raffles.module';
import { TicketsModule } from '../tickets/tickets.module';
import { RaffleOrchestratorService } from './application/raffle-orchestrator.service';
import { RaffleOperationsController } from './presentation/raffle-operations.controller';

@Module({
  imports: [RafflesModule, TicketsModule, DrawsModule],
  controllers: [RaffleOperationsController],
  providers: [RaffleOrchestratorService],
  exports: [RaffleOrchestratorService],
})
export class OrchestratorModule {}
