import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { TicketLedgerService } from './application/ticket-ledger.service';
import { LEDGER_REPOSITORY } from './domain/ledger.repository';
import { TICKET_REPOSITORY } from './domain/ticket.repository';
import { MongoLedgerRepository } from './infrastructure/repositories/mongo-ledger.repository';
import { MongoTicketRepository } from './infrastructure/repositories/mongo-ticket.repository';
import { LedgerEntryDocument, LedgerEntrySchema } from './infrastructure/schemas/ledger-entry.schema';
import { TicketDocument, TicketSchema } from './infrastructure/schemas/ticket.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: TicketDocument.name, schema: TicketSchema },
      { name: LedgerEntryDocument.name, schema: LedgerEntrySchema },
    ]),
  ],
  providers: [
    TicketLedgerService,
    {
      provide: TICKET_REPOSITORY,
      useClass: MongoTicketRepository,
    },
    {
      provide: LEDGER_REPOSITORY,
      useClass: MongoLedgerRepository,
    },
  ],
  exports: [TicketLedgerService],
})
export class TicketsModule {}
