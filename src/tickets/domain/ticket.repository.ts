import { TransactionContext } from '../../database/transaction';
import { Ticket, TicketStatus } from './ticket.entity';

export interface TicketRepository {
  createMany(tickets: readonly Ticket[], tx?: TransactionContext): Promise<Ticket[]>;
  findById(id: string, tx?: TransactionContext): Promise<Ticket | null>;
  findByIds(ids: readonly string[], tx?: TransactionContext): Promise<Ticket[]>;
  findByNumber(ticketNumber: string): Promise<Ticket | null>;
  findByRaffle(raffleId: string, status?: TicketStatus, tx?: TransactionContext): Promise<Ticket[]>;
  findByUserAndRaffle(userId: string, raffleId: string): Promise<Ticket[]>;
  update(ticket: Ticket, tx?: TransactionContext): Promise<Ticket>;
  markWinners(ticketIds: readonly string[], now: Date, tx?: TransactionContext): Promise<number>;
}

export const TICKET_REPOSITORY = 'TicketRepository';
