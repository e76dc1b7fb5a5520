import { DomainEvent, domainEvent } from '../../common/events/domain-event';
import { RaffleEvents } from '../../common/events/event-names';
import { formatTicketNumber } from './ticket-number';
import { Ticket, TicketSource } from './ticket.entity';

export interface TicketsIssuedPayload {
  raffleId: string;
  userId: string;
  ticketIds: string[];
  ticketNumbers: string[];
  count: number;
  balance: number;
  source: TicketSource;
  sourceReference: string;
}

export type TicketsIssuedEvent = DomainEvent<typeof RaffleEvents.TICKETS_ISSUED, TicketsIssuedPayload>;

export function ticketsIssuedEvent(
  tickets: readonly Ticket[],
  details: { raffleId: string; userId: string; balance: number; source: TicketSource; sourceReference: string },
  occurredAt: Date,
  causationId?: string,
): TicketsIssuedEvent {
  return domainEvent(
    RaffleEvents.TICKETS_ISSUED,
    {
      ...details,
      ticketIds: tickets.map((t) => t.id),
      ticketNumbers: tickets.map((t) => formatTicketNumber(t.ticketNumber)),
      count: tickets.length,
    },
    occurredAt,
    causationId,
  );
}

export interface TicketIssuanceFailedPayload {
  userId: string;
  raffleId?: string;
  source: TicketSource;
  sourceReference: string;
  requestedCount: number;
  code: string;
  reason: string;
}

export type TicketIssuanceFailedEvent = DomainEvent<
  typeof RaffleEvents.TICKET_ISSUANCE_FAILED,
  TicketIssuanceFailedPayload
>;

export function ticketIssuanceFailedEvent(
  payload: TicketIssuanceFailedPayload,
  occurredAt: Date,
  causationId?: string,
): TicketIssuanceFailedEvent {
  return domainEvent(RaffleEvents.TICKET_ISSUANCE_FAILED, payload, occurredAt, causationId);
}
