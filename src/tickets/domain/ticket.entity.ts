import { randomUUID } from 'crypto';
import { LimitExceededError, ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';

export enum TicketStatus {
  ACTIVE = 'active',
  USED = 'used',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

export enum TicketSource {
  REDEMPTION = 'redemption',
  DIRECT_PURCHASE = 'direct_purchase',
  PROMOTIONAL = 'promotional',
  AD_BONUS = 'ad_bonus',
}

export const MAX_TRANSFERS = 3;

export interface TicketTransfer {
  readonly fromUserId: string;
  readonly toUserId: string;
  readonly transferredAt: Date;
  readonly reason?: string;
}

export interface Ticket {
  readonly id: string;
  readonly userId: string;
  readonly raffleId: string;
  readonly ticketNumber: string;
  readonly status: TicketStatus;
  readonly source: TicketSource;
  readonly sourceReference: string;
  readonly isWinner: boolean;
  readonly transferCount: number;
  readonly transfers: readonly TicketTransfer[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export function createTicket(input: {
  userId: string;
  raffleId: string;
  ticketNumber: string;
  source: TicketSource;
  sourceReference: string;
  now: Date;
  id?: string;
}): Ticket {
  return {
    id: input.id ?? randomUUID(),
    userId: input.userId,
    raffleId: input.raffleId,
    ticketNumber: input.ticketNumber,
    status: TicketStatus.ACTIVE,
    source: input.source,
    sourceReference: input.sourceReference,
    isWinner: false,
    transferCount: 0,
    transfers: [],
    createdAt: input.now,
    updatedAt: input.now,
  };
}

export function canBeTransferred(ticket: Ticket): boolean {
  return ticket.status === TicketStatus.ACTIVE && !ticket.isWinner && ticket.transferCount < MAX_TRANSFERS;
}

export function transferTo(
  ticket: Ticket,
  toUserId: string,
  now: Date,
  reason?: string,
): Result<Ticket, ValidationError | LimitExceededError> {
  if (ticket.status !== TicketStatus.ACTIVE || ticket.isWinner) {
    return err(new ValidationError(`Ticket ${ticket.ticketNumber} cannot be transferred in status ${ticket.status}`));
  }
  if (toUserId === ticket.userId) {
    return err(new ValidationError('Cannot transfer a ticket to its current owner'));
  }
  if (ticket.transferCount >= MAX_TRANSFERS) {
    return err(new LimitExceededError(`Ticket ${ticket.ticketNumber} reached the limit of ${MAX_TRANSFERS} transfers`));
  }

  return ok({
    ...ticket,
    userId: toUserId,
    transferCount: ticket.transferCount + 1,
    transfers: [...ticket.transfers, { fromUserId: ticket.userId, toUserId, transferredAt: now, reason }],
    updatedAt: now,
  });
}

export type RevokedStatus = TicketStatus.CANCELLED | TicketStatus.EXPIRED;

export function revoke(ticket: Ticket, status: RevokedStatus, now: Date): Result<Ticket, ValidationError> {
  if (ticket.status !== TicketStatus.ACTIVE) {
    return err(new ValidationError(`Only active tickets can be revoked; ${ticket.ticketNumber} is ${ticket.status}`));
  }
  return ok({ ...ticket, status, updatedAt: now });
}
