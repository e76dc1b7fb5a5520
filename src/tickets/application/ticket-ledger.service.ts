import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { CLOCK, Clock } from '../../common/clock';
import {
  LimitExceededError,
  NotFoundError,
  RaffleNotAcceptingEntriesError,
  ValidationError,
} from '../../common/errors';
import { Result, err, ok } from '../../common/result';
import { TransactionContext } from '../../database/transaction';
import { isWithinRegistrationWindow } from '../../raffles/domain/raffle-schedule';
import { Raffle, RaffleStatus } from '../../raffles/domain/raffle.entity';
import {
  LedgerAdjustmentSource,
  LedgerEntry,
  LedgerEntryKind,
  LedgerSource,
  LedgerSummary,
} from '../domain/ledger-entry.entity';
import { LEDGER_REPOSITORY, LedgerRepository } from '../domain/ledger.repository';
import { TicketsIssuedEvent, ticketsIssuedEvent } from '../domain/ticket-events';
import { formatTicketNumber, generateTicketNumber, parseTicketNumber } from '../domain/ticket-number';
import {
  RevokedStatus,
  Ticket,
  TicketSource,
  TicketStatus,
  createTicket,
  revoke,
  transferTo,
} from '../domain/ticket.entity';
import { TICKET_REPOSITORY, TicketRepository } from '../domain/ticket.repository';

export interface IssueTicketsCommand {
  raffle: Raffle;
  userId: string;
  count: number;
  source: TicketSource;
  sourceReference: string;
  causationId?: string;
}

export interface IssuedTickets {
  raffleId: string;
  userId: string;
  tickets: Ticket[];
  /** User balance right after this issuance. */
  balance: number;
  ledgerEntryId: string;
  duplicate: boolean;
  /** Present only on a fresh issuance; published once the transaction commits. */
  event?: TicketsIssuedEvent;
}

export interface TransferTicketCommand {
  ticket: Ticket;
  raffle: Raffle;
  toUserId: string;
  reason?: string;
  causationId?: string;
}

export interface TicketTransferred {
  ticket: Ticket;
  fromUserId: string;
  fromBalance: number;
  toBalance: number;
  senderLeft: boolean;
  recipientJoined: boolean;
}

export interface RevokeTicketCommand {
  ticket: Ticket;
  status: RevokedStatus;
  reason?: string;
  causationId?: string;
}

export interface TicketRevoked {
  ticket: Ticket;
  balance: number;
  participantLeft: boolean;
}

export type IssueTicketsError = ValidationError | RaffleNotAcceptingEntriesError | LimitExceededError;
export type TransferTicketError = ValidationError | RaffleNotAcceptingEntriesError | LimitExceededError;

/**
 * Append-only accounting of raffle tickets. Every method takes an optional
 * transaction context so callers can combine ledger writes with raffle
 * statistics in one commit.
 */
@Injectable()
export class TicketLedgerService {
  private readonly logger = new Logger(TicketLedgerService.name);

  constructor(
    @Inject(TICKET_REPOSITORY)
    private readonly ticketRepository: TicketRepository,
    @Inject(LEDGER_REPOSITORY)
    private readonly ledgerRepository: LedgerRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  async issueTickets(
    command: IssueTicketsCommand,
    tx?: TransactionContext,
  ): Promise<Result<IssuedTickets, IssueTicketsError>> {
    const { raffle, userId, count, source, sourceReference, causationId } = command;

    const issues: string[] = [];
    if (!Number.isInteger(count) || count < 1) issues.push('Ticket count must be a positive integer');
    if (!userId) issues.push('userId is required');
    if (!sourceReference) issues.push('sourceReference is required');
    if (!Object.values(TicketSource).includes(source)) issues.push(`Unknown ticket source ${source}`);
    if (issues.length > 0) {
      return err(ValidationError.fromIssues(issues));
    }

    const previous = await this.findIssuance(source, sourceReference, tx);
    if (previous) {
      this.logger.log(`Duplicate issuance ${source}:${sourceReference} ignored`);
      return ok(previous);
    }

    const now = this.clock.now();
    if (raffle.status !== RaffleStatus.ACTIVE || !isWithinRegistrationWindow(raffle.schedule, now)) {
      return err(new RaffleNotAcceptingEntriesError(`Raffle ${raffle.id} is not accepting entries`));
    }

    const currentBalance = await this.ledgerRepository.sumDeltas(userId, raffle.id, tx);
    const { maxTicketsPerUser } = raffle.participationRules;
    if (maxTicketsPerUser !== undefined && currentBalance + count > maxTicketsPerUser) {
      return err(
        new LimitExceededError(
          `User ${userId} would hold ${currentBalance + count} tickets; the limit is ${maxTicketsPerUser}`,
        ),
      );
    }

    const firstSequence = raffle.statistics.totalTicketsIssued + 1;
    const tickets = Array.from({ length: count }, (_, index) =>
      createTicket({
        userId,
        raffleId: raffle.id,
        ticketNumber: generateTicketNumber(raffle.id, firstSequence + index),
        source,
        sourceReference,
        now,
      }),
    );

    const balance = currentBalance + count;
    const entry = await this.ledgerRepository.append(
      {
        id: randomUUID(),
        userId,
        raffleId: raffle.id,
        delta: count,
        resultingBalance: balance,
        kind: LedgerEntryKind.ISSUE,
        source,
        sourceReference,
        causationId,
        ticketIds: tickets.map((t) => t.id),
        createdAt: now,
      },
      tx,
    );
    const created = await this.ticketRepository.createMany(tickets, tx);

    this.logger.log(`Issued ${count} ticket(s) in raffle ${raffle.id} to user ${userId} (balance ${balance})`);

    return ok({
      raffleId: raffle.id,
      userId,
      tickets: created,
      balance,
      ledgerEntryId: entry.id,
      duplicate: false,
      event: ticketsIssuedEvent(created, { raffleId: raffle.id, userId, balance, source, sourceReference }, now, causationId),
    });
  }

  getBalance(userId: string, raffleId: string, tx?: TransactionContext): Promise<number> {
    return this.ledgerRepository.sumDeltas(userId, raffleId, tx);
  }

  /**
   * Result of an earlier issuance for the same source reference, flagged as a
   * duplicate, or null if none happened.
   */
  async findIssuance(
    source: TicketSource,
    sourceReference: string,
    tx?: TransactionContext,
  ): Promise<IssuedTickets | null> {
    const entry = await this.ledgerRepository.findBySource(source, sourceReference, tx);
    if (!entry) {
      return null;
    }
    const tickets = await this.ticketRepository.findByIds(entry.ticketIds, tx);
    return {
      raffleId: entry.raffleId,
      userId: entry.userId,
      tickets,
      balance: entry.resultingBalance,
      ledgerEntryId: entry.id,
      duplicate: true,
    };
  }

  async transferTicket(
    command: TransferTicketCommand,
    tx?: TransactionContext,
  ): Promise<Result<TicketTransferred, TransferTicketError>> {
    const { ticket, raffle, toUserId, reason, causationId } = command;
    if (!toUserId) {
      return err(new ValidationError('toUserId is required'));
    }
    if (ticket.raffleId !== raffle.id) {
      return err(new ValidationError(`Ticket ${ticket.id} does not belong to raffle ${raffle.id}`));
    }
    if (raffle.status !== RaffleStatus.ACTIVE) {
      return err(
        new RaffleNotAcceptingEntriesError(`Tickets of raffle ${raffle.id} cannot be transferred while ${raffle.status}`),
      );
    }

    const now = this.clock.now();
    const moved = transferTo(ticket, toUserId, now, reason);
    if (!moved.ok) {
      return moved;
    }

    const fromBalance = await this.ledgerRepository.sumDeltas(ticket.userId, raffle.id, tx);
    const toBalance = await this.ledgerRepository.sumDeltas(toUserId, raffle.id, tx);
    const { maxTicketsPerUser } = raffle.participationRules;
    if (maxTicketsPerUser !== undefined && toBalance + 1 > maxTicketsPerUser) {
      return err(new LimitExceededError(`User ${toUserId} already holds the maximum of ${maxTicketsPerUser} tickets`));
    }

    const reference = `${ticket.id}:${moved.value.transferCount}`;
    await this.append(
      { userId: ticket.userId, raffleId: raffle.id, delta: -1, resultingBalance: fromBalance - 1 },
      { kind: LedgerEntryKind.TRANSFER_OUT, source: LedgerAdjustmentSource.TRANSFER, sourceReference: `${reference}:out` },
      { ticketIds: [ticket.id], causationId, now },
      tx,
    );
    await this.append(
      { userId: toUserId, raffleId: raffle.id, delta: 1, resultingBalance: toBalance + 1 },
      { kind: LedgerEntryKind.TRANSFER_IN, source: LedgerAdjustmentSource.TRANSFER, sourceReference: `${reference}:in` },
      { ticketIds: [ticket.id], causationId, now },
      tx,
    );
    const updated = await this.ticketRepository.update(moved.value, tx);

    this.logger.log(`Ticket ${ticket.ticketNumber} transferred from ${ticket.userId} to ${toUserId}`);

    return ok({
      ticket: updated,
      fromUserId: ticket.userId,
      fromBalance: fromBalance - 1,
      toBalance: toBalance + 1,
      senderLeft: fromBalance - 1 === 0,
      recipientJoined: toBalance === 0,
    });
  }

  async revokeTicket(
    command: RevokeTicketCommand,
    tx?: TransactionContext,
  ): Promise<Result<TicketRevoked, ValidationError>> {
    const { ticket, status, reason, causationId } = command;
    if (status !== TicketStatus.CANCELLED && status !== TicketStatus.EXPIRED) {
      return err(new ValidationError(`Tickets can only be revoked as cancelled or expired, not ${status}`));
    }

    const now = this.clock.now();
    const revoked = revoke(ticket, status, now);
    if (!revoked.ok) {
      return revoked;
    }

    const balance = (await this.ledgerRepository.sumDeltas(ticket.userId, ticket.raffleId, tx)) - 1;
    await this.append(
      { userId: ticket.userId, raffleId: ticket.raffleId, delta: -1, resultingBalance: balance },
      { kind: LedgerEntryKind.REVOKE, source: LedgerAdjustmentSource.REVOCATION, sourceReference: ticket.id },
      { ticketIds: [ticket.id], causationId, now },
      tx,
    );
    const updated = await this.ticketRepository.update(revoked.value, tx);

    this.logger.log(`Ticket ${ticket.ticketNumber} revoked as ${status}${reason ? ` (${reason})` : ''}`);

    return ok({ ticket: updated, balance, participantLeft: balance === 0 });
  }

  /** Active tickets of a raffle, the pool a draw selects from. */
  snapshotDrawPool(raffleId: string, tx?: TransactionContext): Promise<Ticket[]> {
    return this.ticketRepository.findByRaffle(raffleId, TicketStatus.ACTIVE, tx);
  }

  markWinners(ticketIds: readonly string[], tx?: TransactionContext): Promise<number> {
    return this.ticketRepository.markWinners(ticketIds, this.clock.now(), tx);
  }

  findTicket(ticketId: string, tx?: TransactionContext): Promise<Ticket | null> {
    return this.ticketRepository.findById(ticketId, tx);
  }

  /** Looks a ticket up by its printed number; a leading `#` is accepted. */
  async findByNumber(raw: string): Promise<Result<Ticket, ValidationError | NotFoundError>> {
    const parsed = parseTicketNumber(raw.trim().replace(/^#/, ''));
    if (!parsed.ok) {
      return parsed;
    }
    const ticket = await this.ticketRepository.findByNumber(parsed.value);
    return ticket ? ok(ticket) : err(new NotFoundError(`Ticket ${formatTicketNumber(parsed.value)} not found`));
  }

  findUserTickets(userId: string, raffleId: string): Promise<Ticket[]> {
    return this.ticketRepository.findByUserAndRaffle(userId, raffleId);
  }

  history(userId: string, raffleId: string): Promise<LedgerEntry[]> {
    return this.ledgerRepository.findByUserAndRaffle(userId, raffleId);
  }

  summarize(raffleId: string): Promise<LedgerSummary> {
    return this.ledgerRepository.summarize(raffleId);
  }

  private append(
    movement: { userId: string; raffleId: string; delta: number; resultingBalance: number },
    origin: { kind: LedgerEntryKind; source: LedgerSource; sourceReference: string },
    context: { ticketIds: string[]; causationId?: string; now: Date },
    tx?: TransactionContext,
  ): Promise<LedgerEntry> {
    return this.ledgerRepository.append(
      {
        id: randomUUID(),
        ...movement,
        ...origin,
        causationId: context.causationId,
        ticketIds: context.ticketIds,
        createdAt: context.now,
      },
      tx,
    );
  }
}
