import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { Cron, CronExpression } from '@nestjs/schedule';
import { plainToInstance } from 'class-transformer';
import { ValidationError as ClassValidationError, validate } from 'class-validator';
import { CLOCK, Clock } from '../../common/clock';
import {
  DuplicateSourceError,
  InsufficientParticipantsError,
  LimitExceededError,
  NotEligibleError,
  NotFoundError,
  PersistenceConflictError,
  RaffleEngineError,
  RaffleNotAcceptingEntriesError,
  ValidationError,
} from '../../common/errors';
import { InboundEvents } from '../../common/events/event-names';
import { EVENT_PUBLISHER, EventPublisher } from '../../common/events/event-publisher';
import { LOCK_SERVICE, LockService } from '../../common/locks/lock.service';
import { Result, err, ok } from '../../common/result';
import { ConfigService } from '../../database/config.service';
import { TRANSACTION_RUNNER, TransactionContext, TransactionRunner } from '../../database/transaction';
import { DrawEngineService } from '../../draws/application/draw-engine.service';
import { DrawOutcome, awardedByPrize } from '../../draws/domain/draw-engine';
import { drawCompletedEvents } from '../../draws/domain/draw-events';
import { UserProfile } from '../../raffles/domain/eligibility-criteria';
import { EligibilityDecision, IneligibilityCode, evaluateEligibility } from '../../raffles/domain/eligibility-evaluator';
import { isDrawDatePassed } from '../../raffles/domain/raffle-schedule';
import {
  addParticipant,
  complete,
  completeDraw,
  isEligibleForDraw,
  removeParticipant,
  startDrawing,
} from '../../raffles/domain/raffle-state-machine';
import { Raffle, RaffleStatus } from '../../raffles/domain/raffle.entity';
import { RAFFLE_REPOSITORY, RaffleRepository } from '../../raffles/domain/raffle.repository';
import {
  IssuedTickets,
  TicketLedgerService,
  TicketRevoked,
  TicketTransferred,
} from '../../tickets/application/ticket-ledger.service';
import { ticketIssuanceFailedEvent } from '../../tickets/domain/ticket-events';
import { RevokedStatus, Ticket, TicketSource } from '../../tickets/domain/ticket.entity';
import { AdEngagementQualifiedDto, TicketsGeneratedDto } from './dto/inbound-events.dto';

export interface IssuanceRequest {
  userId: string;
  raffleId?: string;
  count: number;
  source: TicketSource;
  sourceReference: string;
  causationId?: string;
  profile?: Omit<UserProfile, 'userId'>;
}

export interface DrawReport {
  raffle: Raffle;
  /** Null when the raffle closed without participants. */
  outcome: DrawOutcome | null;
  /** Set when the pool was smaller than the prizes on offer. */
  shortfall: InsufficientParticipantsError | null;
}

interface ClosedPool {
  raffle: Raffle;
  pool: Ticket[];
  closedEmpty: boolean;
}

function describeErrors(errors: ClassValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}).map((message) => `${prefix}${message}`),
    ...describeErrors(error.children ?? [], `${prefix}${error.property}.`),
  ]);
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function isTicketSource(value: unknown): value is TicketSource {
  return Object.values(TicketSource).some((source) => source === value);
}

/** The parts of an invalid payload that still identify whose issuance failed. */
function attribution(
  payload: object,
  fields: { userId: unknown; sourceReference: unknown; count: unknown },
  source: TicketSource,
): IssuanceRequest | null {
  const userId = text(fields.userId);
  const sourceReference = text(fields.sourceReference);
  if (!userId || !sourceReference) {
    return null;
  }
  const eventId = 'eventId' in payload ? text(payload.eventId) : undefined;
  const causationId = 'causationId' in payload ? text(payload.causationId) : undefined;
  const raffleId = 'raffleId' in payload ? text(payload.raffleId) : undefined;
  return {
    userId,
    raffleId,
    count: typeof fields.count === 'number' ? fields.count : 0,
    source,
    sourceReference,
    causationId: causationId ?? eventId,
  };
}

function attributeTicketsGenerated(payload: unknown): IssuanceRequest | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  const source = 'source' in payload ? payload.source : undefined;
  if (!isTicketSource(source)) {
    return null;
  }
  return attribution(
    payload,
    {
      userId: 'userId' in payload ? payload.userId : undefined,
      sourceReference: 'sourceReference' in payload ? payload.sourceReference : undefined,
      count: 'count' in payload ? payload.count : undefined,
    },
    source,
  );
}

function attributeAdEngagement(payload: unknown): IssuanceRequest | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  return attribution(
    payload,
    {
      userId: 'userId' in payload ? payload.userId : undefined,
      sourceReference: 'engagementId' in payload ? payload.engagementId : undefined,
      count: 'bonusCount' in payload ? payload.bonusCount : undefined,
    },
    TicketSource.AD_BONUS,
  );
}

export function decisionToError(decision: Extract<EligibilityDecision, { eligible: false }>): RaffleEngineError {
  switch (decision.code) {
    case IneligibilityCode.REGISTRATION_CLOSED:
      return new RaffleNotAcceptingEntriesError(decision.reason);
    case IneligibilityCode.ABOVE_MAXIMUM:
    case IneligibilityCode.CAPACITY_REACHED:
      return new LimitExceededError(decision.reason);
    case IneligibilityCode.INVALID_REQUEST:
      return new ValidationError(decision.reason);
    default:
      return new NotEligibleError(decision.reason);
  }
}

/**
 * Coordinates the ledger, the eligibility rules, the raffle state machine and
 * the draw engine. Every write that spans the ledger and the raffle runs in
 * one transaction; events go out only after it commits.
 */
@Injectable()
export class RaffleOrchestratorService {
  private readonly logger = new Logger(RaffleOrchestratorService.name);

  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: RaffleRepository,
    private readonly ticketLedger: TicketLedgerService,
    private readonly drawEngine: DrawEngineService,
    @Inject(TRANSACTION_RUNNER)
    private readonly transactionRunner: TransactionRunner,
    @Inject(LOCK_SERVICE)
    private readonly lockService: LockService,
    @Inject(EVENT_PUBLISHER)
    private readonly eventPublisher: EventPublisher,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly configService: ConfigService,
  ) {}

  @OnEvent(InboundEvents.TICKETS_GENERATED)
  async onTicketsGenerated(payload: unknown): Promise<void> {
    const parsed = await this.parse(TicketsGeneratedDto, payload);
    if (!parsed.ok) {
      this.rejectPayload(InboundEvents.TICKETS_GENERATED, parsed.error, attributeTicketsGenerated(payload));
      return;
    }
    const event = parsed.value;
    await this.issueOrReport({
      userId: event.userId,
      raffleId: event.raffleId,
      count: event.count,
      source: event.source,
      sourceReference: event.sourceReference,
      causationId: event.causationId ?? event.eventId,
      profile: event.profile,
    });
  }

  @OnEvent(InboundEvents.AD_ENGAGEMENT_QUALIFIED)
  async onAdEngagementQualified(payload: unknown): Promise<void> {
    const parsed = await this.parse(AdEngagementQualifiedDto, payload);
    if (!parsed.ok) {
      this.rejectPayload(InboundEvents.AD_ENGAGEMENT_QUALIFIED, parsed.error, attributeAdEngagement(payload));
      return;
    }
    const event = parsed.value;
    await this.issueOrReport({
      userId: event.userId,
      raffleId: event.raffleId,
      count: event.bonusCount,
      source: TicketSource.AD_BONUS,
      sourceReference: event.engagementId,
      causationId: event.causationId ?? event.eventId,
      profile: event.profile,
    });
  }

  /**
   * A payload that names its user and source reference is answered with
   * TicketIssuanceFailed; anything else can only be logged.
   */
  private rejectPayload(eventName: string, error: ValidationError, request: IssuanceRequest | null): void {
    if (!request) {
      this.logger.warn(`Rejected ${eventName} payload: ${error.message}`);
      return;
    }
    this.issuanceFailed(request, error);
  }

  /**
   * Event handlers must not reject; infrastructure failures are logged here
   * after the failure event went out.
   */
  private async issueOrReport(request: IssuanceRequest): Promise<void> {
    try {
      await this.issueTickets(request);
    } catch (error) {
      this.logger.error(
        `Ticket issuance ${request.source}:${request.sourceReference} failed`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * Issue tickets for one upstream event. Duplicates return the original
   * issuance; every other failure publishes TicketIssuanceFailed.
   */
  async issueTickets(request: IssuanceRequest): Promise<Result<IssuedTickets, RaffleEngineError>> {
    const previous = await this.ticketLedger.findIssuance(request.source, request.sourceReference);
    if (previous) {
      this.logger.log(`Duplicate delivery of ${request.source}:${request.sourceReference}`);
      return ok(previous);
    }

    let raffleId = request.raffleId;
    try {
      raffleId = raffleId ?? (await this.resolveOpenRaffle());
      if (!raffleId) {
        return this.issuanceFailed(request, new RaffleNotAcceptingEntriesError('No raffle is open for registration'));
      }
      const targetRaffleId = raffleId;

      const result = await this.withConflictRetry(`issue ${request.source}:${request.sourceReference}`, () =>
        this.lockService.withLock(`issue:${targetRaffleId}:${request.userId}`, () =>
          this.transactionRunner.run((tx) => this.issueWithin(tx, targetRaffleId, request)),
        ),
      );

      if (!result.ok) {
        if (result.error instanceof DuplicateSourceError) {
          const original = await this.ticketLedger.findIssuance(request.source, request.sourceReference);
          if (original) {
            return ok(original);
          }
        }
        return this.issuanceFailed({ ...request, raffleId }, result.error);
      }
      if (result.value.event) {
        this.eventPublisher.publish(result.value.event);
      }
      return result;
    } catch (error) {
      this.publishIssuanceFailed({ ...request, raffleId }, 'INTERNAL_ERROR', 'Ticket issuance could not be completed');
      throw error;
    }
  }

  private async issueWithin(
    tx: TransactionContext,
    raffleId: string,
    request: IssuanceRequest,
  ): Promise<Result<IssuedTickets, RaffleEngineError>> {
    const previous = await this.ticketLedger.findIssuance(request.source, request.sourceReference, tx);
    if (previous) {
      return ok(previous);
    }

    const raffle = await this.raffleRepository.findById(raffleId, tx);
    if (!raffle) {
      return err(new NotFoundError(`Raffle with id ${raffleId} not found`));
    }

    const now = this.clock.now();
    const currentUserTickets = await this.ticketLedger.getBalance(request.userId, raffle.id, tx);
    const decision = evaluateEligibility(
      raffle,
      { ...request.profile, userId: request.userId },
      request.count,
      { currentUserTickets, now },
    );
    if (!decision.eligible) {
      return err(decisionToError(decision));
    }

    const issued = await this.ticketLedger.issueTickets(
      {
        raffle,
        userId: request.userId,
        count: decision.grantedCount,
        source: request.source,
        sourceReference: request.sourceReference,
        causationId: request.causationId,
      },
      tx,
    );
    if (!issued.ok || issued.value.duplicate) {
      return issued;
    }

    // Ledger rows are already written: failures from here on must roll back.
    const updated = addParticipant(raffle, {
      newParticipant: currentUserTickets === 0,
      ticketsIssued: issued.value.tickets.length,
      now,
    });
    if (!updated.ok) {
      throw updated.error;
    }
    await this.raffleRepository.save(updated.value, tx);
    return issued;
  }

  /**
   * Both owners are locked in a fixed order. The owner is resolved again on
   * every attempt, since the ticket may change hands while the locks are
   * awaited.
   */
  async transferTicket(command: {
    ticketId: string;
    toUserId: string;
    reason?: string;
    causationId?: string;
  }): Promise<Result<TicketTransferred, RaffleEngineError>> {
    return this.withConflictRetry(`transfer ticket ${command.ticketId}`, async () => {
      const ticket = await this.ticketLedger.findTicket(command.ticketId);
      if (!ticket) {
        return err(new NotFoundError(`Ticket with id ${command.ticketId} not found`));
      }
      if (command.toUserId === ticket.userId) {
        return err(new ValidationError('Cannot transfer a ticket to its current owner'));
      }
      const [first, second] = [ticket.userId, command.toUserId].sort();

      return this.lockService.withLock(`issue:${ticket.raffleId}:${first}`, () =>
        this.lockService.withLock(`issue:${ticket.raffleId}:${second}`, () =>
          this.transactionRunner.run(async (tx) => {
            const { current, raffle } = await this.lockedTicket(tx, ticket);

            const moved = await this.ticketLedger.transferTicket(
              { ticket: current, raffle, toUserId: command.toUserId, reason: command.reason, causationId: command.causationId },
              tx,
            );
            if (!moved.ok) {
              return moved;
            }

            const now = this.clock.now();
            let next: Raffle = { ...raffle, updatedAt: now };
            if (moved.value.senderLeft) {
              const left = removeParticipant(next, { participantLeft: true, ticketsRevoked: 0, now });
              if (!left.ok) throw left.error;
              next = left.value;
            }
            if (moved.value.recipientJoined) {
              const joined = addParticipant(next, { newParticipant: true, ticketsIssued: 0, now });
              if (!joined.ok) throw joined.error;
              next = joined.value;
            }
            // Saved on every transfer so the raffle version moves with any balance.
            await this.raffleRepository.save(next, tx);
            return moved;
          }),
        ),
      );
    });
  }

  async revokeTicket(command: {
    ticketId: string;
    status: RevokedStatus;
    reason?: string;
    causationId?: string;
  }): Promise<Result<TicketRevoked, RaffleEngineError>> {
    return this.withConflictRetry(`revoke ticket ${command.ticketId}`, async () => {
      const ticket = await this.ticketLedger.findTicket(command.ticketId);
      if (!ticket) {
        return err(new NotFoundError(`Ticket with id ${command.ticketId} not found`));
      }

      return this.lockService.withLock(`issue:${ticket.raffleId}:${ticket.userId}`, () =>
        this.transactionRunner.run(async (tx) => {
          const { current, raffle } = await this.lockedTicket(tx, ticket);

          const revoked = await this.ticketLedger.revokeTicket(
            { ticket: current, status: command.status, reason: command.reason, causationId: command.causationId },
            tx,
          );
          if (!revoked.ok) {
            return revoked;
          }

          const updated = removeParticipant(raffle, {
            participantLeft: revoked.value.participantLeft,
            ticketsRevoked: 1,
            now: this.clock.now(),
          });
          if (!updated.ok) {
            throw updated.error;
          }
          await this.raffleRepository.save(updated.value, tx);
          return revoked;
        }),
      );
    });
  }

  /**
   * Re-reads a ticket inside the transaction that holds its owner's lock.
   * Throws PersistenceConflictError when the owner changed after the lock key
   * was chosen, so the caller retries under the new owner's lock.
   */
  private async lockedTicket(tx: TransactionContext, ticket: Ticket): Promise<{ current: Ticket; raffle: Raffle }> {
    const current = await this.ticketLedger.findTicket(ticket.id, tx);
    const raffle = await this.raffleRepository.findById(ticket.raffleId, tx);
    if (!current || !raffle) {
      throw new NotFoundError(`Ticket ${ticket.id} or its raffle no longer exists`);
    }
    if (current.userId !== ticket.userId) {
      throw new PersistenceConflictError(`Ticket ${ticket.id} changed owner while waiting for its lock`);
    }
    return { current, raffle };
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async runScheduledDraws(): Promise<void> {
    const now = this.clock.now();
    const due = await this.raffleRepository.findDueForDraw(now);

    for (const raffle of due) {
      if (!this.isDue(raffle, now)) {
        continue;
      }
      try {
        const result = await this.executeDraw(raffle.id);
        if (!result.ok) {
          this.logger.warn(`Scheduled draw of raffle ${raffle.id} skipped: ${result.error.message}`);
        }
      } catch (error) {
        this.logger.error(
          `Scheduled draw of raffle ${raffle.id} failed`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }
  }

  /** Manual trigger; goes through the same eligibility gate as the scheduler. */
  triggerDraw(raffleId: string): Promise<Result<DrawReport, RaffleEngineError>> {
    this.logger.log(`Manual draw requested for raffle ${raffleId}`);
    return this.executeDraw(raffleId);
  }

  /**
   * Closes the pool, draws in memory and records the result. If recording
   * fails the raffle stays in DRAWING and the next run repeats the same draw.
   */
  async executeDraw(raffleId: string): Promise<Result<DrawReport, RaffleEngineError>> {
    return this.lockService.withLock(`draw:${raffleId}`, async () => {
      try {
        const now = this.clock.now();
        const closed = await this.transactionRunner.run((tx) => this.closePool(tx, raffleId, now));
        if (!closed.ok) {
          return closed;
        }

        if (closed.value.closedEmpty) {
          this.logger.log(`Raffle ${raffleId} closed without participants`);
          this.eventPublisher.publishAll(drawCompletedEvents(closed.value.raffle, null, now));
          return ok({ raffle: closed.value.raffle, outcome: null, shortfall: null });
        }

        const outcome = this.drawEngine.draw(closed.value.raffle, closed.value.pool, now);
        if (!outcome.ok) {
          this.logger.error(`Draw of raffle ${raffleId} aborted: ${outcome.error.message}`);
          return outcome;
        }

        const { winners } = outcome.value;
        const completed = await this.transactionRunner.run(async (tx) => {
          const current = await this.raffleRepository.findById(raffleId, tx);
          if (!current) {
            throw new NotFoundError(`Raffle with id ${raffleId} not found`);
          }
          const notDrawn = await this.drawEngine.ensureNotDrawn(current, tx);
          if (!notDrawn.ok) {
            throw notDrawn.error;
          }
          await this.drawEngine.recordWinners(winners, tx);
          await this.ticketLedger.markWinners(winners.map((w) => w.ticketId), tx);
          const done = completeDraw(current, { now, awardedByPrize: awardedByPrize(winners) });
          if (!done.ok) {
            throw done.error;
          }
          return this.raffleRepository.save(done.value, tx);
        });

        this.logger.log(`Raffle ${raffleId} completed with ${winners.length} winner(s)`);
        this.eventPublisher.publishAll(drawCompletedEvents(completed, outcome.value, now));
        return ok({
          raffle: completed,
          outcome: outcome.value,
          shortfall: this.drawEngine.shortfallOf(raffleId, outcome.value),
        });
      } catch (error) {
        if (error instanceof RaffleEngineError) {
          return err(error);
        }
        throw error;
      }
    });
  }

  private async closePool(
    tx: TransactionContext,
    raffleId: string,
    now: Date,
  ): Promise<Result<ClosedPool, RaffleEngineError>> {
    const raffle = await this.raffleRepository.findById(raffleId, tx);
    if (!raffle) {
      return err(new NotFoundError(`Raffle with id ${raffleId} not found`));
    }
    const notDrawn = await this.drawEngine.ensureNotDrawn(raffle, tx);
    if (!notDrawn.ok) {
      return notDrawn;
    }

    if (raffle.status === RaffleStatus.DRAWING) {
      this.logger.warn(`Resuming interrupted draw of raffle ${raffleId}`);
      return ok({ raffle, pool: await this.ticketLedger.snapshotDrawPool(raffleId, tx), closedEmpty: false });
    }

    if (this.isEmptyAndOverdue(raffle, now)) {
      const closed = complete(raffle, now);
      if (!closed.ok) {
        return closed;
      }
      return ok({ raffle: await this.raffleRepository.save(closed.value, tx), pool: [], closedEmpty: true });
    }

    const drawing = startDrawing(raffle, now, this.configService.drawBufferMs);
    if (!drawing.ok) {
      return drawing;
    }
    const saved = await this.raffleRepository.save(drawing.value, tx);
    const pool = await this.ticketLedger.snapshotDrawPool(raffleId, tx);
    return ok({ raffle: saved, pool, closedEmpty: false });
  }

  private isEmptyAndOverdue(raffle: Raffle, now: Date): boolean {
    return (
      raffle.status === RaffleStatus.ACTIVE &&
      raffle.statistics.currentParticipants === 0 &&
      isDrawDatePassed(raffle.schedule, now)
    );
  }

  private isDue(raffle: Raffle, now: Date): boolean {
    return (
      raffle.status === RaffleStatus.DRAWING ||
      isEligibleForDraw(raffle, now, this.configService.drawBufferMs) ||
      this.isEmptyAndOverdue(raffle, now)
    );
  }

  private async resolveOpenRaffle(): Promise<string | undefined> {
    const [open] = await this.raffleRepository.findOpenForRegistration(this.clock.now());
    return open?.id;
  }

  /**
   * Re-runs `work` while it fails with PersistenceConflictError. Domain errors
   * thrown to force a rollback come back as `err`.
   */
  private async withConflictRetry<T>(
    label: string,
    work: () => Promise<Result<T, RaffleEngineError>>,
  ): Promise<Result<T, RaffleEngineError>> {
    const maxAttempts = this.configService.issueMaxAttempts;
    for (let attempt = 1; ; attempt++) {
      try {
        return await work();
      } catch (error) {
        if (error instanceof PersistenceConflictError && attempt < maxAttempts) {
          this.logger.warn(`Conflict on ${label}, retrying (${attempt}/${maxAttempts})`);
          continue;
        }
        if (error instanceof RaffleEngineError) {
          return err(error);
        }
        throw error;
      }
    }
  }

  private async parse<T extends object>(
    type: new () => T,
    payload: unknown,
  ): Promise<Result<T, ValidationError>> {
    if (typeof payload !== 'object' || payload === null) {
      return err(new ValidationError('Event payload must be an object'));
    }
    const instance = plainToInstance(type, payload);
    const errors = await validate(instance);
    return errors.length > 0 ? err(ValidationError.fromIssues(describeErrors(errors))) : ok(instance);
  }

  private issuanceFailed(
    request: IssuanceRequest,
    error: RaffleEngineError,
  ): Result<IssuedTickets, RaffleEngineError> {
    this.logger.warn(`Issuance ${request.source}:${request.sourceReference} rejected: ${error.message}`);
    this.publishIssuanceFailed(request, error.code, error.message);
    return err(error);
  }

  private publishIssuanceFailed(request: IssuanceRequest, code: string, reason: string): void {
    this.eventPublisher.publish(
      ticketIssuanceFailedEvent(
        {
          userId: request.userId,
          raffleId: request.raffleId,
          source: request.source,
          sourceReference: request.sourceReference,
          requestedCount: request.count,
          code,
          reason,
        },
        this.clock.now(),
        request.causationId,
      ),
    );
  }
}
