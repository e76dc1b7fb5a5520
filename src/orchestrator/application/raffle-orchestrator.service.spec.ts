import {
  AlreadyDrawnError,
  IllegalTransitionError,
  InsufficientParticipantsError,
  LimitExceededError,
  NotEligibleError,
  NotFoundError,
  PersistenceConflictError,
  RaffleNotAcceptingEntriesError,
  ValidationError,
} from '../../common/errors';
import { RaffleEvents } from '../../common/events/event-names';
import { unwrap } from '../../common/result';
import { PrizeType } from '../../raffles/domain/prize';
import { RaffleStatus } from '../../raffles/domain/raffle.entity';
import { TicketSource, TicketStatus } from '../../tickets/domain/ticket.entity';
import { EngineHarness, createEngineHarness } from '../../../test/support/engine-harness';
import { DAY, DRAW_DATE, RAFFLE_ID, REGISTRATION_END, T0, activeRaffle } from '../../../test/support/fixtures';
import { IssuanceRequest } from './raffle-orchestrator.service';

describe('RaffleOrchestratorService', () => {
  let harness: EngineHarness;

  beforeEach(() => {
    harness = createEngineHarness();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const request = (userId: string, count: number, sourceReference: string): IssuanceRequest => ({
    userId,
    raffleId: RAFFLE_ID,
    count,
    source: TicketSource.REDEMPTION,
    sourceReference,
  });

  const stored = async (id: string = RAFFLE_ID) => {
    const raffle = await harness.raffleRepository.findById(id);
    if (!raffle) throw new Error(`raffle ${id} missing`);
    return raffle;
  };

  describe('issueTickets', () => {
    it('should issue tickets, update statistics and publish after commit', async () => {
      await harness.seed(activeRaffle());

      const issued = unwrap(await harness.orchestrator.issueTickets(request('user-a', 3, 'redemption-1')));

      expect(issued.tickets.map((t) => t.ticketNumber)).toEqual([
        'RAFFLE00-000001',
        'RAFFLE00-000002',
        'RAFFLE00-000003',
      ]);
      expect((await stored()).statistics).toEqual({
        currentParticipants: 1,
        totalTicketsIssued: 3,
        totalTicketsRevoked: 0,
        winnersSelected: 0,
      });
      expect(harness.transactionRunner.committed).toBe(1);
      expect(harness.publisher.ofType(RaffleEvents.TICKETS_ISSUED)).toHaveLength(1);
    });

    it('should pick the open raffle closing first when none is named', async () => {
      await harness.seed(
        activeRaffle(
          { schedule: { registrationStart: T0, registrationEnd: REGISTRATION_END, drawDate: DRAW_DATE } },
          'later-0002',
        ),
      );
      await harness.seed(
        activeRaffle(
          {
            schedule: {
              registrationStart: T0,
              registrationEnd: new Date(T0.getTime() + DAY),
              drawDate: new Date(T0.getTime() + 2 * DAY),
            },
          },
          'sooner-0003',
        ),
      );

      const issued = unwrap(
        await harness.orchestrator.issueTickets({ ...request('user-a', 1, 'redemption-1'), raffleId: undefined }),
      );

      expect(issued.raffleId).toBe('sooner-0003');
      expect(issued.tickets[0].ticketNumber).toBe('SOONER00-000001');
    });

    it('should report a failure when no raffle is open', async () => {
      const result = await harness.orchestrator.issueTickets({
        ...request('user-a', 1, 'redemption-1'),
        raffleId: undefined,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RaffleNotAcceptingEntriesError);
        expect(result.error.message).toBe('No raffle is open for registration');
      }
      expect(harness.publisher.ofType(RaffleEvents.TICKET_ISSUANCE_FAILED)).toEqual([
        expect.objectContaining({
          payload: {
            userId: 'user-a',
            raffleId: undefined,
            source: TicketSource.REDEMPTION,
            sourceReference: 'redemption-1',
            requestedCount: 1,
            code: 'RAFFLE_NOT_ACCEPTING_ENTRIES',
            reason: 'No raffle is open for registration',
          },
        }),
      ]);
    });

    it('should treat a repeated delivery as the original issuance', async () => {
      await harness.seed(activeRaffle());
      const first = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1')));

      const second = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1')));

      expect(second.duplicate).toBe(true);
      expect(second.ledgerEntryId).toBe(first.ledgerEntryId);
      expect(harness.database.tables.ledger).toHaveLength(1);
      expect((await stored()).statistics.totalTicketsIssued).toBe(2);
      expect(harness.publisher.ofType(RaffleEvents.TICKETS_ISSUED)).toHaveLength(1);
    });

    it('should map unmet criteria to a not-eligible failure', async () => {
      await harness.seed(activeRaffle({ eligibilityCriteria: { minAge: 18 } }));

      const result = await harness.orchestrator.issueTickets({
        ...request('user-a', 1, 'redemption-1'),
        profile: { age: 16 },
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotEligibleError);
        expect(result.error.message).toBe('User does not meet eligibility criteria: minimum age is 18');
      }
      expect(harness.database.tables.ledger).toHaveLength(0);
    });

    it('should retry after a concurrent raffle update and roll back the first attempt', async () => {
      await harness.seed(activeRaffle());
      jest
        .spyOn(harness.raffleRepository, 'save')
        .mockRejectedValueOnce(new PersistenceConflictError('Raffle raffle-0001 was modified concurrently'));

      const issued = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1')));

      expect(issued.tickets.map((t) => t.ticketNumber)).toEqual(['RAFFLE00-000001', 'RAFFLE00-000002']);
      expect(harness.transactionRunner.rolledBack).toBe(1);
      expect(harness.transactionRunner.committed).toBe(1);
      expect(harness.database.tables.ledger).toHaveLength(1);
      expect(harness.database.tables.tickets.size).toBe(2);
    });

    it('should give up after the configured number of conflicts', async () => {
      await harness.seed(activeRaffle());
      jest
        .spyOn(harness.raffleRepository, 'save')
        .mockRejectedValue(new PersistenceConflictError('Raffle raffle-0001 was modified concurrently'));

      const result = await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PersistenceConflictError);
      }
      expect(harness.transactionRunner.rolledBack).toBe(harness.configService.issueMaxAttempts);
      expect(harness.database.tables.ledger).toHaveLength(0);
      expect(harness.publisher.ofType(RaffleEvents.TICKET_ISSUANCE_FAILED)).toEqual([
        expect.objectContaining({ payload: expect.objectContaining({ code: 'PERSISTENCE_CONFLICT' }) }),
      ]);
    });

    it('should publish an internal failure and rethrow unexpected errors', async () => {
      await harness.seed(activeRaffle());
      jest.spyOn(harness.raffleRepository, 'save').mockRejectedValue(new Error('connection reset'));

      await expect(harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1'))).rejects.toThrow(
        'connection reset',
      );
      expect(harness.publisher.ofType(RaffleEvents.TICKET_ISSUANCE_FAILED)).toEqual([
        expect.objectContaining({
          payload: expect.objectContaining({ code: 'INTERNAL_ERROR', raffleId: RAFFLE_ID }),
        }),
      ]);
      expect(harness.database.tables.ledger).toHaveLength(0);
    });
  });

  describe('inbound events', () => {
    it('should issue tickets for a tickets-generated event', async () => {
      await harness.seed(activeRaffle());

      await harness.orchestrator.onTicketsGenerated({
        eventId: 'evt-1',
        userId: 'user-a',
        raffleId: RAFFLE_ID,
        count: 2,
        source: 'redemption',
        sourceReference: 'redemption-9',
        profile: { age: 30 },
      });

      const [event] = harness.publisher.ofType(RaffleEvents.TICKETS_ISSUED);
      expect(event.causationId).toBe('evt-1');
      expect(await harness.ticketLedger.getBalance('user-a', RAFFLE_ID)).toBe(2);
    });

    it('should issue bonus tickets for a qualified ad engagement', async () => {
      await harness.seed(activeRaffle());

      await harness.orchestrator.onAdEngagementQualified({
        eventId: 'evt-2',
        userId: 'user-a',
        engagementId: 'engagement-1',
        bonusCount: 1,
      });

      expect(harness.database.tables.ledger).toEqual([
        expect.objectContaining({ source: TicketSource.AD_BONUS, sourceReference: 'engagement-1', delta: 1 }),
      ]);
    });

    it('should drop a malformed event that names no source reference', async () => {
      await harness.seed(activeRaffle());

      await harness.orchestrator.onTicketsGenerated({ userId: 'user-a', count: 0 });
      await harness.orchestrator.onTicketsGenerated('not an object');

      expect(harness.publisher.events).toEqual([]);
      expect(harness.database.tables.ledger).toEqual([]);
    });

    it('should report an invalid tickets-generated event as a failed issuance', async () => {
      await harness.seed(activeRaffle());

      await harness.orchestrator.onTicketsGenerated({
        eventId: 'evt-1',
        userId: 'user-a',
        raffleId: RAFFLE_ID,
        count: 0,
        source: 'redemption',
        sourceReference: 'redemption-9',
      });

      expect(harness.publisher.events).toEqual([
        expect.objectContaining({
          type: RaffleEvents.TICKET_ISSUANCE_FAILED,
          causationId: 'evt-1',
          payload: {
            userId: 'user-a',
            raffleId: RAFFLE_ID,
            source: TicketSource.REDEMPTION,
            sourceReference: 'redemption-9',
            requestedCount: 0,
            code: 'VALIDATION_ERROR',
            reason: 'count must not be less than 1',
          },
        }),
      ]);
      expect(harness.database.tables.ledger).toEqual([]);
    });

    it('should report an invalid ad engagement against its engagement id', async () => {
      await harness.seed(activeRaffle());

      await harness.orchestrator.onAdEngagementQualified({
        eventId: 'evt-2',
        userId: 'user-a',
        engagementId: 'engagement-1',
        bonusCount: 2.5,
      });

      expect(harness.publisher.ofType(RaffleEvents.TICKET_ISSUANCE_FAILED)).toEqual([
        expect.objectContaining({
          causationId: 'evt-2',
          payload: expect.objectContaining({
            userId: 'user-a',
            source: TicketSource.AD_BONUS,
            sourceReference: 'engagement-1',
            requestedCount: 2.5,
            code: 'VALIDATION_ERROR',
            reason: 'bonusCount must be an integer number',
          }),
        }),
      ]);
    });
  });

  describe('participation limits', () => {
    it('should refuse a third participant and draw one winner among the first two', async () => {
      await harness.seed(activeRaffle({ participationRules: { maxParticipants: 2, maxTicketsPerUser: 5 } }));
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 3, 'redemption-a')));
      unwrap(await harness.orchestrator.issueTickets(request('user-b', 2, 'redemption-b')));

      const refused = await harness.orchestrator.issueTickets(request('user-c', 1, 'redemption-c'));

      expect(refused.ok).toBe(false);
      if (!refused.ok) {
        expect(refused.error).toBeInstanceOf(LimitExceededError);
        expect(refused.error.message).toBe('Raffle has no participant slots left');
      }
      expect(harness.publisher.ofType(RaffleEvents.TICKET_ISSUANCE_FAILED)).toEqual([
        expect.objectContaining({
          payload: expect.objectContaining({ userId: 'user-c', raffleId: RAFFLE_ID, code: 'LIMIT_EXCEEDED' }),
        }),
      ]);
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 2, totalTicketsIssued: 5 });

      harness.clock.set(DRAW_DATE);
      const report = unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

      expect(report.raffle.status).toBe(RaffleStatus.COMPLETED);
      expect(report.raffle.statistics.winnersSelected).toBe(1);
      expect(report.outcome?.winners).toHaveLength(1);
      expect(report.shortfall).toBeNull();
      const winner = report.outcome?.winners[0];
      expect(['user-a', 'user-b']).toContain(winner?.userId);
      expect(winner && harness.database.tables.tickets.get(winner.ticketId)?.isWinner).toBe(true);

      const [completed, ...selected] = harness.publisher.events.filter(
        (e) => e.type === RaffleEvents.DRAW_COMPLETED || e.type === RaffleEvents.WINNER_SELECTED,
      );
      expect(completed.type).toBe(RaffleEvents.DRAW_COMPLETED);
      expect(selected).toHaveLength(1);
      expect(selected[0].causationId).toBe(completed.eventId);
    });
  });

  describe('transferTicket', () => {
    it('should keep the participant count when the only ticket changes hands', async () => {
      await harness.seed(activeRaffle());
      const [ticket] = unwrap(await harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1'))).tickets;

      const moved = unwrap(await harness.orchestrator.transferTicket({ ticketId: ticket.id, toUserId: 'user-b' }));

      expect(moved.ticket.userId).toBe('user-b');
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 1, totalTicketsIssued: 1 });
    });

    it('should roll back a transfer that would exceed the participant cap', async () => {
      await harness.seed(activeRaffle({ participationRules: { maxParticipants: 2 } }));
      const [ticket] = unwrap(await harness.orchestrator.issueTickets(request('user-a', 3, 'redemption-a'))).tickets;
      unwrap(await harness.orchestrator.issueTickets(request('user-b', 1, 'redemption-b')));

      const result = await harness.orchestrator.transferTicket({ ticketId: ticket.id, toUserId: 'user-c' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(LimitExceededError);
        expect(result.error.message).toBe('Raffle raffle-0001 reached its limit of 2 participants');
      }
      expect(harness.transactionRunner.rolledBack).toBe(1);
      expect(harness.database.tables.tickets.get(ticket.id)?.userId).toBe('user-a');
      expect(await harness.ticketLedger.getBalance('user-c', RAFFLE_ID)).toBe(0);
    });

    it('should reject unknown tickets and transfers to the owner', async () => {
      await harness.seed(activeRaffle());
      const [ticket] = unwrap(await harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1'))).tickets;

      const missing = await harness.orchestrator.transferTicket({ ticketId: 'nope', toUserId: 'user-b' });
      const self = await harness.orchestrator.transferTicket({ ticketId: ticket.id, toUserId: 'user-a' });

      expect(!missing.ok && missing.error).toBeInstanceOf(NotFoundError);
      expect(!self.ok && self.error).toBeInstanceOf(ValidationError);
    });

    it('should move the raffle version on a transfer that leaves the counts alone', async () => {
      await harness.seed(activeRaffle());
      const [ticket] = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-a'))).tickets;
      unwrap(await harness.orchestrator.issueTickets(request('user-b', 1, 'redemption-b')));
      const before = await stored();

      const moved = unwrap(await harness.orchestrator.transferTicket({ ticketId: ticket.id, toUserId: 'user-b' }));

      expect(moved).toMatchObject({ senderLeft: false, recipientJoined: false });
      const after = await stored();
      expect(after.version).toBe(before.version + 1);
      expect(after.statistics).toEqual(before.statistics);
    });
  });

  describe('revokeTicket', () => {
    it('should count revocations and drop the participant with the last ticket', async () => {
      await harness.seed(activeRaffle());
      const { tickets } = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1')));

      unwrap(await harness.orchestrator.revokeTicket({ ticketId: tickets[0].id, status: TicketStatus.CANCELLED }));
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 1, totalTicketsRevoked: 1 });

      unwrap(await harness.orchestrator.revokeTicket({ ticketId: tickets[1].id, status: TicketStatus.EXPIRED }));
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 0, totalTicketsRevoked: 2 });
      expect(await harness.rafflesService.reconcile(RAFFLE_ID)).toMatchObject({ consistent: true, ledgerNetTickets: 0 });
    });

    it('should take the lock of the owner found inside the transaction', async () => {
      await harness.seed(activeRaffle());
      const { tickets } = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-a')));
      unwrap(await harness.orchestrator.issueTickets(request('user-b', 1, 'redemption-b')));
      unwrap(await harness.orchestrator.transferTicket({ ticketId: tickets[0].id, toUserId: 'user-b' }));
      // First lookup still sees user-a as the owner.
      jest.spyOn(harness.ticketLedger, 'findTicket').mockResolvedValueOnce(tickets[0]);
      const withLock = jest.spyOn(harness.lockService, 'withLock');

      const revoked = unwrap(
        await harness.orchestrator.revokeTicket({ ticketId: tickets[0].id, status: TicketStatus.CANCELLED }),
      );

      expect(withLock.mock.calls.map(([key]) => key)).toEqual([
        `issue:${RAFFLE_ID}:user-a`,
        `issue:${RAFFLE_ID}:user-b`,
      ]);
      expect(harness.transactionRunner.rolledBack).toBe(1);
      expect(revoked).toMatchObject({ balance: 1, participantLeft: false });
      expect(revoked.ticket.userId).toBe('user-b');
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 2, totalTicketsRevoked: 1 });
    });
  });

  describe('executeDraw', () => {
    it('should refuse to draw before the draw window', async () => {
      await harness.seed(activeRaffle());
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1')));

      const result = await harness.orchestrator.triggerDraw(RAFFLE_ID);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(IllegalTransitionError);
      }
      expect((await stored()).status).toBe(RaffleStatus.ACTIVE);
    });

    it('should close an overdue raffle without participants', async () => {
      await harness.seed(activeRaffle());
      harness.clock.set(DRAW_DATE);

      const report = unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

      expect(report.outcome).toBeNull();
      expect(report.raffle.status).toBe(RaffleStatus.COMPLETED);
      expect(harness.publisher.ofType(RaffleEvents.DRAW_COMPLETED)).toEqual([
        expect.objectContaining({ payload: expect.objectContaining({ winners: [], poolSize: 0 }) }),
      ]);
      expect(harness.publisher.ofType(RaffleEvents.WINNER_SELECTED)).toEqual([]);
    });

    it('should award what it can when the pool is smaller than the prizes', async () => {
      await harness.seed(
        activeRaffle({
          prizes: [
            { id: 'prize-1', name: 'Fuel voucher', tier: 1, type: PrizeType.FUEL_CREDIT, value: 500, quantityAvailable: 3 },
          ],
        }),
      );
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-1')));
      harness.clock.set(DRAW_DATE);

      const report = unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

      expect(report.raffle.status).toBe(RaffleStatus.COMPLETED);
      expect(report.raffle.prizePool[0].quantityAwarded).toBe(1);
      expect(report.outcome?.unawarded).toEqual([{ prizeId: 'prize-1', quantity: 2 }]);
      expect(report.shortfall).toBeInstanceOf(InsufficientParticipantsError);
      expect(report.shortfall?.message).toBe(
        'Raffle raffle-0001 left 2 prize unit(s) unawarded from a pool of 2 ticket(s)',
      );
    });

    it('should not draw a raffle twice', async () => {
      await harness.seed(activeRaffle());
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1')));
      harness.clock.set(DRAW_DATE);
      unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

      const again = await harness.orchestrator.executeDraw(RAFFLE_ID);

      expect(again.ok).toBe(false);
      if (!again.ok) {
        expect(again.error).toBeInstanceOf(AlreadyDrawnError);
        expect(again.error.message).toBe('Raffle raffle-0001 has already been drawn');
      }
      expect(harness.database.tables.winners).toHaveLength(1);
    });

    it('should repeat the same draw after recording failed', async () => {
      await harness.seed(activeRaffle());
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-a')));
      unwrap(await harness.orchestrator.issueTickets(request('user-b', 2, 'redemption-b')));
      harness.clock.set(DRAW_DATE);
      const recordWinners = jest
        .spyOn(harness.drawEngine, 'recordWinners')
        .mockRejectedValueOnce(new Error('write failed'));

      await expect(harness.orchestrator.executeDraw(RAFFLE_ID)).rejects.toThrow('write failed');
      expect((await stored()).status).toBe(RaffleStatus.DRAWING);
      expect(harness.database.tables.winners).toEqual([]);

      const report = unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

      const [attempted] = recordWinners.mock.calls[0];
      expect(report.outcome?.winners.map((w) => w.ticketId)).toEqual(attempted.map((w) => w.ticketId));
      expect(report.raffle.status).toBe(RaffleStatus.COMPLETED);
    });
  });

  describe('runScheduledDraws', () => {
    it('should draw only the raffles that are due', async () => {
      await harness.seed(activeRaffle());
      await harness.seed(
        activeRaffle(
          {
            schedule: {
              registrationStart: T0,
              registrationEnd: REGISTRATION_END,
              drawDate: new Date(DRAW_DATE.getTime() + DAY),
            },
          },
          'summer-0002',
        ),
      );
      unwrap(await harness.orchestrator.issueTickets(request('user-a', 1, 'redemption-1')));
      unwrap(
        await harness.orchestrator.issueTickets({ ...request('user-a', 1, 'redemption-2'), raffleId: 'summer-0002' }),
      );
      harness.clock.set(DRAW_DATE);

      await harness.orchestrator.runScheduledDraws();

      expect((await stored()).status).toBe(RaffleStatus.COMPLETED);
      expect((await stored('summer-0002')).status).toBe(RaffleStatus.ACTIVE);
    });
  });

  describe('concurrent issuance', () => {
    beforeEach(() => {
      harness = createEngineHarness(T0, { serialize: false });
    });

    it('should hold the participant cap and absorb a repeated delivery', async () => {
      await harness.seed(activeRaffle({ participationRules: { maxParticipants: 2, maxTicketsPerUser: 5 } }));

      const [a, b, c, again] = await Promise.all([
        harness.orchestrator.issueTickets(request('user-a', 3, 'redemption-a')),
        harness.orchestrator.issueTickets(request('user-b', 2, 'redemption-b')),
        harness.orchestrator.issueTickets(request('user-c', 1, 'redemption-c')),
        harness.orchestrator.issueTickets(request('user-a', 3, 'redemption-a')),
      ]);

      expect([a.ok, b.ok, c.ok, again.ok]).toEqual([true, true, false, true]);
      expect(!c.ok && c.error).toBeInstanceOf(LimitExceededError);
      expect(again.ok && again.value.duplicate).toBe(true);
      expect(again.ok && again.value.tickets.map((t) => t.id)).toEqual(a.ok && a.value.tickets.map((t) => t.id));

      expect((await stored()).statistics).toMatchObject({ currentParticipants: 2, totalTicketsIssued: 5 });
      expect(harness.database.tables.ledger.map((e) => e.sourceReference).sort()).toEqual([
        'redemption-a',
        'redemption-b',
      ]);
      expect([...harness.database.tables.tickets.values()].map((t) => t.ticketNumber).sort()).toEqual([
        'RAFFLE00-000001',
        'RAFFLE00-000002',
        'RAFFLE00-000003',
        'RAFFLE00-000004',
        'RAFFLE00-000005',
      ]);
      expect(harness.publisher.ofType(RaffleEvents.TICKETS_ISSUED)).toHaveLength(2);
      expect(harness.transactionRunner.rolledBack).toBeGreaterThan(0);
    });

    it('should keep ledger balances and statistics in step under parallel transfers and revocations', async () => {
      await harness.seed(activeRaffle());
      const { tickets } = unwrap(await harness.orchestrator.issueTickets(request('user-a', 2, 'redemption-a')));
      const [held] = unwrap(await harness.orchestrator.issueTickets(request('user-c', 2, 'redemption-c'))).tickets;

      const results = await Promise.all([
        harness.orchestrator.transferTicket({ ticketId: tickets[0].id, toUserId: 'user-b' }),
        harness.orchestrator.transferTicket({ ticketId: held.id, toUserId: 'user-b' }),
        harness.orchestrator.revokeTicket({ ticketId: tickets[1].id, status: TicketStatus.CANCELLED }),
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, true, true]);
      expect(await harness.rafflesService.reconcile(RAFFLE_ID)).toMatchObject({ consistent: true, ledgerNetTickets: 3 });
      expect((await stored()).statistics).toMatchObject({ currentParticipants: 2, totalTicketsRevoked: 1 });
    });
  });
});
