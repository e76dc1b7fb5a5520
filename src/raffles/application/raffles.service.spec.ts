import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { RaffleEvents } from '../../common/events/event-names';
import { unwrap } from '../../common/result';
import { verifyServerSeed } from '../../draws/domain/fairness-seed';
import { TicketSource } from '../../tickets/domain/ticket.entity';
import { EngineHarness, createEngineHarness } from '../../../test/support/engine-harness';
import {
  DAY,
  DRAW_DATE,
  HOUR,
  RAFFLE_ID,
  REGISTRATION_END,
  SERVER_SEED,
  T0,
  activeRaffle,
  draftRaffle,
} from '../../../test/support/fixtures';
import { PrizeType } from '../domain/prize';
import { RaffleStatus, RaffleType } from '../domain/raffle.entity';
import { CreateRaffleDto } from './dto/create-raffle.dto';

describe('RafflesService', () => {
  let harness: EngineHarness;

  beforeEach(() => {
    harness = createEngineHarness();
  });

  const failure = (promise: Promise<unknown>) => promise.then(() => null, (error: unknown) => error);

  describe('create', () => {
    const dto: CreateRaffleDto = {
      name: '  Weekend raffle ',
      type: RaffleType.WEEKLY,
      schedule: { registrationStart: T0, registrationEnd: REGISTRATION_END, drawDate: DRAW_DATE },
      prizes: [
        { name: 'Gift card', tier: 2, type: PrizeType.GIFT_CARD, value: 50, quantityAvailable: 3 },
        { name: 'Cash', tier: 1, type: PrizeType.CASH, value: 1000, quantityAvailable: 1 },
      ],
      createdBy: 'admin-1',
    };

    it('should store a draft with prizes ordered by tier', async () => {
      const created = await harness.rafflesService.create(dto);

      expect(created.status).toBe(RaffleStatus.DRAFT);
      expect(created.name).toBe('Weekend raffle');
      expect(created.prizes.map((p) => p.name)).toEqual(['Cash', 'Gift card']);
      expect(created.totalPrizeValue).toBe(1150);
      expect(created.oneWinPerUser).toBe(true);
      expect(created.remainingParticipantSlots).toBeNull();
      expect(await harness.raffleRepository.findById(created.id)).not.toBeNull();
    });

    it('should turn domain validation failures into a bad request', async () => {
      const error = await failure(
        harness.rafflesService.create({
          ...dto,
          schedule: { registrationStart: T0, registrationEnd: T0, drawDate: DRAW_DATE },
        }),
      );

      expect(error).toBeInstanceOf(BadRequestException);
      expect(error instanceof BadRequestException && error.getResponse()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Registration end must be after registration start',
      });
    });
  });

  describe('activate', () => {
    it('should commit to a server seed and publish the activation', async () => {
      await harness.seed(draftRaffle());

      const activated = await harness.rafflesService.activate(RAFFLE_ID, { performedBy: 'admin-2' });

      expect(activated.status).toBe(RaffleStatus.ACTIVE);
      expect(activated.updatedBy).toBe('admin-2');
      expect(activated.serverSeed).toBeUndefined();
      expect(activated.serverSeedHash).toMatch(/^[0-9a-f]{64}$/);

      const stored = await harness.raffleRepository.findById(RAFFLE_ID);
      expect(stored?.fairness && verifyServerSeed(stored.fairness.serverSeed, stored.fairness.serverSeedHash)).toBe(
        true,
      );
      expect(harness.publisher.ofType(RaffleEvents.RAFFLE_ACTIVATED)).toEqual([
        expect.objectContaining({ payload: expect.objectContaining({ raffleId: RAFFLE_ID, activatedBy: 'admin-2' }) }),
      ]);
    });

    it('should reject activation without prizes as a conflict', async () => {
      await harness.seed(draftRaffle({ prizes: [] }));

      const error = await failure(harness.rafflesService.activate(RAFFLE_ID));

      expect(error).toBeInstanceOf(ConflictException);
      expect(error instanceof ConflictException && error.getResponse()).toEqual({
        code: 'ILLEGAL_TRANSITION',
        message: 'Cannot activate raffle in status draft: Raffle must have at least one prize',
      });
      expect(harness.publisher.events).toEqual([]);
    });
  });

  it('should answer 404 for an unknown raffle', async () => {
    await expect(harness.rafflesService.findById('missing')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('should pause and resume an active raffle', async () => {
    await harness.seed(activeRaffle());

    expect((await harness.rafflesService.pause(RAFFLE_ID)).status).toBe(RaffleStatus.PAUSED);
    expect((await harness.rafflesService.resume(RAFFLE_ID)).status).toBe(RaffleStatus.ACTIVE);
    await expect(harness.rafflesService.resume(RAFFLE_ID)).rejects.toBeInstanceOf(ConflictException);
  });

  it('should only edit prizes of a draft', async () => {
    await harness.seed(draftRaffle());
    const prizes = [{ name: 'Phone', tier: 1, type: PrizeType.PHYSICAL, value: 300, quantityAvailable: 1 }];

    const updated = await harness.rafflesService.updatePrizePool(RAFFLE_ID, { prizes, updatedBy: 'admin-2' });
    expect(updated.prizes.map((p) => p.name)).toEqual(['Phone']);
    expect(updated.updatedBy).toBe('admin-2');

    await harness.rafflesService.activate(RAFFLE_ID);
    await expect(harness.rafflesService.updatePrizePool(RAFFLE_ID, { prizes })).rejects.toBeInstanceOf(
      ConflictException,
    );
  });

  describe('recreate', () => {
    it('should copy a cancelled raffle into a new draft starting now', async () => {
      await harness.seed(activeRaffle());
      await harness.rafflesService.cancel(RAFFLE_ID, { reason: 'supplier fell through' });
      const now = new Date(T0.getTime() + 2 * DAY);
      harness.clock.set(now);

      const recreated = await harness.rafflesService.recreate(RAFFLE_ID, { performedBy: 'admin-2' });

      expect(recreated.id).not.toBe(RAFFLE_ID);
      expect(recreated.status).toBe(RaffleStatus.DRAFT);
      expect(recreated.recreatedFrom).toBe(RAFFLE_ID);
      expect(recreated.createdBy).toBe('admin-2');
      expect(recreated.registrationStart).toEqual(now);
      expect(recreated.registrationEnd).toEqual(new Date(now.getTime() + 7 * DAY));
      expect(recreated.drawDate).toEqual(new Date(now.getTime() + 7 * DAY + HOUR));
      expect(recreated.prizes).toEqual([expect.objectContaining({ name: 'Fuel voucher', quantityAwarded: 0 })]);
      expect(recreated.prizes[0].id).not.toBe('prize-1');
    });

    it('should refuse a raffle that was not cancelled', async () => {
      await harness.seed(activeRaffle());

      const error = await failure(harness.rafflesService.recreate(RAFFLE_ID));

      expect(error).toBeInstanceOf(BadRequestException);
      expect(error instanceof BadRequestException && error.getResponse()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Only cancelled raffles can be recreated; raffle raffle-0001 is active',
      });
    });
  });

  describe('reconcile', () => {
    it('should flag statistics that drifted from the ledger', async () => {
      await harness.seed(activeRaffle());
      unwrap(
        await harness.orchestrator.issueTickets({
          userId: 'user-a',
          raffleId: RAFFLE_ID,
          count: 2,
          source: TicketSource.PROMOTIONAL,
          sourceReference: 'promo-1',
        }),
      );
      expect((await harness.rafflesService.reconcile(RAFFLE_ID)).consistent).toBe(true);

      const raffle = harness.database.tables.raffles.get(RAFFLE_ID);
      if (raffle) {
        harness.database.tables.raffles.set(RAFFLE_ID, {
          ...raffle,
          statistics: { ...raffle.statistics, totalTicketsIssued: 5 },
        });
      }

      expect(await harness.rafflesService.reconcile(RAFFLE_ID)).toEqual({
        raffleId: RAFFLE_ID,
        ledgerNetTickets: 2,
        ledgerParticipants: 1,
        cachedNetTickets: 5,
        cachedParticipants: 1,
        consistent: false,
      });
    });
  });

  it('should reveal the server seed and list winners once drawn', async () => {
    await harness.seed(activeRaffle());
    unwrap(
      await harness.orchestrator.issueTickets({
        userId: 'user-a',
        raffleId: RAFFLE_ID,
        count: 1,
        source: TicketSource.DIRECT_PURCHASE,
        sourceReference: 'order-1',
      }),
    );
    harness.clock.set(DRAW_DATE);
    unwrap(await harness.orchestrator.executeDraw(RAFFLE_ID));

    const raffle = await harness.rafflesService.findById(RAFFLE_ID);
    const winners = await harness.rafflesService.findWinners(RAFFLE_ID);

    expect(raffle.serverSeed).toBe(SERVER_SEED);
    expect(winners).toEqual([
      expect.objectContaining({
        position: 1,
        userId: 'user-a',
        ticketNumber: '#RAFFLE00-000001',
        prizeId: 'prize-1',
        prizeName: 'Fuel voucher',
        tier: 1,
      }),
    ]);
  });
});
