import { unwrap } from '../../src/common/result';
import { hashServerSeed } from '../../src/draws/domain/fairness-seed';
import { PrizeType } from '../../src/raffles/domain/prize';
import { activate } from '../../src/raffles/domain/raffle-state-machine';
import { CreateRaffleInput, Raffle, RaffleType, createRaffle } from '../../src/raffles/domain/raffle.entity';
import { Ticket, TicketSource, createTicket } from '../../src/tickets/domain/ticket.entity';

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

/** Registration opens here; closes a week later; the draw is an hour after that. */
export const T0 = new Date('2026-03-02T10:00:00.000Z');
export const REGISTRATION_END = new Date(T0.getTime() + 7 * DAY);
export const DRAW_DATE = new Date(REGISTRATION_END.getTime() + HOUR);

export const RAFFLE_ID = 'raffle-0001';
export const SERVER_SEED = 'test-server-seed';

export function draftRaffle(overrides: Partial<CreateRaffleInput> = {}, id: string = RAFFLE_ID): Raffle {
  return unwrap(
    createRaffle(
      {
        name: 'Spring raffle',
        type: RaffleType.WEEKLY,
        schedule: { registrationStart: T0, registrationEnd: REGISTRATION_END, drawDate: DRAW_DATE },
        prizes: [
          { id: 'prize-1', name: 'Fuel voucher', tier: 1, type: PrizeType.FUEL_CREDIT, value: 500, quantityAvailable: 1 },
        ],
        createdBy: 'admin-1',
        ...overrides,
      },
      T0,
      id,
    ),
  );
}

export function activeRaffle(overrides: Partial<CreateRaffleInput> = {}, id: string = RAFFLE_ID): Raffle {
  return unwrap(
    activate(draftRaffle(overrides, id), {
      now: T0,
      activatedBy: 'admin-1',
      fairness: { serverSeed: SERVER_SEED, serverSeedHash: hashServerSeed(SERVER_SEED) },
    }),
  ).raffle;
}

export function ticket(overrides: Partial<Ticket> & Pick<Ticket, 'id' | 'userId' | 'ticketNumber'>): Ticket {
  return {
    ...createTicket({
      id: overrides.id,
      userId: overrides.userId,
      raffleId: RAFFLE_ID,
      ticketNumber: overrides.ticketNumber,
      source: TicketSource.REDEMPTION,
      sourceReference: `ref-${overrides.id}`,
      now: T0,
    }),
    ...overrides,
  };
}
