import { DomainEvent, domainEvent } from '../../common/events/domain-event';
import { RaffleEvents } from '../../common/events/event-names';
import { PrizeType } from '../../raffles/domain/prize';
import { Raffle } from '../../raffles/domain/raffle.entity';
import { formatTicketNumber } from '../../tickets/domain/ticket-number';
import { DrawOutcome, UnawardedPrize } from './draw-engine';
import { Winner } from './winner.entity';

export interface WinnerSummary {
  winnerId: string;
  userId: string;
  ticketNumber: string;
  position: number;
  prizeId: string;
  prizeName: string;
  prizeDescription: string;
  prizeType: PrizeType;
  prizeValue: number;
  tier: number;
}

export interface RaffleDrawCompletedPayload {
  raffleId: string;
  raffleName: string;
  drawDate: Date;
  seed?: string;
  algorithm?: string;
  merkleRoot?: string;
  /** Revealed so the committed hash can be checked. */
  serverSeed?: string;
  serverSeedHash?: string;
  poolSize: number;
  winners: WinnerSummary[];
  unawarded: UnawardedPrize[];
}

export type RaffleDrawCompletedEvent = DomainEvent<typeof RaffleEvents.DRAW_COMPLETED, RaffleDrawCompletedPayload>;

export interface RaffleWinnerSelectedPayload extends WinnerSummary {
  raffleId: string;
  raffleName: string;
}

export type RaffleWinnerSelectedEvent = DomainEvent<typeof RaffleEvents.WINNER_SELECTED, RaffleWinnerSelectedPayload>;

function summarize(winner: Winner): WinnerSummary {
  return {
    winnerId: winner.id,
    userId: winner.userId,
    ticketNumber: formatTicketNumber(winner.ticketNumber),
    position: winner.position,
    prizeId: winner.prizeId,
    prizeName: winner.prize.name,
    prizeDescription: winner.prize.description,
    prizeType: winner.prize.type,
    prizeValue: winner.prize.value,
    tier: winner.prize.tier,
  };
}

/**
 * Events announcing a finished draw: the completion itself followed by one
 * event per winner. `outcome` is null when the raffle closed without entries.
 */
export function drawCompletedEvents(
  raffle: Raffle,
  outcome: DrawOutcome | null,
  occurredAt: Date,
): [RaffleDrawCompletedEvent, ...RaffleWinnerSelectedEvent[]] {
  const winners = outcome?.winners ?? [];
  const completed: RaffleDrawCompletedEvent = domainEvent(
    RaffleEvents.DRAW_COMPLETED,
    {
      raffleId: raffle.id,
      raffleName: raffle.name,
      drawDate: raffle.schedule.drawDate,
      seed: outcome?.seed,
      algorithm: outcome?.algorithm,
      merkleRoot: outcome?.merkleRoot,
      serverSeed: raffle.fairness?.serverSeed,
      serverSeedHash: raffle.fairness?.serverSeedHash,
      poolSize: outcome?.poolSize ?? 0,
      winners: winners.map(summarize),
      unawarded: outcome?.unawarded ?? [],
    },
    occurredAt,
  );
  const selected: RaffleWinnerSelectedEvent[] = winners.map((winner) =>
    domainEvent(
      RaffleEvents.WINNER_SELECTED,
      { ...summarize(winner), raffleId: raffle.id, raffleName: raffle.name },
      occurredAt,
      completed.eventId,
    ),
  );
  return [completed, ...selected];
}
