import { createHash } from 'crypto';
import { Prize, remainingQuantity, sortByTier } from '../../raffles/domain/prize';
import { DrawPolicy } from '../../raffles/domain/raffle.entity';
import { Ticket, TicketStatus } from '../../tickets/domain/ticket.entity';
import { deriveDrawSeed, merkleRoot } from './fairness-seed';
import { SeededRandom } from './seeded-random';
import { ClaimStatus, DeliveryStatus, NotificationStatus, Winner } from './winner.entity';

export const DRAW_ALGORITHM = 'merkle-sha256/hmac-sha256-ctr/rejection-v1';

export interface DrawInput {
  raffleId: string;
  drawDate: Date;
  serverSeed: string;
  /** Closed pool; only ACTIVE tickets take part. */
  tickets: readonly Ticket[];
  prizes: readonly Prize[];
  policy: DrawPolicy;
  selectedAt: Date;
  drawNumber?: number;
}

export interface UnawardedPrize {
  prizeId: string;
  quantity: number;
}

export interface DrawOutcome {
  winners: Winner[];
  seed: string;
  algorithm: string;
  merkleRoot: string;
  poolSize: number;
  unawarded: UnawardedPrize[];
  /** True when the pool ran out before every prize unit was awarded. */
  insufficientParticipants: boolean;
}

function winnerId(seed: string, position: number): string {
  const hex = createHash('sha256').update(`${seed}:${position}`).digest('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
}

/**
 * Selects winners for every remaining prize unit, best tier first. The same
 * pool, prizes and server seed always give the same winners.
 */
export function runDraw(input: DrawInput): DrawOutcome {
  const pool = input.tickets
    .filter((ticket) => ticket.status === TicketStatus.ACTIVE)
    .sort((a, b) => (a.ticketNumber < b.ticketNumber ? -1 : a.ticketNumber > b.ticketNumber ? 1 : 0));
  const root = merkleRoot(pool.map((ticket) => ticket.ticketNumber));
  const seed = deriveDrawSeed({
    raffleId: input.raffleId,
    drawDate: input.drawDate,
    merkleRoot: root,
    serverSeed: input.serverSeed,
  });
  const random = new SeededRandom(seed);

  let remaining = [...pool];
  const winners: Winner[] = [];
  const unawarded: UnawardedPrize[] = [];

  for (const prize of sortByTier(input.prizes)) {
    const units = remainingQuantity(prize);
    let awarded = 0;

    while (awarded < units && remaining.length > 0) {
      const ticket = remaining[random.nextInt(remaining.length)];
      const position = winners.length + 1;
      winners.push({
        id: winnerId(seed, position),
        raffleId: input.raffleId,
        prizeId: prize.id,
        prize: {
          name: prize.name,
          description: prize.description,
          type: prize.type,
          value: prize.value,
          tier: prize.tier,
        },
        ticketId: ticket.id,
        ticketNumber: ticket.ticketNumber,
        userId: ticket.userId,
        drawNumber: input.drawNumber ?? 1,
        position,
        seed,
        algorithm: DRAW_ALGORITHM,
        notificationStatus: NotificationStatus.PENDING,
        claimStatus: ClaimStatus.PENDING_CLAIM,
        deliveryStatus: DeliveryStatus.NOT_STARTED,
        selectedAt: input.selectedAt,
      });
      awarded += 1;

      remaining = input.policy.oneWinPerUser
        ? remaining.filter((candidate) => candidate.userId !== ticket.userId)
        : remaining.filter((candidate) => candidate.id !== ticket.id);
    }

    if (awarded < units) {
      unawarded.push({ prizeId: prize.id, quantity: units - awarded });
    }
  }

  return {
    winners,
    seed,
    algorithm: DRAW_ALGORITHM,
    merkleRoot: root,
    poolSize: pool.length,
    unawarded,
    insufficientParticipants: unawarded.length > 0,
  };
}

/** Number of units awarded per prize id. */
export function awardedByPrize(winners: readonly Winner[]): Map<string, number> {
  const counts = new Map<string, number>();
  winners.forEach((winner) => counts.set(winner.prizeId, (counts.get(winner.prizeId) ?? 0) + 1));
  return counts;
}
