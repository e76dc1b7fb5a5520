import { DomainEvent, domainEvent } from '../../common/events/domain-event';
import { RaffleEvents } from '../../common/events/event-names';
import { PrizeType, totalPrizeValue } from './prize';
import { Raffle } from './raffle.entity';

export interface RaffleActivatedPayload {
  raffleId: string;
  name: string;
  registrationStart: Date;
  registrationEnd: Date;
  drawDate: Date;
  maxParticipants?: number;
  prizes: { prizeId: string; name: string; description: string; tier: number; type: PrizeType; value: number; quantity: number }[];
  totalPrizeValue: number;
  /** SHA-256 of the server seed revealed after the draw. */
  serverSeedHash?: string;
  activatedBy?: string;
}

export type RaffleActivatedEvent = DomainEvent<typeof RaffleEvents.RAFFLE_ACTIVATED, RaffleActivatedPayload>;

export function raffleActivatedEvent(raffle: Raffle, occurredAt: Date): RaffleActivatedEvent {
  return domainEvent(
    RaffleEvents.RAFFLE_ACTIVATED,
    {
      raffleId: raffle.id,
      name: raffle.name,
      registrationStart: raffle.schedule.registrationStart,
      registrationEnd: raffle.schedule.registrationEnd,
      drawDate: raffle.schedule.drawDate,
      maxParticipants: raffle.participationRules.maxParticipants,
      prizes: raffle.prizePool.map((p) => ({
        prizeId: p.id,
        name: p.name,
        description: p.description,
        tier: p.tier,
        type: p.type,
        value: p.value,
        quantity: p.quantityAvailable,
      })),
      totalPrizeValue: totalPrizeValue(raffle.prizePool),
      serverSeedHash: raffle.fairness?.serverSeedHash,
      activatedBy: raffle.metadata.updatedBy,
    },
    occurredAt,
  );
}
