import { Injectable, Inject } from '@nestjs/common';
import { CLOCK, Clock } from './common/clock';
import { isRegistrationOpen } from './raffles/domain/raffle-state-machine';
import { RaffleStatus } from './raffles/domain/raffle.entity';
import { RAFFLE_REPOSITORY, RaffleRepository } from './raffles/domain/raffle.repository';

@Injectable()
export class AppService {
  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: RaffleRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  getStatus() {
    return { message: 'Raffle engine is running' };
  }

  async getStats() {
    const raffles = await this.raffleRepository.findAll();
    const now = this.clock.now();

    const byStatus = Object.values(RaffleStatus).reduce<Record<string, number>>((acc, status) => {
      acc[status] = raffles.filter((r) => r.status === status).length;
      return acc;
    }, {});

    const live = raffles.filter((r) => r.status === RaffleStatus.ACTIVE || r.status === RaffleStatus.PAUSED);
    const nextDraw = live
      .map((r) => r.schedule.drawDate)
      .sort((a, b) => a.getTime() - b.getTime())[0];

    return {
      totalRaffles: raffles.length,
      byStatus,
      openForRegistration: raffles.filter((r) => isRegistrationOpen(r, now)).length,
      activeParticipants: live.reduce((sum, r) => sum + r.statistics.currentParticipants, 0),
      nextDrawDate: nextDraw ? nextDraw.toISOString() : null,
    };
  }
}
