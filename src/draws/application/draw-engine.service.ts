import { Inject, Injectable, Logger } from '@nestjs/common';
import { AlreadyDrawnError, InsufficientParticipantsError, ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';
import { TransactionContext } from '../../database/transaction';
import { Raffle, RaffleStatus } from '../../raffles/domain/raffle.entity';
import { Ticket } from '../../tickets/domain/ticket.entity';
import { DrawOutcome, runDraw } from '../domain/draw-engine';
import { verifyServerSeed } from '../domain/fairness-seed';
import { Winner } from '../domain/winner.entity';
import { WINNER_REPOSITORY, WinnerRepository } from '../domain/winner.repository';

@Injectable()
export class DrawEngineService {
  private readonly logger = new Logger(DrawEngineService.name);

  constructor(
    @Inject(WINNER_REPOSITORY)
    private readonly winnerRepository: WinnerRepository,
  ) {}

  /**
   * A raffle that is completed or already has winners on record cannot be
   * drawn again.
   */
  async ensureNotDrawn(raffle: Raffle, tx?: TransactionContext): Promise<Result<void, AlreadyDrawnError>> {
    if (raffle.status === RaffleStatus.COMPLETED) {
      return err(new AlreadyDrawnError(raffle.id));
    }
    const existing = await this.winnerRepository.countByRaffle(raffle.id, tx);
    return existing > 0 ? err(new AlreadyDrawnError(raffle.id)) : ok(undefined);
  }

  draw(raffle: Raffle, pool: readonly Ticket[], now: Date): Result<DrawOutcome, ValidationError> {
    const { fairness } = raffle;
    if (!fairness) {
      return err(new ValidationError(`Raffle ${raffle.id} has no fairness commitment`));
    }
    if (!verifyServerSeed(fairness.serverSeed, fairness.serverSeedHash)) {
      return err(new ValidationError(`Server seed of raffle ${raffle.id} does not match its commitment`));
    }

    const outcome = runDraw({
      raffleId: raffle.id,
      drawDate: raffle.schedule.drawDate,
      serverSeed: fairness.serverSeed,
      tickets: pool,
      prizes: raffle.prizePool,
      policy: raffle.drawPolicy,
      selectedAt: now,
    });

    this.logger.log(
      `Drew ${outcome.winners.length} winner(s) for raffle ${raffle.id} from ${outcome.poolSize} ticket(s)`,
    );
    const shortfall = this.shortfallOf(raffle.id, outcome);
    if (shortfall) {
      this.logger.warn(shortfall.message);
    }
    return ok(outcome);
  }

  /**
   * A short pool is a partial success: the draw stands and the missing units
   * are reported alongside it.
   */
  shortfallOf(raffleId: string, outcome: DrawOutcome): InsufficientParticipantsError | null {
    if (!outcome.insufficientParticipants) {
      return null;
    }
    const missing = outcome.unawarded.reduce((sum, u) => sum + u.quantity, 0);
    return new InsufficientParticipantsError(
      `Raffle ${raffleId} left ${missing} prize unit(s) unawarded from a pool of ${outcome.poolSize} ticket(s)`,
    );
  }

  recordWinners(winners: readonly Winner[], tx?: TransactionContext): Promise<Winner[]> {
    return this.winnerRepository.createMany(winners, tx);
  }

  findWinners(raffleId: string): Promise<Winner[]> {
    return this.winnerRepository.findByRaffle(raffleId);
  }

  findWinningsOf(userId: string): Promise<Winner[]> {
    return this.winnerRepository.findByUser(userId);
  }
}
