import { TransactionContext } from '../../database/transaction';
import { Winner } from './winner.entity';

export interface WinnerRepository {
  createMany(winners: readonly Winner[], tx?: TransactionContext): Promise<Winner[]>;
  /** Ordered by position. */
  findByRaffle(raffleId: string, tx?: TransactionContext): Promise<Winner[]>;
  countByRaffle(raffleId: string, tx?: TransactionContext): Promise<number>;
  findByUser(userId: string): Promise<Winner[]>;
}

export const WINNER_REPOSITORY = 'WinnerRepository';
