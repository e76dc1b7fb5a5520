import { TransactionContext } from '../../database/transaction';
import { Raffle, RaffleStatus } from './raffle.entity';

export interface RaffleRepository {
  create(raffle: Raffle, tx?: TransactionContext): Promise<Raffle>;
  findById(id: string, tx?: TransactionContext): Promise<Raffle | null>;
  findAll(status?: RaffleStatus): Promise<Raffle[]>;
  /** Active raffles whose registration window contains `now`, earliest close first. */
  findOpenForRegistration(now: Date, tx?: TransactionContext): Promise<Raffle[]>;
  /** Active raffles past registration end, and raffles left in DRAWING. */
  findDueForDraw(now: Date): Promise<Raffle[]>;
  /**
   * Persist `raffle` if the stored copy still has `raffle.version`; the stored
   * version becomes `raffle.version + 1`. Throws PersistenceConflictError when
   * another writer got there first.
   */
  save(raffle: Raffle, tx?: TransactionContext): Promise<Raffle>;
}

export const RAFFLE_REPOSITORY = 'RaffleRepository';
