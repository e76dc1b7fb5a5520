import { TransactionContext } from '../../database/transaction';
import { LedgerEntry, LedgerSource, LedgerSummary } from './ledger-entry.entity';

export interface LedgerRepository {
  /** Throws DuplicateSourceError when `(source, sourceReference)` already exists. */
  append(entry: LedgerEntry, tx?: TransactionContext): Promise<LedgerEntry>;
  findBySource(source: LedgerSource, sourceReference: string, tx?: TransactionContext): Promise<LedgerEntry | null>;
  sumDeltas(userId: string, raffleId: string, tx?: TransactionContext): Promise<number>;
  /** Oldest first. */
  findByUserAndRaffle(userId: string, raffleId: string): Promise<LedgerEntry[]>;
  summarize(raffleId: string): Promise<LedgerSummary>;
}

export const LEDGER_REPOSITORY = 'LedgerRepository';
