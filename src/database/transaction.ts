/**
 * Opaque handle of an open transaction. Repositories receive it and enlist
 * their reads and writes; the concrete type belongs to the storage adapter.
 */
export interface TransactionContext {
  readonly transactionId: string;
}

export interface TransactionRunner {
  /**
   * Run `work` atomically: every write made through the context commits
   * together or none does. Errors thrown by `work` roll back and propagate.
   */
  run<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T>;
}

export const TRANSACTION_RUNNER = 'TRANSACTION_RUNNER';
