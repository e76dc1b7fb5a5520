import { Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { randomUUID } from 'crypto';
import { ClientSession, Connection } from 'mongoose';
import { TransactionContext, TransactionRunner } from './transaction';

export class MongoTransactionContext implements TransactionContext {
  readonly transactionId = randomUUID();

  constructor(readonly session: ClientSession) {}
}

/** Session of a context opened by {@link MongoTransactionRunner}, if any. */
export function sessionOf(tx?: TransactionContext): ClientSession | undefined {
  return tx instanceof MongoTransactionContext ? tx.session : undefined;
}

/**
 * Wraps `Connection.transaction`, which retries the callback on
 * TransientTransactionError. Requires a replica set or sharded cluster.
 */
@Injectable()
export class MongoTransactionRunner implements TransactionRunner {
  constructor(@InjectConnection() private readonly connection: Connection) {}

  run<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    return this.connection.transaction((session) => work(new MongoTransactionContext(session)));
  }
}
