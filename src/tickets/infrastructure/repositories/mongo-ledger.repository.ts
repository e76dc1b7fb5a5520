import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, mongo } from 'mongoose';
import { DuplicateSourceError } from '../../../common/errors';
import { sessionOf } from '../../../database/mongo-transaction.runner';
import { TransactionContext } from '../../../database/transaction';
import { LedgerEntry, LedgerSource, LedgerSummary } from '../../domain/ledger-entry.entity';
import { LedgerRepository } from '../../domain/ledger.repository';
import { LedgerEntryDocument } from '../schemas/ledger-entry.schema';

const DUPLICATE_KEY = 11000;

@Injectable()
export class MongoLedgerRepository implements LedgerRepository {
  constructor(
    @InjectModel(LedgerEntryDocument.name)
    private readonly ledgerModel: Model<LedgerEntryDocument>,
  ) {}

  async append(entry: LedgerEntry, tx?: TransactionContext): Promise<LedgerEntry> {
    const { id, ...fields } = entry;
    try {
      const [created] = await this.ledgerModel.create(
        [{ _id: id, ...fields, ticketIds: [...fields.ticketIds] }],
        { session: sessionOf(tx) },
      );
      return this.toEntity(created);
    } catch (error) {
      if (error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY) {
        throw new DuplicateSourceError(entry.source, entry.sourceReference);
      }
      throw error;
    }
  }

  async findBySource(
    source: LedgerSource,
    sourceReference: string,
    tx?: TransactionContext,
  ): Promise<LedgerEntry | null> {
    const doc = await this.ledgerModel
      .findOne({ source, sourceReference })
      .session(sessionOf(tx) ?? null)
      .exec();
    return doc ? this.toEntity(doc) : null;
  }

  async sumDeltas(userId: string, raffleId: string, tx?: TransactionContext): Promise<number> {
    const [row] = await this.ledgerModel
      .aggregate<{ total: number }>([
        { $match: { userId, raffleId } },
        { $group: { _id: null, total: { $sum: '$delta' } } },
      ])
      .session(sessionOf(tx) ?? null)
      .exec();
    return row?.total ?? 0;
  }

  async findByUserAndRaffle(userId: string, raffleId: string): Promise<LedgerEntry[]> {
    const docs = await this.ledgerModel.find({ userId, raffleId }).sort({ createdAt: 1 }).exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async summarize(raffleId: string): Promise<LedgerSummary> {
    const [row] = await this.ledgerModel
      .aggregate<LedgerSummary>([
        { $match: { raffleId } },
        { $group: { _id: '$userId', balance: { $sum: '$delta' } } },
        {
          $group: {
            _id: null,
            netTickets: { $sum: '$balance' },
            participants: { $sum: { $cond: [{ $gt: ['$balance', 0] }, 1, 0] } },
          },
        },
        { $project: { _id: 0, netTickets: 1, participants: 1 } },
      ])
      .exec();
    return row ?? { netTickets: 0, participants: 0 };
  }

  private toEntity(doc: LedgerEntryDocument): LedgerEntry {
    return {
      id: doc._id,
      userId: doc.userId,
      raffleId: doc.raffleId,
      delta: doc.delta,
      resultingBalance: doc.resultingBalance,
      kind: doc.kind,
      source: doc.source,
      sourceReference: doc.sourceReference,
      causationId: doc.causationId ?? undefined,
      ticketIds: [...doc.ticketIds],
      createdAt: doc.createdAt ?? new Date(),
    };
  }
}
