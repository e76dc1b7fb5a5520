import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { NotFoundError } from '../../../common/errors';
import { sessionOf } from '../../../database/mongo-transaction.runner';
import { TransactionContext } from '../../../database/transaction';
import { Ticket, TicketStatus } from '../../domain/ticket.entity';
import { TicketRepository } from '../../domain/ticket.repository';
import { TicketDocument } from '../schemas/ticket.schema';

@Injectable()
export class MongoTicketRepository implements TicketRepository {
  constructor(
    @InjectModel(TicketDocument.name)
    private readonly ticketModel: Model<TicketDocument>,
  ) {}

  async createMany(tickets: readonly Ticket[], tx?: TransactionContext): Promise<Ticket[]> {
    if (tickets.length === 0) {
      return [];
    }
    await this.ticketModel.insertMany(
      tickets.map(({ id, ...ticket }) => ({ _id: id, ...ticket, transfers: [...ticket.transfers] })),
      { session: sessionOf(tx) },
    );
    return [...tickets];
  }

  async findById(id: string, tx?: TransactionContext): Promise<Ticket | null> {
    const doc = await this.ticketModel.findById(id).session(sessionOf(tx) ?? null).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async findByIds(ids: readonly string[], tx?: TransactionContext): Promise<Ticket[]> {
    const docs = await this.ticketModel
      .find({ _id: { $in: [...ids] } })
      .sort({ ticketNumber: 1 })
      .session(sessionOf(tx) ?? null)
      .exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async findByNumber(ticketNumber: string): Promise<Ticket | null> {
    const doc = await this.ticketModel.findOne({ ticketNumber }).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async findByRaffle(raffleId: string, status?: TicketStatus, tx?: TransactionContext): Promise<Ticket[]> {
    const filter: FilterQuery<TicketDocument> = status ? { raffleId, status } : { raffleId };
    const docs = await this.ticketModel
      .find(filter)
      .sort({ ticketNumber: 1 })
      .session(sessionOf(tx) ?? null)
      .exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async findByUserAndRaffle(userId: string, raffleId: string): Promise<Ticket[]> {
    const docs = await this.ticketModel.find({ userId, raffleId }).sort({ ticketNumber: 1 }).exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async update(ticket: Ticket, tx?: TransactionContext): Promise<Ticket> {
    const doc = await this.ticketModel
      .findByIdAndUpdate(
        ticket.id,
        {
          userId: ticket.userId,
          status: ticket.status,
          isWinner: ticket.isWinner,
          transferCount: ticket.transferCount,
          transfers: [...ticket.transfers],
        },
        { new: true, session: sessionOf(tx) },
      )
      .exec();
    if (!doc) {
      throw new NotFoundError(`Ticket ${ticket.id} not found`);
    }
    return this.toEntity(doc);
  }

  async markWinners(ticketIds: readonly string[], now: Date, tx?: TransactionContext): Promise<number> {
    const result = await this.ticketModel
      .updateMany({ _id: { $in: [...ticketIds] } }, { isWinner: true, updatedAt: now }, { session: sessionOf(tx) })
      .exec();
    return result.modifiedCount;
  }

  private toEntity(doc: TicketDocument): Ticket {
    return {
      id: doc._id,
      userId: doc.userId,
      raffleId: doc.raffleId,
      ticketNumber: doc.ticketNumber,
      status: doc.status,
      source: doc.source,
      sourceReference: doc.sourceReference,
      isWinner: doc.isWinner,
      transferCount: doc.transferCount,
      transfers: doc.transfers.map(t => ({
        fromUserId: t.fromUserId,
        toUserId: t.toUserId,
        transferredAt: t.transferredAt,
        reason: t.reason ?? undefined,
      })),
      createdAt: doc.createdAt ?? new Date(),
      updatedAt: doc.updatedAt ?? new Date(),
    };
  }
}
