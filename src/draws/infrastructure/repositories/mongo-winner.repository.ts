import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { sessionOf } from '../../../database/mongo-transaction.runner';
import { TransactionContext } from '../../../database/transaction';
import { Winner } from '../../domain/winner.entity';
import { WinnerRepository } from '../../domain/winner.repository';
import { WinnerDocument } from '../schemas/winner.schema';

@Injectable()
export class MongoWinnerRepository implements WinnerRepository {
  constructor(
    @InjectModel(WinnerDocument.name)
    private readonly winnerModel: Model<WinnerDocument>,
  ) {}

  async createMany(winners: readonly Winner[], tx?: TransactionContext): Promise<Winner[]> {
    if (winners.length === 0) {
      return [];
    }
    await this.winnerModel.insertMany(
      winners.map(({ id, ...winner }) => ({ _id: id, ...winner, prize: { ...winner.prize } })),
      { session: sessionOf(tx) },
    );
    return [...winners];
  }

  async findByRaffle(raffleId: string, tx?: TransactionContext): Promise<Winner[]> {
    const docs = await this.winnerModel
      .find({ raffleId })
      .sort({ drawNumber: 1, position: 1 })
      .session(sessionOf(tx) ?? null)
      .exec();
    return docs.map(doc => this.toEntity(doc));
  }

  countByRaffle(raffleId: string, tx?: TransactionContext): Promise<number> {
    return this.winnerModel.countDocuments({ raffleId }).session(sessionOf(tx) ?? null).exec();
  }

  async findByUser(userId: string): Promise<Winner[]> {
    const docs = await this.winnerModel.find({ userId }).sort({ selectedAt: -1 }).exec();
    return docs.map(doc => this.toEntity(doc));
  }

  private toEntity(doc: WinnerDocument): Winner {
    return {
      id: doc._id,
      raffleId: doc.raffleId,
      prizeId: doc.prizeId,
      prize: {
        name: doc.prize.name,
        description: doc.prize.description,
        type: doc.prize.type,
        value: doc.prize.value,
        tier: doc.prize.tier,
      },
      ticketId: doc.ticketId,
      ticketNumber: doc.ticketNumber,
      userId: doc.userId,
      drawNumber: doc.drawNumber,
      position: doc.position,
      seed: doc.seed,
      algorithm: doc.algorithm,
      notificationStatus: doc.notificationStatus,
      claimStatus: doc.claimStatus,
      deliveryStatus: doc.deliveryStatus,
      selectedAt: doc.selectedAt,
    };
  }
}
