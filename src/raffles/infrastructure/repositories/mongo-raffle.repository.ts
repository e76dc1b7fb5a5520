import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { PersistenceConflictError } from '../../../common/errors';
import { sessionOf } from '../../../database/mongo-transaction.runner';
import { TransactionContext } from '../../../database/transaction';
import { Raffle, RaffleStatus } from '../../domain/raffle.entity';
import { RaffleRepository } from '../../domain/raffle.repository';
import { RaffleDocument } from '../schemas/raffle.schema';

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

@Injectable()
export class MongoRaffleRepository implements RaffleRepository {
  constructor(
    @InjectModel(RaffleDocument.name)
    private readonly raffleModel: Model<RaffleDocument>,
  ) {}

  async create(raffle: Raffle, tx?: TransactionContext): Promise<Raffle> {
    const [created] = await this.raffleModel.create(
      [{ _id: raffle.id, ...this.toFields(raffle), version: raffle.version }],
      { session: sessionOf(tx) },
    );
    return this.toEntity(created);
  }

  async findById(id: string, tx?: TransactionContext): Promise<Raffle | null> {
    const doc = await this.raffleModel.findById(id).session(sessionOf(tx) ?? null).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async findAll(status?: RaffleStatus): Promise<Raffle[]> {
    const filter: FilterQuery<RaffleDocument> = status ? { status } : {};
    const docs = await this.raffleModel.find(filter).sort({ 'schedule.drawDate': -1 }).exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async findOpenForRegistration(now: Date, tx?: TransactionContext): Promise<Raffle[]> {
    const docs = await this.raffleModel
      .find({
        status: RaffleStatus.ACTIVE,
        'schedule.registrationStart': { $lte: now },
        'schedule.registrationEnd': { $gt: now },
      })
      .sort({ 'schedule.registrationEnd': 1 })
      .session(sessionOf(tx) ?? null)
      .exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async findDueForDraw(now: Date): Promise<Raffle[]> {
    const docs = await this.raffleModel
      .find({
        $or: [
          { status: RaffleStatus.ACTIVE, 'schedule.registrationEnd': { $lte: now } },
          { status: RaffleStatus.DRAWING },
        ],
      })
      .sort({ 'schedule.drawDate': 1 })
      .exec();
    return docs.map(doc => this.toEntity(doc));
  }

  async save(raffle: Raffle, tx?: TransactionContext): Promise<Raffle> {
    const doc = await this.raffleModel
      .findOneAndUpdate(
        { _id: raffle.id, version: raffle.version },
        { $set: { ...this.toFields(raffle), version: raffle.version + 1 } },
        { new: true, session: sessionOf(tx) },
      )
      .exec();
    if (!doc) {
      throw new PersistenceConflictError(
        `Raffle ${raffle.id} was modified concurrently (expected version ${raffle.version})`,
      );
    }
    return this.toEntity(doc);
  }

  private toFields(raffle: Raffle) {
    return {
      name: raffle.name,
      description: raffle.description,
      type: raffle.type,
      status: raffle.status,
      schedule: { ...raffle.schedule },
      participationRules: { ...raffle.participationRules },
      prizePool: raffle.prizePool.map(prize => ({ ...prize })),
      eligibilityCriteria: { ...raffle.eligibilityCriteria },
      statistics: { ...raffle.statistics },
      drawPolicy: { ...raffle.drawPolicy },
      fairness: raffle.fairness ? { ...raffle.fairness } : undefined,
      metadata: { ...raffle.metadata, tags: [...raffle.metadata.tags] },
    };
  }

  private toEntity(doc: RaffleDocument): Raffle {
    const { participationRules, metadata, fairness } = doc;
    return {
      id: doc._id,
      name: doc.name,
      description: optional(doc.description),
      type: doc.type,
      status: doc.status,
      schedule: {
        registrationStart: doc.schedule.registrationStart,
        registrationEnd: doc.schedule.registrationEnd,
        drawDate: doc.schedule.drawDate,
      },
      participationRules: {
        minTicketsToParticipate: participationRules.minTicketsToParticipate,
        maxTicketsPerUser: optional(participationRules.maxTicketsPerUser),
        maxParticipants: optional(participationRules.maxParticipants),
      },
      prizePool: doc.prizePool.map(prize => ({
        id: prize.id,
        name: prize.name,
        description: prize.description,
        tier: prize.tier,
        type: prize.type,
        value: prize.value,
        quantityAvailable: prize.quantityAvailable,
        quantityAwarded: prize.quantityAwarded,
      })),
      eligibilityCriteria: doc.eligibilityCriteria ?? {},
      statistics: {
        currentParticipants: doc.statistics.currentParticipants,
        totalTicketsIssued: doc.statistics.totalTicketsIssued,
        totalTicketsRevoked: doc.statistics.totalTicketsRevoked,
        winnersSelected: doc.statistics.winnersSelected,
      },
      drawPolicy: { oneWinPerUser: doc.drawPolicy.oneWinPerUser },
      fairness:
        fairness?.serverSeedHash && fairness.serverSeed
          ? {
              serverSeedHash: fairness.serverSeedHash,
              serverSeed: fairness.serverSeed,
              revealedAt: optional(fairness.revealedAt),
            }
          : undefined,
      metadata: {
        createdBy: metadata.createdBy,
        updatedBy: optional(metadata.updatedBy),
        tags: [...metadata.tags],
        notes: optional(metadata.notes),
        recreatedFrom: optional(metadata.recreatedFrom),
      },
      version: doc.version,
      createdAt: doc.createdAt ?? new Date(),
      updatedAt: doc.updatedAt ?? new Date(),
    };
  }
}
