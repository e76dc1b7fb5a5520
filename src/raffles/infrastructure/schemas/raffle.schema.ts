import { Schema, Prop, SchemaFactory, raw } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { EligibilityCriteria } from '../../domain/eligibility-criteria';
import { PrizeType } from '../../domain/prize';
import { RaffleStatus, RaffleType } from '../../domain/raffle.entity';

@Schema({ _id: false })
export class PrizeSubdocument {
  @Prop({ required: true })
  id!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ default: '' })
  description!: string;

  @Prop({ required: true, min: 1 })
  tier!: number;

  @Prop({ required: true, enum: Object.values(PrizeType) })
  type!: PrizeType;

  @Prop({ required: true, min: 0 })
  value!: number;

  @Prop({ required: true, min: 1 })
  quantityAvailable!: number;

  @Prop({ required: true, min: 0, default: 0 })
  quantityAwarded!: number;
}

export const PrizeSubdocumentSchema = SchemaFactory.createForClass(PrizeSubdocument);

@Schema({ collection: 'raffles', timestamps: true })
export class RaffleDocument extends Document<string> {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  name!: string;

  @Prop()
  description?: string;

  @Prop({ required: true, enum: Object.values(RaffleType) })
  type!: RaffleType;

  @Prop({ required: true, enum: Object.values(RaffleStatus), default: RaffleStatus.DRAFT })
  status!: RaffleStatus;

  @Prop(raw({
    registrationStart: { type: Date, required: true },
    registrationEnd: { type: Date, required: true },
    drawDate: { type: Date, required: true },
  }))
  schedule!: { registrationStart: Date; registrationEnd: Date; drawDate: Date };

  @Prop(raw({
    minTicketsToParticipate: { type: Number, required: true, min: 1 },
    maxTicketsPerUser: { type: Number },
    maxParticipants: { type: Number },
  }))
  participationRules!: { minTicketsToParticipate: number; maxTicketsPerUser?: number | null; maxParticipants?: number | null };

  @Prop({ type: [PrizeSubdocumentSchema], default: [] })
  prizePool!: PrizeSubdocument[];

  @Prop({ type: Object, default: {} })
  eligibilityCriteria!: EligibilityCriteria;

  @Prop(raw({
    currentParticipants: { type: Number, required: true, default: 0 },
    totalTicketsIssued: { type: Number, required: true, default: 0 },
    totalTicketsRevoked: { type: Number, required: true, default: 0 },
    winnersSelected: { type: Number, required: true, default: 0 },
  }))
  statistics!: {
    currentParticipants: number;
    totalTicketsIssued: number;
    totalTicketsRevoked: number;
    winnersSelected: number;
  };

  @Prop(raw({ oneWinPerUser: { type: Boolean, required: true, default: true } }))
  drawPolicy!: { oneWinPerUser: boolean };

  @Prop(raw({
    serverSeedHash: { type: String },
    serverSeed: { type: String },
    revealedAt: { type: Date },
  }))
  fairness?: { serverSeedHash?: string; serverSeed?: string; revealedAt?: Date | null } | null;

  @Prop(raw({
    createdBy: { type: String, required: true },
    updatedBy: { type: String },
    tags: { type: [String], default: [] },
    notes: { type: String },
    recreatedFrom: { type: String },
  }))
  metadata!: { createdBy: string; updatedBy?: string | null; tags: string[]; notes?: string | null; recreatedFrom?: string | null };

  @Prop({ required: true, default: 0 })
  version!: number;

  createdAt!: Date;
  updatedAt!: Date;
}

export const RaffleSchema = SchemaFactory.createForClass(RaffleDocument);

RaffleSchema.index({ status: 1, 'schedule.registrationEnd': 1 });
RaffleSchema.index({ status: 1, 'schedule.registrationStart': 1 });
