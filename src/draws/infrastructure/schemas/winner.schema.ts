import { Schema, Prop, SchemaFactory, raw } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { PrizeType } from '../../../raffles/domain/prize';
import { ClaimStatus, DeliveryStatus, NotificationStatus } from '../../domain/winner.entity';

@Schema({ collection: 'raffle_winners', timestamps: true })
export class WinnerDocument extends Document<string> {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, index: true })
  raffleId!: string;

  @Prop({ required: true })
  prizeId!: string;

  @Prop(raw({
    name: { type: String, required: true },
    description: { type: String, default: '' },
    type: { type: String, enum: Object.values(PrizeType), required: true },
    value: { type: Number, required: true },
    tier: { type: Number, required: true },
  }))
  prize!: { name: string; description: string; type: PrizeType; value: number; tier: number };

  @Prop({ required: true, unique: true })
  ticketId!: string;

  @Prop({ required: true })
  ticketNumber!: string;

  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ required: true, default: 1 })
  drawNumber!: number;

  @Prop({ required: true })
  position!: number;

  @Prop({ required: true })
  seed!: string;

  @Prop({ required: true })
  algorithm!: string;

  @Prop({ enum: Object.values(NotificationStatus), default: NotificationStatus.PENDING })
  notificationStatus!: NotificationStatus;

  @Prop({ enum: Object.values(ClaimStatus), default: ClaimStatus.PENDING_CLAIM })
  claimStatus!: ClaimStatus;

  @Prop({ enum: Object.values(DeliveryStatus), default: DeliveryStatus.NOT_STARTED })
  deliveryStatus!: DeliveryStatus;

  @Prop({ required: true })
  selectedAt!: Date;
}

export const WinnerSchema = SchemaFactory.createForClass(WinnerDocument);

WinnerSchema.index({ raffleId: 1, drawNumber: 1, position: 1 }, { unique: true });
