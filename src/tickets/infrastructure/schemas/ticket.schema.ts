import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { TicketSource, TicketStatus } from '../../domain/ticket.entity';

@Schema({ _id: false })
export class TicketTransferSubdocument {
  @Prop({ required: true })
  fromUserId!: string;

  @Prop({ required: true })
  toUserId!: string;

  @Prop({ required: true })
  transferredAt!: Date;

  @Prop()
  reason?: string;
}

export const TicketTransferSubdocumentSchema = SchemaFactory.createForClass(TicketTransferSubdocument);

@Schema({ collection: 'raffle_tickets', timestamps: true })
export class TicketDocument extends Document<string> {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ required: true, index: true })
  raffleId!: string;

  @Prop({ required: true, unique: true, maxlength: 50 })
  ticketNumber!: string;

  @Prop({ required: true, enum: Object.values(TicketStatus), default: TicketStatus.ACTIVE })
  status!: TicketStatus;

  @Prop({ required: true, enum: Object.values(TicketSource) })
  source!: TicketSource;

  @Prop({ required: true })
  sourceReference!: string;

  @Prop({ default: false })
  isWinner!: boolean;

  @Prop({ default: 0, min: 0, max: 3 })
  transferCount!: number;

  @Prop({ type: [TicketTransferSubdocumentSchema], default: [] })
  transfers!: TicketTransferSubdocument[];

  createdAt!: Date;
  updatedAt!: Date;
}

export const TicketSchema = SchemaFactory.createForClass(TicketDocument);

TicketSchema.index({ raffleId: 1, status: 1, ticketNumber: 1 });
TicketSchema.index({ raffleId: 1, userId: 1 });
