import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { LedgerAdjustmentSource, LedgerEntryKind, LedgerSource } from '../../domain/ledger-entry.entity';
import { TicketSource } from '../../domain/ticket.entity';

@Schema({ collection: 'ticket_ledger', timestamps: { createdAt: true, updatedAt: false } })
export class LedgerEntryDocument extends Document<string> {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  userId!: string;

  @Prop({ required: true, index: true })
  raffleId!: string;

  @Prop({ required: true })
  delta!: number;

  @Prop({ required: true })
  resultingBalance!: number;

  @Prop({ required: true, enum: Object.values(LedgerEntryKind) })
  kind!: LedgerEntryKind;

  @Prop({
    type: String,
    required: true,
    enum: [...Object.values(TicketSource), ...Object.values(LedgerAdjustmentSource)],
  })
  source!: LedgerSource;

  @Prop({ required: true })
  sourceReference!: string;

  @Prop()
  causationId?: string;

  @Prop({ type: [String], default: [] })
  ticketIds!: string[];

  createdAt!: Date;
}

export const LedgerEntrySchema = SchemaFactory.createForClass(LedgerEntryDocument);

LedgerEntrySchema.index({ source: 1, sourceReference: 1 }, { unique: true });
LedgerEntrySchema.index({ raffleId: 1, userId: 1, createdAt: 1 });
