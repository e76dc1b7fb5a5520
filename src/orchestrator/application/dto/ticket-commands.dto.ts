import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { RevokedStatus, TicketStatus } from '../../../tickets/domain/ticket.entity';

export class TransferTicketDto {
  @IsString()
  @IsNotEmpty()
  toUserId!: string;

  @IsOptional()
  @IsString()
  reason?: string;
}

export class RevokeTicketDto {
  @IsIn([TicketStatus.CANCELLED, TicketStatus.EXPIRED])
  status!: RevokedStatus;

  @IsOptional()
  @IsString()
  reason?: string;
}
