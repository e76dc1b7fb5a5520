import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { TicketSource } from '../../../tickets/domain/ticket.entity';

/** Snapshot of the user's profile attached by the producing service. */
export class UserProfileDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(150)
  age?: number;

  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsBoolean()
  hasActiveSubscription?: boolean;

  @IsOptional()
  @IsBoolean()
  isVerified?: boolean;
}

export class TicketsGeneratedDto {
  @IsString()
  @IsNotEmpty()
  eventId!: string;

  @IsOptional()
  @IsString()
  causationId?: string;

  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  raffleId?: string;

  @IsInt()
  @Min(1)
  count!: number;

  @IsEnum(TicketSource)
  source!: TicketSource;

  @IsString()
  @IsNotEmpty()
  sourceReference!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => UserProfileDto)
  profile?: UserProfileDto;
}

export class AdEngagementQualifiedDto {
  @IsString()
  @IsNotEmpty()
  eventId!: string;

  @IsOptional()
  @IsString()
  causationId?: string;

  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsString()
  @IsNotEmpty()
  engagementId!: string;

  @IsInt()
  @Min(1)
  bonusCount!: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  raffleId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => UserProfileDto)
  profile?: UserProfileDto;
}
