import { Type } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsDate,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { PrizeType } from '../../domain/prize';
import { RaffleType } from '../../domain/raffle.entity';

export class ScheduleDto {
  @Type(() => Date)
  @IsDate()
  registrationStart!: Date;

  @Type(() => Date)
  @IsDate()
  registrationEnd!: Date;

  @Type(() => Date)
  @IsDate()
  drawDate!: Date;
}

export class ParticipationRulesDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  minTicketsToParticipate?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxTicketsPerUser?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxParticipants?: number;
}

export class PrizeDto {
  @IsOptional()
  @IsString()
  id?: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsInt()
  @Min(1)
  tier!: number;

  @IsEnum(PrizeType)
  type!: PrizeType;

  @IsNumber()
  @Min(0)
  value!: number;

  @IsInt()
  @Min(1)
  quantityAvailable!: number;
}

export class EligibilityCriteriaDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  minAge?: number;

  @IsOptional()
  @IsInt()
  @Max(150)
  maxAge?: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  allowedLocations?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  excludedLocations?: string[];

  @IsOptional()
  @IsBoolean()
  requiresSubscription?: boolean;

  @IsOptional()
  @IsBoolean()
  requiresVerification?: boolean;
}

export class CreateRaffleDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsEnum(RaffleType)
  type!: RaffleType;

  @IsOptional()
  @ValidateNested()
  @Type(() => ScheduleDto)
  schedule?: ScheduleDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => ParticipationRulesDto)
  participationRules?: ParticipationRulesDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PrizeDto)
  prizes?: PrizeDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => EligibilityCriteriaDto)
  eligibilityCriteria?: EligibilityCriteriaDto;

  @IsOptional()
  @IsBoolean()
  oneWinPerUser?: boolean;

  @IsString()
  @IsNotEmpty()
  createdBy!: string;

  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  tags?: string[];

  @IsOptional()
  @IsString()
  notes?: string;
}
