import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { ParticipationRulesDto, PrizeDto } from './create-raffle.dto';

export class UpdatePrizePoolDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PrizeDto)
  prizes!: PrizeDto[];

  @IsOptional()
  @IsString()
  updatedBy?: string;
}

export class UpdateParticipationRulesDto extends ParticipationRulesDto {
  @IsOptional()
  @IsString()
  updatedBy?: string;
}

export class RaffleActionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  performedBy?: string;

  @IsOptional()
  @IsString()
  reason?: string;
}
