import { ClaimStatus } from '../../../draws/domain/winner.entity';
import { PrizeType } from '../../domain/prize';

export interface WinnerResponseDto {
  id: string;
  position: number;
  userId: string;
  ticketNumber: string;
  prizeId: string;
  prizeName: string;
  prizeType: PrizeType;
  prizeValue: number;
  tier: number;
  claimStatus: ClaimStatus;
  selectedAt: Date;
}
