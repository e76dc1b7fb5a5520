import { EligibilityCriteria } from '../../domain/eligibility-criteria';
import { PrizeType } from '../../domain/prize';
import { RaffleStatus, RaffleType } from '../../domain/raffle.entity';

export interface PrizeResponseDto {
  id: string;
  name: string;
  description: string;
  tier: number;
  type: PrizeType;
  value: number;
  quantityAvailable: number;
  quantityAwarded: number;
}

export interface RaffleResponseDto {
  id: string;
  name: string;
  description?: string;
  type: RaffleType;
  status: RaffleStatus;
  registrationStart: Date;
  registrationEnd: Date;
  drawDate: Date;
  minTicketsToParticipate: number;
  maxTicketsPerUser?: number;
  maxParticipants?: number;
  prizes: PrizeResponseDto[];
  totalPrizeValue: number;
  eligibilityCriteria: EligibilityCriteria;
  currentParticipants: number;
  /** Null when the raffle has no participant cap. */
  remainingParticipantSlots: number | null;
  totalTicketsIssued: number;
  totalTicketsRevoked: number;
  winnersSelected: number;
  oneWinPerUser: boolean;
  serverSeedHash?: string;
  /** Only disclosed once the draw has completed. */
  serverSeed?: string;
  createdBy: string;
  updatedBy?: string;
  tags: string[];
  notes?: string;
  recreatedFrom?: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ReconciliationResponseDto {
  raffleId: string;
  ledgerNetTickets: number;
  ledgerParticipants: number;
  cachedNetTickets: number;
  cachedParticipants: number;
  consistent: boolean;
}
