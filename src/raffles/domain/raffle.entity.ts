import { randomUUID } from 'crypto';
import { ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';
import { EligibilityCriteria, OPEN_ELIGIBILITY } from './eligibility-criteria';
import { Prize, PrizeInput, createPrizePool } from './prize';
import { RaffleSchedule, createSchedule, scheduleForDuration } from './raffle-schedule';

export enum RaffleStatus {
  DRAFT = 'draft',
  ACTIVE = 'active',
  PAUSED = 'paused',
  DRAWING = 'drawing',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export enum RaffleType {
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  SPECIAL = 'special',
  INSTANT_WIN = 'instant_win',
  TIERED = 'tiered',
  PROGRESSIVE = 'progressive',
  SEASONAL = 'seasonal',
}

/** Used to build a schedule when the creator does not supply one. */
export const TYPICAL_DURATION_DAYS: Record<RaffleType, number> = {
  [RaffleType.DAILY]: 1,
  [RaffleType.WEEKLY]: 7,
  [RaffleType.MONTHLY]: 30,
  [RaffleType.SPECIAL]: 14,
  [RaffleType.INSTANT_WIN]: 1,
  [RaffleType.TIERED]: 7,
  [RaffleType.PROGRESSIVE]: 30,
  [RaffleType.SEASONAL]: 90,
};

export interface ParticipationRules {
  readonly minTicketsToParticipate: number;
  /** Unset means no per-user cap. */
  readonly maxTicketsPerUser?: number;
  /** Unset means no participant cap. */
  readonly maxParticipants?: number;
}

export interface RaffleStatistics {
  readonly currentParticipants: number;
  readonly totalTicketsIssued: number;
  readonly totalTicketsRevoked: number;
  readonly winnersSelected: number;
}

export interface DrawPolicy {
  /** A user wins at most one prize per raffle. */
  readonly oneWinPerUser: boolean;
}

/**
 * Server seed committed at activation. Only the hash is public until the
 * draw completes.
 */
export interface FairnessCommitment {
  readonly serverSeedHash: string;
  readonly serverSeed: string;
  readonly revealedAt?: Date;
}

export interface RaffleMetadata {
  readonly createdBy: string;
  readonly updatedBy?: string;
  readonly tags: readonly string[];
  readonly notes?: string;
  /** Raffle this one was recreated from after a cancellation. */
  readonly recreatedFrom?: string;
}

export interface Raffle {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly type: RaffleType;
  readonly status: RaffleStatus;
  readonly schedule: RaffleSchedule;
  readonly participationRules: ParticipationRules;
  readonly prizePool: readonly Prize[];
  readonly eligibilityCriteria: EligibilityCriteria;
  readonly statistics: RaffleStatistics;
  readonly drawPolicy: DrawPolicy;
  readonly fairness?: FairnessCommitment;
  readonly metadata: RaffleMetadata;
  /** Incremented on every persisted change; used for optimistic concurrency. */
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export const INITIAL_STATISTICS: RaffleStatistics = {
  currentParticipants: 0,
  totalTicketsIssued: 0,
  totalTicketsRevoked: 0,
  winnersSelected: 0,
};

export interface CreateRaffleInput {
  name: string;
  description?: string;
  type: RaffleType;
  schedule?: RaffleSchedule;
  participationRules?: Partial<ParticipationRules>;
  prizes?: PrizeInput[];
  eligibilityCriteria?: EligibilityCriteria;
  drawPolicy?: Partial<DrawPolicy>;
  createdBy: string;
  tags?: string[];
  notes?: string;
  recreatedFrom?: string;
}

export function createParticipationRules(
  input: Partial<ParticipationRules>,
): Result<ParticipationRules, ValidationError> {
  const issues: string[] = [];
  const min = input.minTicketsToParticipate ?? 1;
  const { maxTicketsPerUser, maxParticipants } = input;

  if (!Number.isInteger(min) || min < 1) {
    issues.push('minTicketsToParticipate must be a positive integer');
  }
  if (maxTicketsPerUser !== undefined) {
    if (!Number.isInteger(maxTicketsPerUser) || maxTicketsPerUser < 1) {
      issues.push('maxTicketsPerUser must be a positive integer');
    } else if (maxTicketsPerUser < min) {
      issues.push('maxTicketsPerUser cannot be lower than minTicketsToParticipate');
    }
  }
  if (maxParticipants !== undefined && (!Number.isInteger(maxParticipants) || maxParticipants < 1)) {
    issues.push('maxParticipants must be a positive integer');
  }

  return issues.length > 0
    ? err(ValidationError.fromIssues(issues))
    : ok({ minTicketsToParticipate: min, maxTicketsPerUser, maxParticipants });
}

/**
 * Validated constructor for a new Draft raffle.
 */
export function createRaffle(
  input: CreateRaffleInput,
  now: Date,
  id: string = randomUUID(),
): Result<Raffle, ValidationError> {
  const issues: string[] = [];

  if (!input.name || input.name.trim() === '') issues.push('Raffle name is required');
  if (!Object.values(RaffleType).includes(input.type)) issues.push(`Unknown raffle type ${input.type}`);
  if (!input.createdBy) issues.push('createdBy is required');
  if (issues.length > 0) {
    return err(ValidationError.fromIssues(issues));
  }

  const schedule = createSchedule(
    input.schedule ?? scheduleForDuration(now, TYPICAL_DURATION_DAYS[input.type]),
  );
  const rules = createParticipationRules(input.participationRules ?? {});
  const prizes = createPrizePool(input.prizes ?? []);

  for (const result of [schedule, rules, prizes]) {
    if (!result.ok) issues.push(...result.error.issues);
  }
  if (!schedule.ok || !rules.ok || !prizes.ok) {
    return err(ValidationError.fromIssues(issues));
  }

  return ok({
    id,
    name: input.name.trim(),
    description: input.description,
    type: input.type,
    status: RaffleStatus.DRAFT,
    schedule: schedule.value,
    participationRules: rules.value,
    prizePool: prizes.value,
    eligibilityCriteria: input.eligibilityCriteria ?? OPEN_ELIGIBILITY,
    statistics: INITIAL_STATISTICS,
    drawPolicy: { oneWinPerUser: input.drawPolicy?.oneWinPerUser ?? true },
    metadata: {
      createdBy: input.createdBy,
      tags: input.tags ?? [],
      notes: input.notes,
      recreatedFrom: input.recreatedFrom,
    },
    version: 0,
    createdAt: now,
    updatedAt: now,
  });
}

export function hasCapacity(raffle: Raffle): boolean {
  const { maxParticipants } = raffle.participationRules;
  return maxParticipants === undefined || raffle.statistics.currentParticipants < maxParticipants;
}

export function remainingParticipantSlots(raffle: Raffle): number | null {
  const { maxParticipants } = raffle.participationRules;
  return maxParticipants === undefined
    ? null
    : Math.max(0, maxParticipants - raffle.statistics.currentParticipants);
}
