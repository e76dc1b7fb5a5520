import { randomUUID } from 'crypto';
import { ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';

export enum PrizeType {
  CASH = 'cash',
  CREDIT = 'credit',
  PHYSICAL = 'physical',
  DISCOUNT = 'discount',
  GIFT_CARD = 'gift_card',
  FUEL_CREDIT = 'fuel_credit',
}

export interface Prize {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** 1 is the best tier. */
  readonly tier: number;
  readonly type: PrizeType;
  readonly value: number;
  readonly quantityAvailable: number;
  readonly quantityAwarded: number;
}

export interface PrizeInput {
  id?: string;
  name: string;
  description?: string;
  tier: number;
  type: PrizeType;
  value: number;
  quantityAvailable: number;
  quantityAwarded?: number;
}

export function createPrize(input: PrizeInput): Result<Prize, ValidationError> {
  const issues: string[] = [];
  const quantityAwarded = input.quantityAwarded ?? 0;

  if (!input.name || input.name.trim() === '') issues.push('Prize name is required');
  if (!Number.isInteger(input.tier) || input.tier < 1) issues.push('Prize tier must be a positive integer');
  if (!Object.values(PrizeType).includes(input.type)) issues.push(`Unknown prize type ${input.type}`);
  if (!Number.isFinite(input.value) || input.value < 0) issues.push('Prize value must be non-negative');
  if (!Number.isInteger(input.quantityAvailable) || input.quantityAvailable < 1) {
    issues.push('Prize quantity must be a positive integer');
  }
  if (!Number.isInteger(quantityAwarded) || quantityAwarded < 0) {
    issues.push('Awarded quantity must be a non-negative integer');
  } else if (quantityAwarded > input.quantityAvailable) {
    issues.push('Awarded quantity cannot exceed available quantity');
  }

  if (issues.length > 0) {
    return err(ValidationError.fromIssues(issues));
  }

  return ok({
    id: input.id ?? randomUUID(),
    name: input.name.trim(),
    description: input.description?.trim() ?? '',
    tier: input.tier,
    type: input.type,
    value: input.value,
    quantityAvailable: input.quantityAvailable,
    quantityAwarded,
  });
}

/**
 * Build an ordered prize pool, best tier first. Ties keep input order.
 */
export function createPrizePool(inputs: PrizeInput[]): Result<Prize[], ValidationError> {
  const prizes: Prize[] = [];
  const issues: string[] = [];

  inputs.forEach((input, index) => {
    const result = createPrize(input);
    if (result.ok) {
      prizes.push(result.value);
    } else {
      issues.push(...result.error.issues.map((issue) => `prizes[${index}]: ${issue}`));
    }
  });

  const ids = new Set(prizes.map((p) => p.id));
  if (ids.size !== prizes.length) {
    issues.push('Prize ids must be unique');
  }

  if (issues.length > 0) {
    return err(ValidationError.fromIssues(issues));
  }
  return ok(sortByTier(prizes));
}

export function sortByTier(prizes: readonly Prize[]): Prize[] {
  return prizes
    .map((prize, index) => ({ prize, index }))
    .sort((a, b) => a.prize.tier - b.prize.tier || a.index - b.index)
    .map(({ prize }) => prize);
}

export function remainingQuantity(prize: Prize): number {
  return prize.quantityAvailable - prize.quantityAwarded;
}

export function totalPrizeValue(prizes: readonly Prize[]): number {
  return prizes.reduce((sum, p) => sum + p.value * p.quantityAvailable, 0);
}

export function awardPrize(prize: Prize, count: number): Prize {
  const quantityAwarded = prize.quantityAwarded + count;
  if (quantityAwarded > prize.quantityAvailable) {
    throw new Error(
      `Prize ${prize.id} would be over-awarded (${quantityAwarded}/${prize.quantityAvailable})`,
    );
  }
  return { ...prize, quantityAwarded };
}
