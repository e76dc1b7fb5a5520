import { UserProfile, unmetCriterion } from './eligibility-criteria';
import { isWithinRegistrationWindow } from './raffle-schedule';
import { Raffle, RaffleStatus, hasCapacity } from './raffle.entity';

export enum IneligibilityCode {
  REGISTRATION_CLOSED = 'REGISTRATION_CLOSED',
  CRITERIA_NOT_MET = 'CRITERIA_NOT_MET',
  BELOW_MINIMUM = 'BELOW_MINIMUM',
  ABOVE_MAXIMUM = 'ABOVE_MAXIMUM',
  CAPACITY_REACHED = 'CAPACITY_REACHED',
  INVALID_REQUEST = 'INVALID_REQUEST',
}

export type EligibilityDecision =
  | { readonly eligible: true; readonly grantedCount: number }
  | { readonly eligible: false; readonly code: IneligibilityCode; readonly reason: string };

export interface EvaluationContext {
  /** Tickets the user already holds in this raffle (ledger balance). */
  currentUserTickets: number;
  now: Date;
}

function ineligible(code: IneligibilityCode, reason: string): EligibilityDecision {
  return { eligible: false, code, reason };
}

/**
 * Decide whether a participation attempt yields tickets. Checks run in a fixed
 * order and the first failure is reported. Pure: reads only its arguments.
 */
export function evaluateEligibility(
  raffle: Raffle,
  profile: UserProfile,
  ticketCountRequested: number,
  context: EvaluationContext,
): EligibilityDecision {
  if (!Number.isInteger(ticketCountRequested) || ticketCountRequested < 1) {
    return ineligible(IneligibilityCode.INVALID_REQUEST, 'Ticket count must be a positive integer');
  }

  if (raffle.status !== RaffleStatus.ACTIVE || !isWithinRegistrationWindow(raffle.schedule, context.now)) {
    return ineligible(IneligibilityCode.REGISTRATION_CLOSED, 'Registration is not open');
  }

  const unmet = unmetCriterion(raffle.eligibilityCriteria, profile);
  if (unmet) {
    return ineligible(IneligibilityCode.CRITERIA_NOT_MET, `User does not meet eligibility criteria: ${unmet}`);
  }

  const { minTicketsToParticipate, maxTicketsPerUser } = raffle.participationRules;
  const total = context.currentUserTickets + ticketCountRequested;
  if (total < minTicketsToParticipate) {
    return ineligible(
      IneligibilityCode.BELOW_MINIMUM,
      `At least ${minTicketsToParticipate} tickets are needed to participate`,
    );
  }
  if (maxTicketsPerUser !== undefined && total > maxTicketsPerUser) {
    return ineligible(
      IneligibilityCode.ABOVE_MAXIMUM,
      `Exceeds maximum of ${maxTicketsPerUser} tickets per user`,
    );
  }

  if (context.currentUserTickets === 0 && !hasCapacity(raffle)) {
    return ineligible(IneligibilityCode.CAPACITY_REACHED, 'Raffle has no participant slots left');
  }

  return { eligible: true, grantedCount: ticketCountRequested };
}
