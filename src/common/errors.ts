export enum RaffleErrorCode {
  VALIDATION = 'VALIDATION_ERROR',
  ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
  LIMIT_EXCEEDED = 'LIMIT_EXCEEDED',
  DUPLICATE_SOURCE = 'DUPLICATE_SOURCE',
  INSUFFICIENT_PARTICIPANTS = 'INSUFFICIENT_PARTICIPANTS',
  PERSISTENCE_CONFLICT = 'PERSISTENCE_CONFLICT',
  NOT_ACCEPTING_ENTRIES = 'RAFFLE_NOT_ACCEPTING_ENTRIES',
  NOT_ELIGIBLE = 'NOT_ELIGIBLE',
  ALREADY_DRAWN = 'ALREADY_DRAWN',
  NOT_FOUND = 'NOT_FOUND',
}

export abstract class RaffleEngineError extends Error {
  abstract readonly code: RaffleErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input shape or range; rejected before any state change. */
export class ValidationError extends RaffleEngineError {
  readonly code = RaffleErrorCode.VALIDATION;

  constructor(
    message: string,
    readonly issues: string[] = [message],
  ) {
    super(message);
  }

  static fromIssues(issues: string[]): ValidationError {
    return new ValidationError(issues.join('; '), issues);
  }
}

export class IllegalTransitionError extends RaffleEngineError {
  readonly code = RaffleErrorCode.ILLEGAL_TRANSITION;

  constructor(
    readonly from: string,
    readonly action: string,
    detail?: string,
  ) {
    super(`Cannot ${action} raffle in status ${from}${detail ? `: ${detail}` : ''}`);
  }
}

export class LimitExceededError extends RaffleEngineError {
  readonly code = RaffleErrorCode.LIMIT_EXCEEDED;
}

export class DuplicateSourceError extends RaffleEngineError {
  readonly code = RaffleErrorCode.DUPLICATE_SOURCE;

  constructor(
    readonly source: string,
    readonly sourceReference: string,
  ) {
    super(`Source ${source}:${sourceReference} was already processed`);
  }
}

export class InsufficientParticipantsError extends RaffleEngineError {
  readonly code = RaffleErrorCode.INSUFFICIENT_PARTICIPANTS;
}

/** Transient; the same logical operation is safe to retry. */
export class PersistenceConflictError extends RaffleEngineError {
  readonly code = RaffleErrorCode.PERSISTENCE_CONFLICT;
}

export class RaffleNotAcceptingEntriesError extends RaffleEngineError {
  readonly code = RaffleErrorCode.NOT_ACCEPTING_ENTRIES;
}

export class NotEligibleError extends RaffleEngineError {
  readonly code = RaffleErrorCode.NOT_ELIGIBLE;
}

export class AlreadyDrawnError extends RaffleEngineError {
  readonly code = RaffleErrorCode.ALREADY_DRAWN;

  constructor(readonly raffleId: string) {
    super(`Raffle ${raffleId} has already been drawn`);
  }
}

export class NotFoundError extends RaffleEngineError {
  readonly code = RaffleErrorCode.NOT_FOUND;
}
