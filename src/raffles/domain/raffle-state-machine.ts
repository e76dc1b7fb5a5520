import { IllegalTransitionError, LimitExceededError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';
import { Prize, awardPrize } from './prize';
import { RaffleActivatedEvent, raffleActivatedEvent } from './raffle-events';
import { createSchedule, isRegistrationClosed, isWithinRegistrationWindow } from './raffle-schedule';
import { FairnessCommitment, ParticipationRules, Raffle, RaffleStatus, hasCapacity } from './raffle.entity';

/**
 * Legal lifecycle moves. COMPLETED and CANCELLED are terminal.
 */
export const TRANSITIONS: Readonly<Record<RaffleStatus, readonly RaffleStatus[]>> = {
  [RaffleStatus.DRAFT]: [RaffleStatus.ACTIVE],
  [RaffleStatus.ACTIVE]: [RaffleStatus.PAUSED, RaffleStatus.DRAWING, RaffleStatus.COMPLETED, RaffleStatus.CANCELLED],
  [RaffleStatus.PAUSED]: [RaffleStatus.ACTIVE, RaffleStatus.COMPLETED, RaffleStatus.CANCELLED],
  [RaffleStatus.DRAWING]: [RaffleStatus.COMPLETED, RaffleStatus.CANCELLED],
  [RaffleStatus.COMPLETED]: [],
  [RaffleStatus.CANCELLED]: [],
};

export const DEFAULT_DRAW_BUFFER_MS = 5 * 60 * 1000;

export function canTransition(from: RaffleStatus, to: RaffleStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function transition(
  raffle: Raffle,
  to: RaffleStatus,
  action: string,
  now: Date,
  by?: string,
): Result<Raffle, IllegalTransitionError> {
  if (!canTransition(raffle.status, to)) {
    return err(new IllegalTransitionError(raffle.status, action));
  }
  return ok({
    ...raffle,
    status: to,
    metadata: by ? { ...raffle.metadata, updatedBy: by } : raffle.metadata,
    updatedAt: now,
  });
}

export function isRegistrationOpen(raffle: Raffle, now: Date): boolean {
  return (
    raffle.status === RaffleStatus.ACTIVE &&
    isWithinRegistrationWindow(raffle.schedule, now) &&
    hasCapacity(raffle)
  );
}

export function isEligibleForDraw(
  raffle: Raffle,
  now: Date,
  bufferMs: number = DEFAULT_DRAW_BUFFER_MS,
): boolean {
  return (
    raffle.status === RaffleStatus.ACTIVE &&
    isRegistrationClosed(raffle.schedule, now) &&
    now.getTime() >= raffle.schedule.drawDate.getTime() - bufferMs &&
    raffle.statistics.currentParticipants > 0
  );
}

export function activate(
  raffle: Raffle,
  options: { now: Date; activatedBy?: string; fairness: FairnessCommitment },
): Result<{ raffle: Raffle; event: RaffleActivatedEvent }, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.DRAFT) {
    return err(new IllegalTransitionError(raffle.status, 'activate'));
  }

  const problems: string[] = [];
  const schedule = createSchedule(raffle.schedule);
  if (!schedule.ok) {
    problems.push(...schedule.error.issues);
  } else if (isRegistrationClosed(raffle.schedule, options.now)) {
    problems.push('Registration end is already in the past');
  }
  if (raffle.prizePool.length === 0) {
    problems.push('Raffle must have at least one prize');
  }
  const { currentParticipants, totalTicketsIssued } = raffle.statistics;
  if (currentParticipants > 0 || totalTicketsIssued > 0) {
    problems.push('Raffle already has ticket activity');
  }
  if (problems.length > 0) {
    return err(new IllegalTransitionError(raffle.status, 'activate', problems.join('; ')));
  }

  const moved = transition(raffle, RaffleStatus.ACTIVE, 'activate', options.now, options.activatedBy);
  if (!moved.ok) {
    return moved;
  }
  const activated: Raffle = { ...moved.value, fairness: options.fairness };
  return ok({ raffle: activated, event: raffleActivatedEvent(activated, options.now) });
}

export function pause(raffle: Raffle, now: Date, by?: string): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.ACTIVE) {
    return err(new IllegalTransitionError(raffle.status, 'pause'));
  }
  return transition(raffle, RaffleStatus.PAUSED, 'pause', now, by);
}

export function resume(raffle: Raffle, now: Date, by?: string): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.PAUSED) {
    return err(new IllegalTransitionError(raffle.status, 'resume'));
  }
  return transition(raffle, RaffleStatus.ACTIVE, 'resume', now, by);
}

/**
 * Closes the ticket pool. Only an Active raffle that passes
 * {@link isEligibleForDraw} may start drawing.
 */
export function startDrawing(
  raffle: Raffle,
  now: Date,
  bufferMs: number = DEFAULT_DRAW_BUFFER_MS,
): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.ACTIVE) {
    return err(new IllegalTransitionError(raffle.status, 'start drawing'));
  }
  if (!isEligibleForDraw(raffle, now, bufferMs)) {
    return err(new IllegalTransitionError(raffle.status, 'start drawing', 'raffle is not eligible for draw'));
  }
  return transition(raffle, RaffleStatus.DRAWING, 'start drawing', now);
}

/**
 * Drawing → Completed, recording how many units of each prize were awarded.
 */
export function completeDraw(
  raffle: Raffle,
  options: { now: Date; awardedByPrize: ReadonlyMap<string, number> },
): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.DRAWING) {
    return err(new IllegalTransitionError(raffle.status, 'complete draw'));
  }
  const moved = transition(raffle, RaffleStatus.COMPLETED, 'complete draw', options.now);
  if (!moved.ok) {
    return moved;
  }

  let winnersSelected = 0;
  const prizePool: Prize[] = raffle.prizePool.map((prize) => {
    const awarded = options.awardedByPrize.get(prize.id) ?? 0;
    winnersSelected += awarded;
    return awarded > 0 ? awardPrize(prize, awarded) : prize;
  });

  return ok({
    ...moved.value,
    prizePool,
    statistics: {
      ...raffle.statistics,
      winnersSelected: raffle.statistics.winnersSelected + winnersSelected,
    },
    fairness: raffle.fairness ? { ...raffle.fairness, revealedAt: options.now } : undefined,
  });
}

/** Ends the raffle without a draw. */
export function complete(raffle: Raffle, now: Date, by?: string): Result<Raffle, IllegalTransitionError> {
  return transition(raffle, RaffleStatus.COMPLETED, 'complete', now, by);
}

export function cancel(
  raffle: Raffle,
  options: { now: Date; reason?: string; cancelledBy?: string },
): Result<Raffle, IllegalTransitionError> {
  const moved = transition(raffle, RaffleStatus.CANCELLED, 'cancel', options.now, options.cancelledBy);
  if (!moved.ok || !options.reason) {
    return moved;
  }
  const notes = `${raffle.metadata.notes ?? ''}\nCancelled: ${options.reason}`.trim();
  return ok({ ...moved.value, metadata: { ...moved.value.metadata, notes } });
}

/**
 * Account for tickets issued to (or transferred to) a user. A user without
 * tickets counts as a new participant and needs a free slot.
 */
export function addParticipant(
  raffle: Raffle,
  options: { newParticipant: boolean; ticketsIssued: number; now: Date },
): Result<Raffle, IllegalTransitionError | LimitExceededError> {
  if (raffle.status !== RaffleStatus.ACTIVE) {
    return err(new IllegalTransitionError(raffle.status, 'add participant'));
  }
  if (options.newParticipant && !hasCapacity(raffle)) {
    return err(
      new LimitExceededError(
        `Raffle ${raffle.id} reached its limit of ${raffle.participationRules.maxParticipants} participants`,
      ),
    );
  }
  const { statistics } = raffle;
  return ok({
    ...raffle,
    statistics: {
      ...statistics,
      currentParticipants: statistics.currentParticipants + (options.newParticipant ? 1 : 0),
      totalTicketsIssued: statistics.totalTicketsIssued + options.ticketsIssued,
    },
    updatedAt: options.now,
  });
}

/**
 * Account for tickets leaving a user through revocation or transfer.
 */
export function removeParticipant(
  raffle: Raffle,
  options: { participantLeft: boolean; ticketsRevoked: number; now: Date },
): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.ACTIVE && raffle.status !== RaffleStatus.PAUSED) {
    return err(new IllegalTransitionError(raffle.status, 'remove participant'));
  }
  const { statistics } = raffle;
  return ok({
    ...raffle,
    statistics: {
      ...statistics,
      currentParticipants: Math.max(0, statistics.currentParticipants - (options.participantLeft ? 1 : 0)),
      totalTicketsRevoked: statistics.totalTicketsRevoked + options.ticketsRevoked,
    },
    updatedAt: options.now,
  });
}

export function updatePrizePool(
  raffle: Raffle,
  prizePool: readonly Prize[],
  now: Date,
): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.DRAFT) {
    return err(new IllegalTransitionError(raffle.status, 'update prize pool'));
  }
  return ok({ ...raffle, prizePool, updatedAt: now });
}

export function updateParticipationRules(
  raffle: Raffle,
  participationRules: ParticipationRules,
  now: Date,
): Result<Raffle, IllegalTransitionError> {
  if (raffle.status !== RaffleStatus.DRAFT) {
    return err(new IllegalTransitionError(raffle.status, 'update participation rules'));
  }
  return ok({ ...raffle, participationRules, updatedAt: now });
}
