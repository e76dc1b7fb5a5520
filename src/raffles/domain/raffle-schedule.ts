import { ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';

export interface RaffleSchedule {
  readonly registrationStart: Date;
  readonly registrationEnd: Date;
  readonly drawDate: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function isValidDate(value: Date): boolean {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Validated constructor. Registration must end after it starts and the draw
 * cannot precede the end of registration.
 */
export function createSchedule(input: {
  registrationStart: Date;
  registrationEnd: Date;
  drawDate: Date;
}): Result<RaffleSchedule, ValidationError> {
  const issues: string[] = [];
  const { registrationStart, registrationEnd, drawDate } = input;

  if (!isValidDate(registrationStart)) issues.push('registrationStart is not a valid date');
  if (!isValidDate(registrationEnd)) issues.push('registrationEnd is not a valid date');
  if (!isValidDate(drawDate)) issues.push('drawDate is not a valid date');
  if (issues.length > 0) {
    return err(ValidationError.fromIssues(issues));
  }

  if (registrationEnd.getTime() <= registrationStart.getTime()) {
    issues.push('Registration end must be after registration start');
  }
  if (drawDate.getTime() < registrationEnd.getTime()) {
    issues.push('Draw date cannot be before registration end');
  }

  return issues.length > 0
    ? err(ValidationError.fromIssues(issues))
    : ok({ registrationStart, registrationEnd, drawDate });
}

/**
 * Default schedule for a raffle running `durationDays`: registration closes one
 * hour before the draw.
 */
export function scheduleForDuration(start: Date, durationDays: number): RaffleSchedule {
  const drawDate = new Date(start.getTime() + durationDays * DAY_MS);
  return {
    registrationStart: start,
    registrationEnd: new Date(drawDate.getTime() - 60 * 60 * 1000),
    drawDate,
  };
}

export function isWithinRegistrationWindow(schedule: RaffleSchedule, now: Date): boolean {
  const t = now.getTime();
  return t >= schedule.registrationStart.getTime() && t < schedule.registrationEnd.getTime();
}

export function isRegistrationClosed(schedule: RaffleSchedule, now: Date): boolean {
  return now.getTime() >= schedule.registrationEnd.getTime();
}

export function isDrawDatePassed(schedule: RaffleSchedule, now: Date): boolean {
  return now.getTime() >= schedule.drawDate.getTime();
}
