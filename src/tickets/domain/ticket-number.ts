import { ValidationError } from '../../common/errors';
import { Result, err, ok } from '../../common/result';

const TICKET_NUMBER_PATTERN = /^[A-Z0-9-]+$/;
export const TICKET_NUMBER_MAX_LENGTH = 50;
const SEQUENCE_WIDTH = 6;
const RAFFLE_CODE_LENGTH = 8;

export function parseTicketNumber(value: string): Result<string, ValidationError> {
  const normalized = value.trim().toUpperCase();
  if (normalized === '') {
    return err(new ValidationError('Ticket number cannot be empty'));
  }
  if (normalized.length > TICKET_NUMBER_MAX_LENGTH) {
    return err(new ValidationError(`Ticket number cannot exceed ${TICKET_NUMBER_MAX_LENGTH} characters`));
  }
  if (!TICKET_NUMBER_PATTERN.test(normalized)) {
    return err(new ValidationError('Ticket number may only contain letters, digits and dashes'));
  }
  return ok(normalized);
}

/** First eight alphanumeric characters of the raffle id, upper-cased. */
export function raffleCode(raffleId: string): string {
  const code = raffleId.replace(/[^a-zA-Z0-9]/g, '').slice(0, RAFFLE_CODE_LENGTH).toUpperCase();
  return code === '' ? 'RAFFLE' : code;
}

export function generateTicketNumber(raffleId: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new Error(`Ticket sequence must be a positive integer, got ${sequence}`);
  }
  return `${raffleCode(raffleId)}-${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}

export function formatTicketNumber(ticketNumber: string): string {
  return `#${ticketNumber}`;
}
