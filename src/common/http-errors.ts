import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { RaffleEngineError, RaffleErrorCode } from './errors';

/**
 * Maps a domain error onto the HTTP exception returned by the admin API.
 * Errors that are not domain errors are returned unchanged.
 */
export function toHttpException(error: unknown): unknown {
  if (!(error instanceof RaffleEngineError)) {
    return error;
  }
  const body = { code: error.code, message: error.message };
  switch (error.code) {
    case RaffleErrorCode.NOT_FOUND:
      return new NotFoundException(body);
    case RaffleErrorCode.ILLEGAL_TRANSITION:
    case RaffleErrorCode.PERSISTENCE_CONFLICT:
    case RaffleErrorCode.ALREADY_DRAWN:
    case RaffleErrorCode.DUPLICATE_SOURCE:
      return new ConflictException(body);
    default:
      return new BadRequestException(body);
  }
}
