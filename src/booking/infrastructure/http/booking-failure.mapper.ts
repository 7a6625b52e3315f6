import {
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  BookingFailure,
  BookingFailureReason,
  FailureKind,
} from '../../domain/types/booking-failure.type';

const UNPROCESSABLE_REASONS: ReadonlySet<BookingFailureReason> = new Set([
  BookingFailureReason.OUTSIDE_OPERATING_HOURS,
  BookingFailureReason.RESTAURANT_NOT_ACCEPTING_RESERVATIONS,
  BookingFailureReason.CROSSES_MIDNIGHT,
]);

const CONFLICT_REASONS: ReadonlySet<BookingFailureReason> = new Set([
  BookingFailureReason.PARTY_CONFLICT,
  BookingFailureReason.NO_TABLE_SIZE,
  BookingFailureReason.NO_CAPACITY,
  BookingFailureReason.LOCK_TIMEOUT,
]);

/**
 * Maps an engine rejection onto the HTTP exception the API answers with.
 * The body is always `{ error: <reason>, detail: <message> }`.
 */
export function toHttpException(failure: BookingFailure): HttpException {
  const body = { error: failure.reason, detail: failure.message };

  if (failure.kind === FailureKind.NOT_FOUND) {
    return new NotFoundException(body);
  }
  if (failure.kind === FailureKind.INVALID_INPUT) {
    return new BadRequestException(body);
  }
  if (UNPROCESSABLE_REASONS.has(failure.reason)) {
    return new UnprocessableEntityException(body);
  }
  if (CONFLICT_REASONS.has(failure.reason)) {
    return new ConflictException(body);
  }
  return new InternalServerErrorException(body);
}
