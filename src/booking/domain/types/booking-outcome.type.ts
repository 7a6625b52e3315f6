import { BookingFailure } from './booking-failure.type';

/**
 * Result of an engine operation as seen by its caller:
 * either a success message with data, or the rule that rejected the request.
 */
export type BookingOutcome<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; failure: BookingFailure };

export const succeeded = <T>(message: string, data: T): BookingOutcome<T> => ({
  success: true,
  message,
  data,
});

export const failed = <T>(failure: BookingFailure): BookingOutcome<T> => ({
  success: false,
  message: failure.message,
  failure,
});
