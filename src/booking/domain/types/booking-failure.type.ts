export enum FailureKind {
  NOT_FOUND = 'not_found',
  INVALID_INPUT = 'invalid_input',
  BUSINESS_RULE_VIOLATION = 'business_rule_violation',
  PERSISTENCE_ERROR = 'persistence_error',
}

export enum BookingFailureReason {
  RESTAURANT_NOT_FOUND = 'restaurant_not_found',
  RESTAURANT_NOT_ACCEPTING_RESERVATIONS = 'restaurant_not_accepting_reservations',
  HOST_NOT_FOUND = 'host_not_found',
  ATTENDEE_NOT_FOUND = 'attendee_not_found',
  EATER_NOT_FOUND = 'eater_not_found',
  RESERVATION_NOT_FOUND = 'reservation_not_found',
  INVALID_TIME_FORMAT = 'invalid_time_format',
  INVALID_DATE_FORMAT = 'invalid_date_format',
  OUTSIDE_OPERATING_HOURS = 'outside_operating_hours',
  CROSSES_MIDNIGHT = 'crosses_midnight',
  PARTY_CONFLICT = 'party_conflict',
  NO_TABLE_SIZE = 'no_table_size',
  NO_CAPACITY = 'no_capacity',
  LOCK_TIMEOUT = 'lock_timeout',
  PERSISTENCE_ERROR = 'persistence_error',
}

const KIND_BY_REASON: Record<BookingFailureReason, FailureKind> = {
  [BookingFailureReason.RESTAURANT_NOT_FOUND]: FailureKind.NOT_FOUND,
  [BookingFailureReason.HOST_NOT_FOUND]: FailureKind.NOT_FOUND,
  [BookingFailureReason.ATTENDEE_NOT_FOUND]: FailureKind.NOT_FOUND,
  [BookingFailureReason.EATER_NOT_FOUND]: FailureKind.NOT_FOUND,
  [BookingFailureReason.RESERVATION_NOT_FOUND]: FailureKind.NOT_FOUND,
  [BookingFailureReason.INVALID_TIME_FORMAT]: FailureKind.INVALID_INPUT,
  [BookingFailureReason.INVALID_DATE_FORMAT]: FailureKind.INVALID_INPUT,
  [BookingFailureReason.RESTAURANT_NOT_ACCEPTING_RESERVATIONS]:
    FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.OUTSIDE_OPERATING_HOURS]:
    FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.CROSSES_MIDNIGHT]: FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.PARTY_CONFLICT]: FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.NO_TABLE_SIZE]: FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.NO_CAPACITY]: FailureKind.BUSINESS_RULE_VIOLATION,
  [BookingFailureReason.LOCK_TIMEOUT]: FailureKind.PERSISTENCE_ERROR,
  [BookingFailureReason.PERSISTENCE_ERROR]: FailureKind.PERSISTENCE_ERROR,
};

export interface BookingFailure {
  kind: FailureKind;
  reason: BookingFailureReason;
  message: string;
}

export function bookingFailure(
  reason: BookingFailureReason,
  message: string,
): BookingFailure {
  return { kind: KIND_BY_REASON[reason], reason, message };
}
