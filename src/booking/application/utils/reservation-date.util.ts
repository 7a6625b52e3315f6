import { format, isValid, parse } from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Normalizes a YYYY-MM-DD calendar date, or returns null when the input is
 * not one (including impossible dates such as 2030-02-30).
 */
export function parseReservationDate(input: string): string | null {
  const trimmed = input.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = parse(trimmed, DATE_FORMAT, new Date());
  return isValid(parsed) ? format(parsed, DATE_FORMAT) : null;
}

/**
 * Date used by availability searches: a missing or malformed date means today.
 */
export function resolveSearchDate(
  input: string | undefined,
  today: Date = new Date(),
): string {
  const parsed = input ? parseReservationDate(input) : null;
  return parsed ?? format(today, DATE_FORMAT);
}
