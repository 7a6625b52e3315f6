import { Result, ok, err } from '../types/result.type';

export const MINUTES_PER_DAY = 24 * 60;

export interface InvalidTimeFormat {
  input: string;
  message: string;
}

// "H", "H:MM", "HH:MM", optionally followed by ":SS" (seconds are ignored)
const TIME_PATTERN = /^(\d{1,2})(?::(\d{1,2}))?(?::\d{1,2})?$/;

/**
 * Parses a clock time into minutes since midnight.
 */
export function parseTimeOfDay(
  input: string,
): Result<number, InvalidTimeFormat> {
  const trimmed = input.trim();
  if (trimmed === '') {
    return err({ input, message: 'Time string cannot be empty' });
  }

  const match = TIME_PATTERN.exec(trimmed);
  if (!match) {
    return err({
      input,
      message: `Invalid time format: ${input}. Use HH:MM format.`,
    });
  }

  const hours = Number(match[1]);
  const minutes = match[2] === undefined ? 0 : Number(match[2]);

  if (hours > 23) {
    return err({
      input,
      message: `Invalid hours value: ${hours}. Must be between 0-23.`,
    });
  }
  if (minutes > 59) {
    return err({
      input,
      message: `Invalid minutes value: ${minutes}. Must be between 0-59.`,
    });
  }

  return ok(hours * 60 + minutes);
}

/**
 * Renders minutes since midnight as HH:mm, wrapping past 24:00.
 */
export function formatTimeOfDay(totalMinutes: number): string {
  const wrapped =
    ((totalMinutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(wrapped / 60);
  const minutes = wrapped % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Half-open same-day interval [start, end) in minutes since midnight.
 * `end` may exceed MINUTES_PER_DAY for a window that runs past midnight.
 */
export class TimeWindow {
  private constructor(
    readonly start: number,
    readonly end: number,
  ) {}

  static fromStart(
    startTime: string,
    durationMinutes: number,
  ): Result<TimeWindow, InvalidTimeFormat> {
    const start = parseTimeOfDay(startTime);
    if (!start.ok) {
      return start;
    }
    return ok(new TimeWindow(start.value, start.value + durationMinutes));
  }

  /**
   * Reads a stored start/end pair. An end that is not after the start
   * belongs to the following day.
   */
  static parse(
    startTime: string,
    endTime: string,
  ): Result<TimeWindow, InvalidTimeFormat> {
    const start = parseTimeOfDay(startTime);
    if (!start.ok) {
      return start;
    }
    const end = parseTimeOfDay(endTime);
    if (!end.ok) {
      return end;
    }

    const endValue =
      end.value > start.value ? end.value : end.value + MINUTES_PER_DAY;
    return ok(new TimeWindow(start.value, endValue));
  }

  get startTime(): string {
    return formatTimeOfDay(this.start);
  }

  get endTime(): string {
    return formatTimeOfDay(this.end);
  }

  crossesMidnight(): boolean {
    return this.end > MINUTES_PER_DAY;
  }

  // Touching windows (this.end === other.start) do not overlap
  overlaps(other: TimeWindow): boolean {
    return this.start < other.end && this.end > other.start;
  }

  toString(): string {
    return `${this.startTime}-${this.endTime}`;
  }
}
