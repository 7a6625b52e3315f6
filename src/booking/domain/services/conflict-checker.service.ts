import { Injectable } from '@nestjs/common';
import { TimeWindow } from '../values/time-window';

type PersonBooking = {
  id: string;
  restaurantId: string;
  startTime: string;
  endTime: string;
  isActive: boolean;
};

export type ConflictCheck<T extends PersonBooking = PersonBooking> =
  | { conflict: false }
  | { conflict: true; reservation: T; message: string };

@Injectable()
export class ConflictCheckerService {
  /**
   * Looks for an active reservation of one person that overlaps the window.
   *
   * @param reservations - the person's reservations on the requested date,
   *   as host or attendee
   * @param restaurantNames - names used in the explanation, by restaurant id
   */
  check<T extends PersonBooking>(
    reservations: T[],
    window: TimeWindow,
    restaurantNames: ReadonlyMap<string, string>,
  ): ConflictCheck<T> {
    const seen = new Set<string>();

    for (const reservation of reservations) {
      if (!reservation.isActive || seen.has(reservation.id)) {
        continue;
      }
      seen.add(reservation.id);

      const booked = TimeWindow.parse(
        reservation.startTime,
        reservation.endTime,
      );
      if (!booked.ok) {
        continue;
      }

      if (booked.value.overlaps(window)) {
        const restaurantName =
          restaurantNames.get(reservation.restaurantId) ??
          `Restaurant ID ${reservation.restaurantId}`;

        return {
          conflict: true,
          reservation,
          message: `You already have a reservation at ${restaurantName} from ${reservation.startTime} to ${reservation.endTime} on this date.`,
        };
      }
    }

    return { conflict: false };
  }
}
