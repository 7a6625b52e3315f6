import { Injectable } from '@nestjs/common';
import { parseTimeOfDay } from '../values/time-window';

/**
 * Whether `instant` (minutes since midnight) falls within opening hours,
 * both ends inclusive. Missing or unparsable hours mean closed.
 */
export function isOpenAt(
  hours: { openingTime: string; closingTime: string } | undefined,
  instant: number,
): boolean {
  if (!hours) {
    return false;
  }

  const opening = parseTimeOfDay(hours.openingTime);
  const closing = parseTimeOfDay(hours.closingTime);
  if (!opening.ok || !closing.ok) {
    return false;
  }

  return opening.value <= instant && instant <= closing.value;
}

@Injectable()
export class HoursFilterService {
  /**
   * Keeps the restaurants open at the requested start instant.
   * Only the start is checked, not the end of the reservation.
   */
  filter<T extends { id: string }>(
    restaurants: T[],
    hours: Array<{
      restaurantId: string;
      openingTime: string;
      closingTime: string;
    }>,
    instant: number,
  ): T[] {
    const hoursByRestaurant = new Map(hours.map((h) => [h.restaurantId, h]));

    return restaurants.filter((restaurant) =>
      isOpenAt(hoursByRestaurant.get(restaurant.id), instant),
    );
  }
}
