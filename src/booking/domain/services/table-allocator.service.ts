import { Injectable } from '@nestjs/common';
import { TimeWindow } from '../values/time-window';
import { Result, ok, err } from '../types/result.type';
import {
  BookingFailure,
  BookingFailureReason,
  bookingFailure,
} from '../types/booking-failure.type';

type AllocatableTable = { id: string; capacity: number };

type TableBooking = {
  tableId: string | null;
  startTime: string;
  endTime: string;
  isActive: boolean;
};

export function fitsParty(table: AllocatableTable, partySize: number): boolean {
  return table.capacity >= partySize;
}

@Injectable()
export class TableAllocatorService {
  /**
   * Capacity existence check: some table seats the whole party.
   */
  hasTableForPartySize(tables: AllocatableTable[], partySize: number): boolean {
    return tables.some((table) => fitsParty(table, partySize));
  }

  /**
   * Best-fit allocation: the smallest table that seats the party and has no
   * overlapping active reservation on the day.
   *
   * @param reservations - the restaurant's reservations for the requested date
   */
  allocate<T extends AllocatableTable>(
    tables: T[],
    reservations: TableBooking[],
    partySize: number,
    window: TimeWindow,
  ): Result<T, BookingFailure> {
    const candidates = tables
      .filter((table) => fitsParty(table, partySize))
      .sort((a, b) => a.capacity - b.capacity || a.id.localeCompare(b.id));

    if (candidates.length === 0) {
      return err(
        bookingFailure(
          BookingFailureReason.NO_TABLE_SIZE,
          'No tables available for that party size',
        ),
      );
    }

    const reservedTableIds = this.findReservedTableIds(reservations, window);
    const available = candidates.find(
      (table) => !reservedTableIds.has(table.id),
    );

    if (!available) {
      return err(
        bookingFailure(
          BookingFailureReason.NO_CAPACITY,
          'No tables available for that party size at the requested time',
        ),
      );
    }

    return ok(available);
  }

  private findReservedTableIds(
    reservations: TableBooking[],
    window: TimeWindow,
  ): Set<string> {
    const reserved = new Set<string>();

    for (const reservation of reservations) {
      if (!reservation.isActive || reservation.tableId === null) {
        continue;
      }

      const booked = TimeWindow.parse(
        reservation.startTime,
        reservation.endTime,
      );
      // Stored times are written by the engine; skip any that do not parse
      if (!booked.ok) {
        continue;
      }

      if (booked.value.overlaps(window)) {
        reserved.add(reservation.tableId);
      }
    }

    return reserved;
  }
}
