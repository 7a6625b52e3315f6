import { Reservation } from '../../domain/entities/reservation.entity';

export interface ReservationRepository {
  findById(id: string): Promise<Reservation | null>;
  findActiveByRestaurantAndDate(
    restaurantId: string,
    date: string,
  ): Promise<Reservation[]>;
  /** Active reservations on the date where the eater is host or attendee. */
  findActiveByEaterAndDate(eaterId: string, date: string): Promise<Reservation[]>;
  findAttendeeIds(reservationId: string): Promise<string[]>;
  /**
   * Persists the reservation and its attendee rows in one transaction.
   * Rejects when the id is already taken.
   */
  create(reservation: Reservation, attendeeIds: string[]): Promise<Reservation>;
  update(reservation: Reservation): Promise<Reservation>;
  /**
   * Removes the reservation and its attendee rows in one transaction.
   * Resolves to false when no reservation row was removed.
   */
  delete(id: string): Promise<boolean>;
}
