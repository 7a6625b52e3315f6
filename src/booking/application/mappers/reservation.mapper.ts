import { Eater } from '../../domain/entities/eater.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
import { Restaurant } from '../../domain/entities/restaurant.entity';
import { ReservationResponse } from '../dto/reservation.dto';

export function toReservationResponse(
  reservation: Reservation,
  host: Eater | null,
  restaurant: Restaurant | null,
  attendees: Eater[],
): ReservationResponse {
  return {
    id: reservation.id,
    hostId: reservation.hostId,
    hostName: host ? host.name : null,
    restaurant: {
      id: reservation.restaurantId,
      name: restaurant ? restaurant.name : null,
    },
    tableId: reservation.tableId,
    date: reservation.date,
    startTime: reservation.startTime,
    endTime: reservation.endTime,
    partySize: reservation.partySize,
    isActive: reservation.isActive,
    attendees: attendees.map((attendee) => ({
      id: attendee.id,
      name: attendee.name,
      email: attendee.email,
    })),
    createdAt: reservation.createdAt.toISOString(),
    updatedAt: reservation.updatedAt.toISOString(),
  };
}
