import { Inject, Injectable } from '@nestjs/common';
import { EaterRepository as IEaterRepository } from '../../ports/repositories/eater.repository.interface';
import { RestaurantRepository as IRestaurantRepository } from '../../ports/repositories/restaurant.repository.interface';
import { ReservationRepository as IReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import {
  EATER_REPOSITORY,
  RESTAURANT_REPOSITORY,
  RESERVATION_REPOSITORY,
} from '../../tokens';
import { Eater } from '../../domain/entities/eater.entity';
import { ReservationResponse } from '../dto/reservation.dto';
import { toReservationResponse } from '../mappers/reservation.mapper';

@Injectable()
export class ReservationQueryService {
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: IReservationRepository,
    @Inject(EATER_REPOSITORY)
    private readonly eaterRepository: IEaterRepository,
    @Inject(RESTAURANT_REPOSITORY)
    private readonly restaurantRepository: IRestaurantRepository,
  ) {}

  /**
   * Reservation details, or null when it does not exist or is inactive
   * and inactive reservations were not asked for.
   */
  async getReservation(
    id: string,
    includeInactive: boolean = false,
  ): Promise<ReservationResponse | null> {
    const reservation = await this.reservationRepository.findById(id);
    if (!reservation || (!reservation.isActive && !includeInactive)) {
      return null;
    }

    const attendeeIds = await this.reservationRepository.findAttendeeIds(id);
    const eaters = await this.eaterRepository.findByIds([
      ...new Set([reservation.hostId, ...attendeeIds]),
    ]);
    const eatersById = new Map(eaters.map((eater) => [eater.id, eater]));
    const restaurant = await this.restaurantRepository.findById(
      reservation.restaurantId,
    );

    // Host first, then the other attendees
    const orderedIds = [
      reservation.hostId,
      ...attendeeIds.filter((attendeeId) => attendeeId !== reservation.hostId),
    ];
    const attendees = orderedIds
      .map((attendeeId) => eatersById.get(attendeeId))
      .filter((eater): eater is Eater => eater !== undefined);

    return toReservationResponse(
      reservation,
      eatersById.get(reservation.hostId) ?? null,
      restaurant,
      attendees,
    );
  }
}
