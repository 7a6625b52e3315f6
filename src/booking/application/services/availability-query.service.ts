import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { EaterRepository as IEaterRepository } from '../../ports/repositories/eater.repository.interface';
import { RestaurantRepository as IRestaurantRepository } from '../../ports/repositories/restaurant.repository.interface';
import { EndorsementRepository as IEndorsementRepository } from '../../ports/repositories/endorsement.repository.interface';
import { OperatingHoursRepository as IOperatingHoursRepository } from '../../ports/repositories/operating-hours.repository.interface';
import { TableRepository as ITableRepository } from '../../ports/repositories/table.repository.interface';
import { ReservationRepository as IReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import {
  EATER_REPOSITORY,
  RESTAURANT_REPOSITORY,
  ENDORSEMENT_REPOSITORY,
  OPERATING_HOURS_REPOSITORY,
  TABLE_REPOSITORY,
  RESERVATION_REPOSITORY,
} from '../../tokens';
import { RestrictionMatcherService } from '../../domain/services/restriction-matcher.service';
import { HoursFilterService } from '../../domain/services/hours-filter.service';
import { TableAllocatorService } from '../../domain/services/table-allocator.service';
import { TimeWindow } from '../../domain/values/time-window';
import { Restaurant } from '../../domain/entities/restaurant.entity';
import {
  BookingOutcome,
  failed,
  succeeded,
} from '../../domain/types/booking-outcome.type';
import {
  BookingFailureReason,
  bookingFailure,
} from '../../domain/types/booking-failure.type';
import {
  FindAvailableRestaurantsQuery,
  FindAvailableRestaurantsResponse,
  RestaurantSummary,
} from '../dto/find-available-restaurants.dto';
import { resolveSearchDate } from '../utils/reservation-date.util';
import { LoggerService } from '../../infrastructure/logging/logger.service';

@Injectable()
export class AvailabilityQueryService {
  constructor(
    @Inject(EATER_REPOSITORY)
    private readonly eaterRepository: IEaterRepository,
    @Inject(RESTAURANT_REPOSITORY)
    private readonly restaurantRepository: IRestaurantRepository,
    @Inject(ENDORSEMENT_REPOSITORY)
    private readonly endorsementRepository: IEndorsementRepository,
    @Inject(OPERATING_HOURS_REPOSITORY)
    private readonly operatingHoursRepository: IOperatingHoursRepository,
    @Inject(TABLE_REPOSITORY)
    private readonly tableRepository: ITableRepository,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: IReservationRepository,
    private readonly restrictionMatcherService: RestrictionMatcherService,
    private readonly hoursFilterService: HoursFilterService,
    private readonly tableAllocatorService: TableAllocatorService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Restaurants where the whole party could sit down at the requested time:
   * restrictions covered, open at the start, and a free table for the
   * full reservation window.
   */
  async findAvailableRestaurants(
    query: FindAvailableRestaurantsQuery,
  ): Promise<BookingOutcome<FindAvailableRestaurantsResponse>> {
    const eaterIds = [...new Set(query.eaterIds)];
    const eaters = await this.eaterRepository.findByIds(eaterIds);
    if (eaters.length !== eaterIds.length) {
      return failed(
        bookingFailure(
          BookingFailureReason.EATER_NOT_FOUND,
          'One or more eaters not found',
        ),
      );
    }

    const partySize = eaterIds.length + query.additionalGuests;
    const date = resolveSearchDate(query.date);
    const { reservationDurationMinutes } = this.configService.getOrThrow(
      'booking',
      { infer: true },
    );

    const window = TimeWindow.fromStart(query.time, reservationDurationMinutes);
    if (!window.ok) {
      return failed(
        bookingFailure(
          BookingFailureReason.INVALID_TIME_FORMAT,
          window.error.message,
        ),
      );
    }

    // Such a reservation could never be booked
    if (window.value.crossesMidnight()) {
      this.logger.debug('Requested window ends after midnight', {
        time: query.time,
        date,
      });
      return succeeded('Found 0 available restaurants', {
        count: 0,
        restaurants: [],
      });
    }

    const restrictionIds = this.restrictionMatcherService.aggregateRestrictions(
      await this.eaterRepository.findRestrictions(eaterIds),
    );
    const coverage =
      restrictionIds.length > 0
        ? await this.endorsementRepository.findCoverage(restrictionIds)
        : [];
    const requiredEndorsementIds =
      this.restrictionMatcherService.requiredEndorsements(
        restrictionIds,
        coverage,
      );

    const accepting =
      await this.restaurantRepository.findAcceptingReservations();
    const restaurantEndorsements =
      await this.restaurantRepository.findEndorsements(
        accepting.map((restaurant) => restaurant.id),
      );

    const covered = this.restrictionMatcherService.filter(
      accepting,
      restrictionIds,
      requiredEndorsementIds,
      restaurantEndorsements,
    );

    const hours = await this.operatingHoursRepository.findByRestaurantIds(
      covered.map((restaurant) => restaurant.id),
    );
    const open = this.hoursFilterService.filter(
      covered,
      hours,
      window.value.start,
    );

    const available: Restaurant[] = [];
    for (const restaurant of open) {
      const tables = await this.tableRepository.findByRestaurantId(
        restaurant.id,
      );
      if (!this.tableAllocatorService.hasTableForPartySize(tables, partySize)) {
        continue;
      }

      const reservations =
        await this.reservationRepository.findActiveByRestaurantAndDate(
          restaurant.id,
          date,
        );
      const allocation = this.tableAllocatorService.allocate(
        tables,
        reservations,
        partySize,
        window.value,
      );
      if (allocation.ok) {
        available.push(restaurant);
      }
    }

    const restaurants = await this.toSummaries(
      available,
      hours,
      restaurantEndorsements,
    );

    return succeeded(`Found ${restaurants.length} available restaurants`, {
      count: restaurants.length,
      restaurants,
    });
  }

  private async toSummaries(
    restaurants: Restaurant[],
    hours: Array<{ restaurantId: string; openingTime: string; closingTime: string }>,
    restaurantEndorsements: Array<{ restaurantId: string; endorsementId: string }>,
  ): Promise<RestaurantSummary[]> {
    const restaurantIds = new Set(restaurants.map((restaurant) => restaurant.id));
    const relevant = restaurantEndorsements.filter((mapping) =>
      restaurantIds.has(mapping.restaurantId),
    );

    const endorsements = await this.endorsementRepository.findByIds([
      ...new Set(relevant.map((mapping) => mapping.endorsementId)),
    ]);
    const endorsementNames = new Map(
      endorsements.map((endorsement) => [endorsement.id, endorsement.name]),
    );
    const hoursByRestaurant = new Map(hours.map((h) => [h.restaurantId, h]));

    return restaurants.map((restaurant) => {
      const restaurantHours = hoursByRestaurant.get(restaurant.id);

      return {
        id: restaurant.id,
        name: restaurant.name,
        averageRating: restaurant.averageRating,
        address: restaurant.address,
        phone: restaurant.phone,
        hours: {
          opening: restaurantHours ? restaurantHours.openingTime : null,
          closing: restaurantHours ? restaurantHours.closingTime : null,
        },
        endorsements: relevant
          .filter((mapping) => mapping.restaurantId === restaurant.id)
          .map((mapping) => ({
            id: mapping.endorsementId,
            name: endorsementNames.get(mapping.endorsementId) ?? mapping.endorsementId,
          }))
          .sort((a, b) => a.id.localeCompare(b.id)),
        hasParking: restaurant.hasParking,
        acceptsReservations: restaurant.acceptsReservations,
      };
    });
  }
}
