import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { EaterRepository as IEaterRepository } from '../../ports/repositories/eater.repository.interface';
import { RestaurantRepository as IRestaurantRepository } from '../../ports/repositories/restaurant.repository.interface';
import { OperatingHoursRepository as IOperatingHoursRepository } from '../../ports/repositories/operating-hours.repository.interface';
import { TableRepository as ITableRepository } from '../../ports/repositories/table.repository.interface';
import { ReservationRepository as IReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import {
  EATER_REPOSITORY,
  RESTAURANT_REPOSITORY,
  OPERATING_HOURS_REPOSITORY,
  TABLE_REPOSITORY,
  RESERVATION_REPOSITORY,
} from '../../tokens';
import { ConflictCheckerService } from '../../domain/services/conflict-checker.service';
import { TableAllocatorService } from '../../domain/services/table-allocator.service';
import { isOpenAt } from '../../domain/services/hours-filter.service';
import { TimeWindow, parseTimeOfDay } from '../../domain/values/time-window';
import { Eater } from '../../domain/entities/eater.entity';
import { Restaurant } from '../../domain/entities/restaurant.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
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
  LockManagerService,
  LockTimeoutError,
  AcquiredLock,
} from '../../infrastructure/locking/lock-manager.service';
import {
  CancellationType,
  MetricsService,
} from '../../infrastructure/metrics/metrics.service';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { CreateReservationRequest } from '../dto/create-reservation.dto';
import { ReservationResponse } from '../dto/reservation.dto';
import { toReservationResponse } from '../mappers/reservation.mapper';
import { parseReservationDate } from '../utils/reservation-date.util';

interface ValidatedReservation {
  restaurant: Restaurant;
  host: Eater;
  // Distinct attendees other than the host, in request order
  attendees: Eater[];
  partySize: number;
  date: string;
  window: TimeWindow;
}

const restaurantLockKey = (restaurantId: string, date: string) =>
  `restaurant|${restaurantId}|${date}`;

const eaterLockKey = (eaterId: string, date: string) =>
  `eater|${eaterId}|${date}`;

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

@Injectable()
export class ReservationCommandService {
  constructor(
    @Inject(EATER_REPOSITORY)
    private readonly eaterRepository: IEaterRepository,
    @Inject(RESTAURANT_REPOSITORY)
    private readonly restaurantRepository: IRestaurantRepository,
    @Inject(OPERATING_HOURS_REPOSITORY)
    private readonly operatingHoursRepository: IOperatingHoursRepository,
    @Inject(TABLE_REPOSITORY)
    private readonly tableRepository: ITableRepository,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: IReservationRepository,
    private readonly conflictCheckerService: ConflictCheckerService,
    private readonly tableAllocatorService: TableAllocatorService,
    private readonly lockManagerService: LockManagerService,
    private readonly metricsService: MetricsService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly logger: LoggerService,
  ) {}

  async createReservation(
    request: CreateReservationRequest,
  ): Promise<BookingOutcome<ReservationResponse>> {
    const outcome = await this.tryCreateReservation(request);

    if (!outcome.success) {
      this.metricsService.recordRejection(outcome.failure.reason);
      this.logger.warn('Reservation rejected', {
        restaurantId: request.restaurantId,
        hostId: request.hostId,
        reason: outcome.failure.reason,
      });
    }

    return outcome;
  }

  async deleteReservation(
    id: string,
    softDelete: boolean = false,
  ): Promise<BookingOutcome<{ deletionType: CancellationType }>> {
    const reservation = await this.reservationRepository.findById(id);
    if (!reservation) {
      return failed(
        bookingFailure(
          BookingFailureReason.RESERVATION_NOT_FOUND,
          'Reservation not found',
        ),
      );
    }

    try {
      if (softDelete) {
        reservation.isActive = false;
        reservation.updatedAt = new Date();
        await this.reservationRepository.update(reservation);
        this.metricsService.recordReservationCancelled('soft');
        return succeeded('Reservation marked as deleted', {
          deletionType: 'soft',
        });
      }

      // A concurrent hard delete may have removed it since the lookup
      const removed = await this.reservationRepository.delete(id);
      if (!removed) {
        return failed(
          bookingFailure(
            BookingFailureReason.RESERVATION_NOT_FOUND,
            'Reservation not found',
          ),
        );
      }
      this.metricsService.recordReservationCancelled('hard');
      return succeeded('Reservation permanently deleted', {
        deletionType: 'hard',
      });
    } catch (error) {
      this.logger.error(
        'Failed to delete reservation',
        error instanceof Error ? error : undefined,
        { reservationId: id, softDelete },
      );
      return failed(
        bookingFailure(
          BookingFailureReason.PERSISTENCE_ERROR,
          `Error deleting reservation: ${errorMessage(error)}`,
        ),
      );
    }
  }

  private async tryCreateReservation(
    request: CreateReservationRequest,
  ): Promise<BookingOutcome<ReservationResponse>> {
    const validation = await this.validate(request);
    if (!validation.success) {
      return validation;
    }

    const validated = validation.data;
    const { lockTimeoutMs } = this.configService.getOrThrow('booking', {
      infer: true,
    });
    const lockKeys = [
      restaurantLockKey(validated.restaurant.id, validated.date),
      eaterLockKey(validated.host.id, validated.date),
      ...validated.attendees.map((attendee) =>
        eaterLockKey(attendee.id, validated.date),
      ),
    ];

    let lock: AcquiredLock;
    try {
      lock = await this.lockManagerService.acquireAll(lockKeys, lockTimeoutMs);
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.metricsService.recordLockTimeout();
        return failed(
          bookingFailure(
            BookingFailureReason.LOCK_TIMEOUT,
            'Reservation is currently being processed by another request. Please try again.',
          ),
        );
      }
      throw error;
    }

    if (lock.waitTimeMs > 0) {
      this.metricsService.recordLockWaitTime(lock.waitTimeMs);
    }

    try {
      // Everything below re-reads state, so a request that waited on the
      // lock sees the reservation its predecessor committed
      return await this.commit(validated);
    } finally {
      lock.release();
    }
  }

  /**
   * Read-only checks, in order; the first failing rule decides the outcome.
   */
  private async validate(
    request: CreateReservationRequest,
  ): Promise<BookingOutcome<ValidatedReservation>> {
    const restaurant = await this.restaurantRepository.findById(
      request.restaurantId,
    );
    if (!restaurant) {
      return failed(
        bookingFailure(
          BookingFailureReason.RESTAURANT_NOT_FOUND,
          'Restaurant not found',
        ),
      );
    }
    if (!restaurant.acceptsReservations) {
      return failed(
        bookingFailure(
          BookingFailureReason.RESTAURANT_NOT_ACCEPTING_RESERVATIONS,
          'Restaurant does not accept reservations',
        ),
      );
    }

    const host = await this.eaterRepository.findById(request.hostId);
    if (!host) {
      return failed(
        bookingFailure(
          BookingFailureReason.HOST_NOT_FOUND,
          `Eater with ID ${request.hostId} not found`,
        ),
      );
    }

    const found = await this.eaterRepository.findByIds([
      ...new Set(request.attendeeIds),
    ]);
    const eatersById = new Map(found.map((eater) => [eater.id, eater]));
    const attendees: Eater[] = [];
    for (const attendeeId of request.attendeeIds) {
      const attendee = eatersById.get(attendeeId);
      if (!attendee) {
        return failed(
          bookingFailure(
            BookingFailureReason.ATTENDEE_NOT_FOUND,
            `Attendee with ID ${attendeeId} not found`,
          ),
        );
      }
      if (attendee.id !== host.id && !attendees.includes(attendee)) {
        attendees.push(attendee);
      }
    }

    const partySize = 1 + attendees.length + request.guestsCount;

    const date = parseReservationDate(request.date);
    if (!date) {
      return failed(
        bookingFailure(
          BookingFailureReason.INVALID_DATE_FORMAT,
          'Invalid date format. Use YYYY-MM-DD',
        ),
      );
    }

    const hours = await this.operatingHoursRepository.findByRestaurantId(
      restaurant.id,
    );
    if (!hours) {
      return failed(
        bookingFailure(
          BookingFailureReason.OUTSIDE_OPERATING_HOURS,
          'Restaurant hours not available',
        ),
      );
    }

    const start = parseTimeOfDay(request.time);
    if (!start.ok) {
      return failed(
        bookingFailure(
          BookingFailureReason.INVALID_TIME_FORMAT,
          start.error.message,
        ),
      );
    }
    if (!isOpenAt(hours, start.value)) {
      return failed(
        bookingFailure(
          BookingFailureReason.OUTSIDE_OPERATING_HOURS,
          `Restaurant is not open at ${request.time}`,
        ),
      );
    }

    const { reservationDurationMinutes } = this.configService.getOrThrow(
      'booking',
      { infer: true },
    );
    const window = TimeWindow.fromStart(
      request.time,
      reservationDurationMinutes,
    );
    if (!window.ok) {
      return failed(
        bookingFailure(
          BookingFailureReason.INVALID_TIME_FORMAT,
          window.error.message,
        ),
      );
    }
    if (window.value.crossesMidnight()) {
      return failed(
        bookingFailure(
          BookingFailureReason.CROSSES_MIDNIGHT,
          `A reservation at ${window.value.startTime} would end after midnight`,
        ),
      );
    }

    return succeeded('Reservation request is valid', {
      restaurant,
      host,
      attendees,
      partySize,
      date,
      window: window.value,
    });
  }

  private async commit(
    validated: ValidatedReservation,
  ): Promise<BookingOutcome<ReservationResponse>> {
    const { restaurant, host, attendees, partySize, date, window } = validated;
    const assignmentStartTime = Date.now();

    const hostConflict = await this.findConflict(host.id, date, window);
    if (hostConflict) {
      return failed(
        bookingFailure(BookingFailureReason.PARTY_CONFLICT, hostConflict),
      );
    }

    for (const attendee of attendees) {
      const conflict = await this.findConflict(attendee.id, date, window);
      if (conflict) {
        return failed(
          bookingFailure(
            BookingFailureReason.PARTY_CONFLICT,
            `Attendee ${attendee.name}: ${conflict}`,
          ),
        );
      }
    }

    const tables = await this.tableRepository.findByRestaurantId(restaurant.id);
    const reservations =
      await this.reservationRepository.findActiveByRestaurantAndDate(
        restaurant.id,
        date,
      );
    const allocation = this.tableAllocatorService.allocate(
      tables,
      reservations,
      partySize,
      window,
    );
    if (!allocation.ok) {
      return failed(allocation.error);
    }

    const now = new Date();
    const reservation = new Reservation();
    reservation.id = `RSV_${randomUUID().replace(/-/g, '').toUpperCase()}`;
    reservation.hostId = host.id;
    reservation.restaurantId = restaurant.id;
    reservation.tableId = allocation.value.id;
    reservation.date = date;
    reservation.startTime = window.startTime;
    reservation.endTime = window.endTime;
    reservation.partySize = partySize;
    reservation.isActive = true;
    reservation.createdAt = now;
    reservation.updatedAt = now;

    let saved: Reservation;
    try {
      saved = await this.reservationRepository.create(reservation, [
        host.id,
        ...attendees.map((attendee) => attendee.id),
      ]);
    } catch (error) {
      this.logger.error(
        'Failed to persist reservation',
        error instanceof Error ? error : undefined,
        { restaurantId: restaurant.id, hostId: host.id, date },
      );
      return failed(
        bookingFailure(
          BookingFailureReason.PERSISTENCE_ERROR,
          `Error creating reservation: ${errorMessage(error)}`,
        ),
      );
    }

    this.metricsService.recordAssignmentTime(Date.now() - assignmentStartTime);
    this.metricsService.recordReservationCreated();

    return succeeded(
      'Reservation created successfully',
      toReservationResponse(saved, host, restaurant, [host, ...attendees]),
    );
  }

  /**
   * Explanation of the first reservation that keeps the eater busy during
   * the window, or null when they are free.
   */
  private async findConflict(
    eaterId: string,
    date: string,
    window: TimeWindow,
  ): Promise<string | null> {
    const reservations =
      await this.reservationRepository.findActiveByEaterAndDate(eaterId, date);
    if (reservations.length === 0) {
      return null;
    }

    const restaurants = await this.restaurantRepository.findByIds([
      ...new Set(reservations.map((reservation) => reservation.restaurantId)),
    ]);
    const restaurantNames = new Map(
      restaurants.map((restaurant) => [restaurant.id, restaurant.name]),
    );

    const result = this.conflictCheckerService.check(
      reservations,
      window,
      restaurantNames,
    );
    return result.conflict ? result.message : null;
  }
}
