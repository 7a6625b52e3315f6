import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ReservationCommandService } from './reservation-command.service';
import { EaterRepository } from '../../ports/repositories/eater.repository.interface';
import { RestaurantRepository } from '../../ports/repositories/restaurant.repository.interface';
import { OperatingHoursRepository } from '../../ports/repositories/operating-hours.repository.interface';
import { TableRepository } from '../../ports/repositories/table.repository.interface';
import { ReservationRepository } from '../../ports/repositories/reservation.repository.interface';
import {
  EATER_REPOSITORY,
  RESTAURANT_REPOSITORY,
  OPERATING_HOURS_REPOSITORY,
  TABLE_REPOSITORY,
  RESERVATION_REPOSITORY,
} from '../../tokens';
import { ConflictCheckerService } from '../../domain/services/conflict-checker.service';
import { TableAllocatorService } from '../../domain/services/table-allocator.service';
import { LockManagerService } from '../../infrastructure/locking/lock-manager.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { Eater } from '../../domain/entities/eater.entity';
import { Restaurant } from '../../domain/entities/restaurant.entity';
import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { Table } from '../../domain/entities/table.entity';
import { Reservation } from '../../domain/entities/reservation.entity';
import { CreateReservationRequest } from '../dto/create-reservation.dto';

const createdAt = new Date('2030-04-01T10:00:00.000Z');

const makeEater = (id: string, name: string): Eater =>
  Object.assign(new Eater(), {
    id,
    name,
    email: `${id.toLowerCase()}@example.com`,
    createdAt,
    updatedAt: createdAt,
  });

const makeRestaurant = (
  id: string,
  name: string,
  acceptsReservations: boolean = true,
): Restaurant =>
  Object.assign(new Restaurant(), {
    id,
    name,
    averageRating: null,
    address: null,
    phone: null,
    email: null,
    websiteUrl: null,
    hasParking: false,
    acceptsReservations,
    createdAt,
    updatedAt: createdAt,
  });

const makeHours = (
  restaurantId: string,
  openingTime: string,
  closingTime: string,
): OperatingHours =>
  Object.assign(new OperatingHours(), {
    id: `OH-${restaurantId}`,
    restaurantId,
    openingTime,
    closingTime,
  });

const makeTable = (id: string, capacity: number): Table =>
  Object.assign(new Table(), { id, restaurantId: 'R1', capacity, createdAt });

const makeReservation = (
  overrides: Partial<Reservation> & { id: string },
): Reservation =>
  Object.assign(
    new Reservation(),
    {
      hostId: 'E4',
      restaurantId: 'R1',
      tableId: 'R1-T1',
      date: '2030-05-01',
      startTime: '18:00',
      endTime: '20:00',
      partySize: 2,
      isActive: true,
      createdAt,
      updatedAt: createdAt,
    },
    overrides,
  );

describe('ReservationCommandService', () => {
  let service: ReservationCommandService;
  let eaterRepository: jest.Mocked<EaterRepository>;
  let restaurantRepository: jest.Mocked<RestaurantRepository>;
  let operatingHoursRepository: jest.Mocked<OperatingHoursRepository>;
  let tableRepository: jest.Mocked<TableRepository>;
  let reservationRepository: jest.Mocked<ReservationRepository>;
  let lockManagerService: LockManagerService;
  let metricsService: MetricsService;

  const eaters = new Map(
    [
      makeEater('E1', 'Ana Torres'),
      makeEater('E2', 'Ben Okafor'),
      makeEater('E3', 'Chloe Martin'),
    ].map((eater) => [eater.id, eater]),
  );
  const restaurants = new Map(
    [
      makeRestaurant('R1', 'Harbor Bakery'),
      makeRestaurant('R2', 'Casa Maiz'),
      makeRestaurant('R8', 'Closed Books', false),
    ].map((restaurant) => [restaurant.id, restaurant]),
  );

  const request = (
    overrides: Partial<CreateReservationRequest> = {},
  ): CreateReservationRequest => ({
    hostId: 'E1',
    restaurantId: 'R1',
    date: '2030-05-01',
    time: '18:00',
    attendeeIds: [],
    guestsCount: 0,
    ...overrides,
  });

  beforeEach(async () => {
    const mockEaterRepository = {
      findById: jest.fn(),
      findByIds: jest.fn(),
      findRestrictions: jest.fn(),
    };

    const mockRestaurantRepository = {
      findById: jest.fn(),
      findByIds: jest.fn(),
      findAcceptingReservations: jest.fn(),
      findEndorsements: jest.fn(),
    };

    const mockOperatingHoursRepository = {
      findByRestaurantId: jest.fn(),
      findByRestaurantIds: jest.fn(),
    };

    const mockTableRepository = {
      findByRestaurantId: jest.fn(),
    };

    const mockReservationRepository = {
      findById: jest.fn(),
      findActiveByRestaurantAndDate: jest.fn(),
      findActiveByEaterAndDate: jest.fn(),
      findAttendeeIds: jest.fn(),
      create: jest.fn(),
      update: jest.fn(),
      delete: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReservationCommandService,
        ConflictCheckerService,
        TableAllocatorService,
        LockManagerService,
        MetricsService,
        {
          provide: LoggerService,
          useValue: {
            log: jest.fn(),
            warn: jest.fn(),
            error: jest.fn(),
            debug: jest.fn(),
          },
        },
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn().mockReturnValue({
              reservationDurationMinutes: 120,
              lockTimeoutMs: 50,
            }),
          },
        },
        { provide: EATER_REPOSITORY, useValue: mockEaterRepository },
        { provide: RESTAURANT_REPOSITORY, useValue: mockRestaurantRepository },
        {
          provide: OPERATING_HOURS_REPOSITORY,
          useValue: mockOperatingHoursRepository,
        },
        { provide: TABLE_REPOSITORY, useValue: mockTableRepository },
        { provide: RESERVATION_REPOSITORY, useValue: mockReservationRepository },
      ],
    }).compile();

    service = module.get<ReservationCommandService>(ReservationCommandService);
    eaterRepository = module.get(EATER_REPOSITORY);
    restaurantRepository = module.get(RESTAURANT_REPOSITORY);
    operatingHoursRepository = module.get(OPERATING_HOURS_REPOSITORY);
    tableRepository = module.get(TABLE_REPOSITORY);
    reservationRepository = module.get(RESERVATION_REPOSITORY);
    lockManagerService = module.get<LockManagerService>(LockManagerService);
    metricsService = module.get<MetricsService>(MetricsService);

    eaterRepository.findById.mockImplementation(
      async (id) => eaters.get(id) ?? null,
    );
    eaterRepository.findByIds.mockImplementation(async (ids) =>
      ids.flatMap((id) => {
        const eater = eaters.get(id);
        return eater ? [eater] : [];
      }),
    );
    restaurantRepository.findById.mockImplementation(
      async (id) => restaurants.get(id) ?? null,
    );
    restaurantRepository.findByIds.mockImplementation(async (ids) =>
      ids.flatMap((id) => {
        const restaurant = restaurants.get(id);
        return restaurant ? [restaurant] : [];
      }),
    );
    operatingHoursRepository.findByRestaurantId.mockResolvedValue(
      makeHours('R1', '08:00', '20:00'),
    );
    tableRepository.findByRestaurantId.mockResolvedValue([
      makeTable('R1-T1', 2),
      makeTable('R1-T2', 4),
    ]);
    reservationRepository.findActiveByEaterAndDate.mockResolvedValue([]);
    reservationRepository.findActiveByRestaurantAndDate.mockResolvedValue([]);
    reservationRepository.create.mockImplementation(
      async (reservation) => reservation,
    );
  });

  afterEach(() => {
    lockManagerService.clear();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('createReservation', () => {
    it('should book the smallest fitting table for the whole party', async () => {
      const outcome = await service.createReservation(
        request({ attendeeIds: ['E2', 'E1', 'E2'], guestsCount: 1 }),
      );

      expect(outcome.success).toBe(true);
      if (!outcome.success) {
        return;
      }
      expect(outcome.message).toBe('Reservation created successfully');
      expect(outcome.data).toMatchObject({
        hostId: 'E1',
        hostName: 'Ana Torres',
        restaurant: { id: 'R1', name: 'Harbor Bakery' },
        tableId: 'R1-T2',
        date: '2030-05-01',
        startTime: '18:00',
        endTime: '20:00',
        partySize: 3,
        isActive: true,
      });
      expect(outcome.data.id).toMatch(/^RSV_[0-9A-F]{32}$/);
      expect(outcome.data.attendees.map((attendee) => attendee.id)).toEqual([
        'E1',
        'E2',
      ]);
      expect(reservationRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({ tableId: 'R1-T2', partySize: 3 }),
        ['E1', 'E2'],
      );
      expect(metricsService.getMetrics().reservations.created).toBe(1);
      expect(metricsService.getMetrics().assignmentTime.samples).toBe(1);
    });

    it('should normalize the stored start time', async () => {
      const outcome = await service.createReservation(request({ time: '9:5' }));

      expect(outcome.success && outcome.data.startTime).toBe('09:05');
      expect(outcome.success && outcome.data.endTime).toBe('11:05');
    });

    it('should reject an unknown restaurant', async () => {
      const outcome = await service.createReservation(
        request({ restaurantId: 'R9' }),
      );

      expect(outcome).toEqual({
        success: false,
        message: 'Restaurant not found',
        failure: {
          kind: 'not_found',
          reason: 'restaurant_not_found',
          message: 'Restaurant not found',
        },
      });
      expect(reservationRepository.create).not.toHaveBeenCalled();
      expect(metricsService.getMetrics().reservations.rejections).toEqual({
        restaurant_not_found: 1,
      });
    });

    it('should reject a restaurant that does not take reservations', async () => {
      const outcome = await service.createReservation(
        request({ restaurantId: 'R8' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'restaurant_not_accepting_reservations',
        message: 'Restaurant does not accept reservations',
      });
    });

    it('should reject an unknown host', async () => {
      const outcome = await service.createReservation(
        request({ hostId: 'E9' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'not_found',
        reason: 'host_not_found',
        message: 'Eater with ID E9 not found',
      });
    });

    it('should report the first unknown attendee in request order', async () => {
      const outcome = await service.createReservation(
        request({ attendeeIds: ['E2', 'E8', 'E7'] }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'not_found',
        reason: 'attendee_not_found',
        message: 'Attendee with ID E8 not found',
      });
    });

    it('should reject an impossible date', async () => {
      const outcome = await service.createReservation(
        request({ date: '2030-02-30' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'invalid_input',
        reason: 'invalid_date_format',
        message: 'Invalid date format. Use YYYY-MM-DD',
      });
    });

    it('should reject a restaurant without operating hours', async () => {
      operatingHoursRepository.findByRestaurantId.mockResolvedValue(null);

      const outcome = await service.createReservation(request());

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'outside_operating_hours',
        message: 'Restaurant hours not available',
      });
    });

    it('should reject a malformed time', async () => {
      const outcome = await service.createReservation(
        request({ time: 'dinner' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'invalid_input',
        reason: 'invalid_time_format',
        message: 'Invalid time format: dinner. Use HH:MM format.',
      });
    });

    it('should reject a start outside operating hours', async () => {
      const outcome = await service.createReservation(
        request({ time: '21:00' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'outside_operating_hours',
        message: 'Restaurant is not open at 21:00',
      });
    });

    it('should accept a start at closing time', async () => {
      const outcome = await service.createReservation(
        request({ time: '20:00' }),
      );

      expect(outcome.success).toBe(true);
    });

    it('should reject a reservation that would run past midnight', async () => {
      operatingHoursRepository.findByRestaurantId.mockResolvedValue(
        makeHours('R1', '00:00', '23:59'),
      );

      const outcome = await service.createReservation(
        request({ time: '23:00' }),
      );

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'crosses_midnight',
        message: 'A reservation at 23:00 would end after midnight',
      });
    });

    it('should reject when the host is already booked elsewhere', async () => {
      reservationRepository.findActiveByEaterAndDate.mockImplementation(
        async (eaterId) =>
          eaterId === 'E1'
            ? [
                makeReservation({
                  id: 'RSV_OLD',
                  hostId: 'E1',
                  restaurantId: 'R2',
                  startTime: '17:00',
                  endTime: '19:00',
                }),
              ]
            : [],
      );

      const outcome = await service.createReservation(request());

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'party_conflict',
        message:
          'You already have a reservation at Casa Maiz from 17:00 to 19:00 on this date.',
      });
      expect(reservationRepository.create).not.toHaveBeenCalled();
    });

    it('should name the attendee who is already booked', async () => {
      reservationRepository.findActiveByEaterAndDate.mockImplementation(
        async (eaterId) =>
          eaterId === 'E3'
            ? [
                makeReservation({
                  id: 'RSV_OLD',
                  hostId: 'E3',
                  restaurantId: 'R2',
                  startTime: '19:00',
                  endTime: '21:00',
                }),
              ]
            : [],
      );

      const outcome = await service.createReservation(
        request({ attendeeIds: ['E2', 'E3'] }),
      );

      expect(!outcome.success && outcome.failure.message).toBe(
        'Attendee Chloe Martin: You already have a reservation at Casa Maiz from 19:00 to 21:00 on this date.',
      );
    });

    it('should reject when no table seats the party', async () => {
      const outcome = await service.createReservation(
        request({ attendeeIds: ['E2'], guestsCount: 3 }),
      );

      expect(!outcome.success && outcome.failure.reason).toBe('no_table_size');
    });

    it('should reject when every fitting table is taken', async () => {
      reservationRepository.findActiveByRestaurantAndDate.mockResolvedValue([
        makeReservation({ id: 'RSV_A', tableId: 'R1-T1' }),
        makeReservation({
          id: 'RSV_B',
          tableId: 'R1-T2',
          startTime: '19:30',
          endTime: '21:30',
        }),
      ]);

      const outcome = await service.createReservation(request());

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'business_rule_violation',
        reason: 'no_capacity',
        message:
          'No tables available for that party size at the requested time',
      });
    });

    it('should report a storage failure', async () => {
      reservationRepository.create.mockRejectedValue(new Error('disk full'));

      const outcome = await service.createReservation(request());

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'persistence_error',
        reason: 'persistence_error',
        message: 'Error creating reservation: disk full',
      });
      expect(metricsService.getMetrics().reservations.created).toBe(0);
    });

    it('should give up when the restaurant stays locked', async () => {
      const held = await lockManagerService.acquire('restaurant|R1|2030-05-01');

      const outcome = await service.createReservation(request());

      expect(!outcome.success && outcome.failure.reason).toBe('lock_timeout');
      expect(metricsService.getMetrics().locks.timeouts).toBe(1);
      held.release();
    });

    it('should release its locks after booking', async () => {
      await service.createReservation(request());

      const lock = await lockManagerService.acquireAll(
        ['restaurant|R1|2030-05-01', 'eater|E1|2030-05-01'],
        10,
      );
      expect(lock.waitTimeMs).toBe(0);
      lock.release();
    });
  });

  describe('deleteReservation', () => {
    it('should report an unknown reservation', async () => {
      reservationRepository.findById.mockResolvedValue(null);

      const outcome = await service.deleteReservation('RSV_NONE');

      expect(outcome).toEqual({
        success: false,
        message: 'Reservation not found',
        failure: {
          kind: 'not_found',
          reason: 'reservation_not_found',
          message: 'Reservation not found',
        },
      });
    });

    it('should deactivate on soft delete', async () => {
      reservationRepository.findById.mockResolvedValue(
        makeReservation({ id: 'RSV_1' }),
      );
      reservationRepository.update.mockImplementation(
        async (reservation) => reservation,
      );

      const outcome = await service.deleteReservation('RSV_1', true);

      expect(outcome).toEqual({
        success: true,
        message: 'Reservation marked as deleted',
        data: { deletionType: 'soft' },
      });
      expect(reservationRepository.update).toHaveBeenCalledWith(
        expect.objectContaining({ id: 'RSV_1', isActive: false }),
      );
      expect(reservationRepository.delete).not.toHaveBeenCalled();
      expect(metricsService.getMetrics().reservations.cancelled.soft).toBe(1);
    });

    it('should remove the reservation on hard delete', async () => {
      reservationRepository.findById.mockResolvedValue(
        makeReservation({ id: 'RSV_1' }),
      );
      reservationRepository.delete.mockResolvedValue(true);

      const outcome = await service.deleteReservation('RSV_1');

      expect(outcome).toEqual({
        success: true,
        message: 'Reservation permanently deleted',
        data: { deletionType: 'hard' },
      });
      expect(reservationRepository.delete).toHaveBeenCalledWith('RSV_1');
      expect(metricsService.getMetrics().reservations.cancelled.hard).toBe(1);
    });

    it('should report not found when the row is already gone', async () => {
      reservationRepository.findById.mockResolvedValue(
        makeReservation({ id: 'RSV_1' }),
      );
      reservationRepository.delete.mockResolvedValue(false);

      const outcome = await service.deleteReservation('RSV_1');

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'not_found',
        reason: 'reservation_not_found',
        message: 'Reservation not found',
      });
      expect(metricsService.getMetrics().reservations.cancelled.hard).toBe(0);
    });

    it('should report a storage failure', async () => {
      reservationRepository.findById.mockResolvedValue(
        makeReservation({ id: 'RSV_1' }),
      );
      reservationRepository.delete.mockRejectedValue(new Error('locked'));

      const outcome = await service.deleteReservation('RSV_1');

      expect(!outcome.success && outcome.failure).toEqual({
        kind: 'persistence_error',
        reason: 'persistence_error',
        message: 'Error deleting reservation: locked',
      });
    });
  });
});
