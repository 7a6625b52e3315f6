import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { Eater } from './domain/entities/eater.entity';
import { DietaryRestriction } from './domain/entities/dietary-restriction.entity';
import { Endorsement } from './domain/entities/endorsement.entity';
import { EaterRestriction } from './domain/entities/eater-restriction.entity';
import { RestrictionEndorsement } from './domain/entities/restriction-endorsement.entity';
import { RestaurantEndorsement } from './domain/entities/restaurant-endorsement.entity';
import { Restaurant } from './domain/entities/restaurant.entity';
import { OperatingHours } from './domain/entities/operating-hours.entity';
import { Table } from './domain/entities/table.entity';
import { Reservation } from './domain/entities/reservation.entity';
import { ReservationAttendee } from './domain/entities/reservation-attendee.entity';
import { EaterRepository } from './infrastructure/persistence/repositories/eater.repository';
import { RestaurantRepository } from './infrastructure/persistence/repositories/restaurant.repository';
import { EndorsementRepository } from './infrastructure/persistence/repositories/endorsement.repository';
import { OperatingHoursRepository } from './infrastructure/persistence/repositories/operating-hours.repository';
import { TableRepository } from './infrastructure/persistence/repositories/table.repository';
import { ReservationRepository } from './infrastructure/persistence/repositories/reservation.repository';
import { ThrottlerExceptionFilter } from './infrastructure/rate-limiting/throttler-exception.filter';
import { SeedService } from './infrastructure/persistence/seed.service';
import { RestrictionMatcherService } from './domain/services/restriction-matcher.service';
import { HoursFilterService } from './domain/services/hours-filter.service';
import { TableAllocatorService } from './domain/services/table-allocator.service';
import { ConflictCheckerService } from './domain/services/conflict-checker.service';
import { LockManagerService } from './infrastructure/locking/lock-manager.service';
import { LoggerService } from './infrastructure/logging/logger.service';
import { MetricsService } from './infrastructure/metrics/metrics.service';
import { AvailabilityQueryService } from './application/services/availability-query.service';
import { ReservationCommandService } from './application/services/reservation-command.service';
import { ReservationQueryService } from './application/services/reservation-query.service';
import { BookingController } from './infrastructure/http/booking.controller';
import {
  EATER_REPOSITORY,
  RESTAURANT_REPOSITORY,
  ENDORSEMENT_REPOSITORY,
  OPERATING_HOURS_REPOSITORY,
  TABLE_REPOSITORY,
  RESERVATION_REPOSITORY,
} from './tokens';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Eater,
      DietaryRestriction,
      Endorsement,
      EaterRestriction,
      RestrictionEndorsement,
      RestaurantEndorsement,
      Restaurant,
      OperatingHours,
      Table,
      Reservation,
      ReservationAttendee,
    ]),
    ThrottlerModule.forRoot({
      throttlers: [
        {
          ttl: 60000,
          limit: process.env.NODE_ENV === 'test' ? 10000 : 100, // overridden per route by @Throttle
        },
      ],
    }),
  ],
  controllers: [BookingController],
  providers: [
    // Domain services
    RestrictionMatcherService,
    HoursFilterService,
    TableAllocatorService,
    ConflictCheckerService,
    // Infrastructure services
    LockManagerService,
    LoggerService,
    MetricsService,
    SeedService,
    // Repository interfaces (provide tokens, use implementations)
    {
      provide: EATER_REPOSITORY,
      useClass: EaterRepository,
    },
    {
      provide: RESTAURANT_REPOSITORY,
      useClass: RestaurantRepository,
    },
    {
      provide: ENDORSEMENT_REPOSITORY,
      useClass: EndorsementRepository,
    },
    {
      provide: OPERATING_HOURS_REPOSITORY,
      useClass: OperatingHoursRepository,
    },
    {
      provide: TABLE_REPOSITORY,
      useClass: TableRepository,
    },
    {
      provide: RESERVATION_REPOSITORY,
      useClass: ReservationRepository,
    },
    // Application services
    AvailabilityQueryService,
    ReservationCommandService,
    ReservationQueryService,
    // Rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ThrottlerExceptionFilter,
    },
  ],
  exports: [SeedService, LoggerService],
})
export class BookingModule {}
