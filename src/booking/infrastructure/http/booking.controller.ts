import {
  Controller,
  Get,
  Post,
  Delete,
  Query,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  HttpException,
  BadRequestException,
  NotFoundException,
  InternalServerErrorException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { ZodError } from 'zod';
import { randomUUID } from 'crypto';
import { AvailabilityQueryService } from '../../application/services/availability-query.service';
import { ReservationCommandService } from '../../application/services/reservation-command.service';
import { ReservationQueryService } from '../../application/services/reservation-query.service';
import {
  FindAvailableRestaurantsQuerySchema,
  FindAvailableRestaurantsResponse,
} from '../../application/dto/find-available-restaurants.dto';
import { CreateReservationSchema } from '../../application/dto/create-reservation.dto';
import {
  DeleteReservationQuerySchema,
  DeleteReservationResponse,
  GetReservationQuerySchema,
  ReservationResponse,
} from '../../application/dto/reservation.dto';
import { LoggerService } from '../logging/logger.service';
import { MetricsService } from '../metrics/metrics.service';
import { toHttpException } from './booking-failure.mapper';

// Tests run with much higher limits so unrelated e2e suites are not throttled.
// ENABLE_RATE_LIMITING=true forces the production limits.
const getThrottleConfig = (defaultLimit: number) => {
  const isTest = process.env.NODE_ENV === 'test';
  const relaxInTests = isTest && process.env.ENABLE_RATE_LIMITING !== 'true';
  return {
    default: {
      limit: relaxInTests ? 10000 : defaultLimit,
      ttl: 60000,
    },
  };
};

@ApiTags('booking')
@Controller()
export class BookingController {
  constructor(
    private readonly availabilityQueryService: AvailabilityQueryService,
    private readonly reservationCommandService: ReservationCommandService,
    private readonly reservationQueryService: ReservationQueryService,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Get('restaurants/available')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Find restaurants that can seat a party' })
  @ApiQuery({ name: 'time', example: '19:30' })
  @ApiQuery({ name: 'date', required: false, example: '2030-05-01' })
  @ApiQuery({ name: 'eaterIds', example: 'E1,E2' })
  @ApiQuery({ name: 'additionalGuests', required: false, example: 0 })
  @ApiResponse({ status: 200, description: 'Available restaurants' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 404, description: 'Eater not found' })
  async findAvailableRestaurants(
    @Query() query: Record<string, unknown>,
  ): Promise<FindAvailableRestaurantsResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const op = 'find_available_restaurants';

    try {
      const validated = FindAvailableRestaurantsQuerySchema.parse(query);
      const outcome =
        await this.availabilityQueryService.findAvailableRestaurants(
          validated,
        );
      if (!outcome.success) {
        throw toHttpException(outcome.failure);
      }

      this.logger.log({
        requestId,
        partySize: validated.eaterIds.length + validated.additionalGuests,
        count: outcome.data.count,
        op,
        durationMs: Date.now() - startTime,
        outcome: 'success',
      });

      return outcome.data;
    } catch (error) {
      throw this.handleError(op, requestId, startTime, error);
    }
  }

  @Post('reservations')
  @Throttle(getThrottleConfig(5))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a reservation' })
  @ApiResponse({ status: 201, description: 'Reservation created' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 404, description: 'Restaurant or eater not found' })
  @ApiResponse({ status: 409, description: 'Party conflict or no table' })
  @ApiResponse({ status: 422, description: 'Outside operating hours' })
  async createReservation(
    @Body() body: unknown,
  ): Promise<{ message: string; reservation: ReservationResponse }> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const op = 'create_reservation';

    try {
      const validated = CreateReservationSchema.parse(body);
      const outcome =
        await this.reservationCommandService.createReservation(validated);
      if (!outcome.success) {
        throw toHttpException(outcome.failure);
      }

      this.logger.log({
        requestId,
        restaurantId: validated.restaurantId,
        partySize: outcome.data.partySize,
        reservationId: outcome.data.id,
        op,
        durationMs: Date.now() - startTime,
        outcome: 'success',
      });

      return { message: outcome.message, reservation: outcome.data };
    } catch (error) {
      throw this.handleError(op, requestId, startTime, error);
    }
  }

  @Get('reservations/:id')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Get a reservation' })
  @ApiQuery({ name: 'includeInactive', required: false, example: 'false' })
  @ApiResponse({ status: 200, description: 'Reservation found' })
  @ApiResponse({ status: 404, description: 'Reservation not found' })
  async getReservation(
    @Param('id') id: string,
    @Query() query: Record<string, unknown>,
  ): Promise<ReservationResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const op = 'get_reservation';

    try {
      const { includeInactive } = GetReservationQuerySchema.parse(query);
      const reservation = await this.reservationQueryService.getReservation(
        id,
        includeInactive,
      );
      if (!reservation) {
        throw new NotFoundException({
          error: 'reservation_not_found',
          detail: 'Reservation not found',
        });
      }

      this.logger.log({
        requestId,
        reservationId: id,
        op,
        durationMs: Date.now() - startTime,
        outcome: 'success',
      });

      return reservation;
    } catch (error) {
      throw this.handleError(op, requestId, startTime, error);
    }
  }

  @Delete('reservations/:id')
  @Throttle(getThrottleConfig(5))
  @ApiOperation({ summary: 'Cancel (soft) or delete (hard) a reservation' })
  @ApiQuery({ name: 'softDelete', required: false, example: 'true' })
  @ApiResponse({ status: 200, description: 'Reservation deleted' })
  @ApiResponse({ status: 404, description: 'Reservation not found' })
  async deleteReservation(
    @Param('id') id: string,
    @Query() query: Record<string, unknown>,
  ): Promise<DeleteReservationResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const op = 'delete_reservation';

    try {
      const { softDelete } = DeleteReservationQuerySchema.parse(query);
      const outcome = await this.reservationCommandService.deleteReservation(
        id,
        softDelete,
      );
      if (!outcome.success) {
        throw toHttpException(outcome.failure);
      }

      this.logger.log({
        requestId,
        reservationId: id,
        deletionType: outcome.data.deletionType,
        op,
        durationMs: Date.now() - startTime,
        outcome: 'success',
      });

      return {
        message: outcome.message,
        deletionType: outcome.data.deletionType,
      };
    } catch (error) {
      throw this.handleError(op, requestId, startTime, error);
    }
  }

  @Get('metrics')
  @Throttle(getThrottleConfig(100))
  @ApiOperation({ summary: 'Get metrics' })
  @ApiResponse({ status: 200, description: 'Metrics retrieved' })
  getMetrics() {
    return this.metricsService.getMetrics();
  }

  private handleError(
    op: string,
    requestId: string,
    startTime: number,
    error: unknown,
  ): HttpException {
    const durationMs = Date.now() - startTime;

    if (error instanceof HttpException) {
      this.logger.log({
        requestId,
        op,
        durationMs,
        outcome: 'rejected',
        status: error.getStatus(),
      });
      return error;
    }

    if (error instanceof ZodError) {
      this.logger.log({ requestId, op, durationMs, outcome: 'invalid_input' });
      return new BadRequestException({
        error: 'invalid_input',
        detail: error.errors,
      });
    }

    this.logger.error(
      `${op} failed`,
      error instanceof Error ? error : undefined,
      { requestId, durationMs, outcome: 'error', op },
    );
    return new InternalServerErrorException({
      error: 'internal_error',
      detail: 'An unexpected error occurred',
    });
  }
}
