import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource } from 'typeorm';
import { Reservation } from '../../../domain/entities/reservation.entity';
import { ReservationAttendee } from '../../../domain/entities/reservation-attendee.entity';
import { ReservationRepository as IReservationRepository } from '../../../ports/repositories/reservation.repository.interface';

@Injectable()
export class ReservationRepository implements IReservationRepository {
  constructor(
    @InjectRepository(Reservation)
    private readonly repository: Repository<Reservation>,
    @InjectRepository(ReservationAttendee)
    private readonly attendeeRepository: Repository<ReservationAttendee>,
    private readonly dataSource: DataSource,
  ) {}

  async findById(id: string): Promise<Reservation | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findActiveByRestaurantAndDate(
    restaurantId: string,
    date: string,
  ): Promise<Reservation[]> {
    return this.repository.find({
      where: { restaurantId, date, isActive: true },
      order: { startTime: 'ASC' },
    });
  }

  async findActiveByEaterAndDate(
    eaterId: string,
    date: string,
  ): Promise<Reservation[]> {
    // The host always has an attendee row, so one join covers both roles
    return this.repository
      .createQueryBuilder('reservation')
      .innerJoin(
        ReservationAttendee,
        'attendee',
        'attendee.reservationId = reservation.id',
      )
      .where('attendee.eaterId = :eaterId', { eaterId })
      .andWhere('reservation.date = :date', { date })
      .andWhere('reservation.isActive = :isActive', { isActive: true })
      .orderBy('reservation.startTime', 'ASC')
      .getMany();
  }

  async findAttendeeIds(reservationId: string): Promise<string[]> {
    const attendees = await this.attendeeRepository.find({
      where: { reservationId },
    });
    return attendees.map((a) => a.eaterId);
  }

  async create(
    reservation: Reservation,
    attendeeIds: string[],
  ): Promise<Reservation> {
    // Rejects on a duplicate id rather than overwriting the stored row
    return this.dataSource.transaction(async (manager) => {
      await manager.insert(Reservation, reservation);
      await manager.insert(
        ReservationAttendee,
        attendeeIds.map((eaterId) => ({
          reservationId: reservation.id,
          eaterId,
        })),
      );
      return reservation;
    });
  }

  async update(reservation: Reservation): Promise<Reservation> {
    return this.repository.save(reservation);
  }

  async delete(id: string): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      await manager.delete(ReservationAttendee, { reservationId: id });
      const result = await manager.delete(Reservation, { id });
      return (result.affected ?? 0) > 0;
    });
  }
}
