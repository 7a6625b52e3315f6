import { Entity, PrimaryColumn, Index } from 'typeorm';

@Entity('reservation_attendees')
@Index(['eaterId'])
export class ReservationAttendee {
  @PrimaryColumn()
  reservationId!: string;

  @PrimaryColumn()
  eaterId!: string;
}
