import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

@Entity('reservations')
@Index(['restaurantId', 'date'])
@Index(['hostId', 'date'])
export class Reservation {
  @PrimaryColumn()
  id!: string;

  @Column()
  hostId!: string;

  @Column()
  restaurantId!: string;

  // Only null before allocation; committed reservations always carry a table
  @Column({ type: 'varchar', nullable: true })
  tableId!: string | null;

  @Column()
  date!: string; // YYYY-MM-DD

  @Column()
  startTime!: string; // HH:mm format

  @Column()
  endTime!: string; // HH:mm format, exclusive

  @Column()
  partySize!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
