import { Entity, PrimaryColumn, Column } from 'typeorm';

@Entity('operating_hours')
export class OperatingHours {
  @PrimaryColumn()
  id!: string;

  @Column({ unique: true })
  restaurantId!: string;

  @Column()
  openingTime!: string; // HH:mm format

  @Column()
  closingTime!: string; // HH:mm format, inclusive
}
