import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('tables')
@Index(['restaurantId', 'capacity'])
export class Table {
  @PrimaryColumn()
  id!: string;

  @Column()
  restaurantId!: string;

  @Column()
  capacity!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
