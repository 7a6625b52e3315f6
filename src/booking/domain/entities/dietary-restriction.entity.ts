import { Entity, PrimaryColumn, Column } from 'typeorm';

@Entity('dietary_restrictions')
export class DietaryRestriction {
  @PrimaryColumn()
  id!: string;

  @Column({ unique: true })
  name!: string; // e.g. "Vegan"
}
