import { Entity, PrimaryColumn, Column } from 'typeorm';

@Entity('endorsements')
export class Endorsement {
  @PrimaryColumn()
  id!: string;

  @Column({ unique: true })
  name!: string; // e.g. "Vegan-Friendly"
}
