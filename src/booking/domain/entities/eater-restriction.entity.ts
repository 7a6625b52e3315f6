import { Entity, PrimaryColumn } from 'typeorm';

@Entity('eater_dietary_restrictions')
export class EaterRestriction {
  @PrimaryColumn()
  eaterId!: string;

  @PrimaryColumn()
  restrictionId!: string;
}
