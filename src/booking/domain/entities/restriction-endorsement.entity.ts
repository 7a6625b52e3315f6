import { Entity, PrimaryColumn } from 'typeorm';

/**
 * Coverage mapping: an endorsement that satisfies a dietary restriction.
 * A restriction may be satisfied by several endorsements.
 */
@Entity('restriction_endorsement_mappings')
export class RestrictionEndorsement {
  @PrimaryColumn()
  restrictionId!: string;

  @PrimaryColumn()
  endorsementId!: string;
}
