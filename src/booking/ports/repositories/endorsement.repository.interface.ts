import { Endorsement } from '../../domain/entities/endorsement.entity';
import { RestrictionEndorsement } from '../../domain/entities/restriction-endorsement.entity';

export interface EndorsementRepository {
  findByIds(ids: string[]): Promise<Endorsement[]>;
  findCoverage(restrictionIds: string[]): Promise<RestrictionEndorsement[]>;
}
