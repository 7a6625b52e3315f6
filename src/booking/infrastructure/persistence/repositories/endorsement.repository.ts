import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, In } from 'typeorm';
import { Endorsement } from '../../../domain/entities/endorsement.entity';
import { RestrictionEndorsement } from '../../../domain/entities/restriction-endorsement.entity';
import { EndorsementRepository as IEndorsementRepository } from '../../../ports/repositories/endorsement.repository.interface';

@Injectable()
export class EndorsementRepository implements IEndorsementRepository {
  constructor(
    @InjectRepository(Endorsement)
    private readonly repository: Repository<Endorsement>,
    @InjectRepository(RestrictionEndorsement)
    private readonly coverageRepository: Repository<RestrictionEndorsement>,
  ) {}

  async findByIds(ids: string[]): Promise<Endorsement[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({
      where: { id: In(ids) },
      order: { id: 'ASC' },
    });
  }

  async findCoverage(
    restrictionIds: string[],
  ): Promise<RestrictionEndorsement[]> {
    if (restrictionIds.length === 0) {
      return [];
    }
    return this.coverageRepository.find({
      where: { restrictionId: In(restrictionIds) },
    });
  }
}
