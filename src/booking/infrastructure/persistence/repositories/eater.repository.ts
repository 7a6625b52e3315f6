import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, In } from 'typeorm';
import { Eater } from '../../../domain/entities/eater.entity';
import { EaterRestriction } from '../../../domain/entities/eater-restriction.entity';
import { EaterRepository as IEaterRepository } from '../../../ports/repositories/eater.repository.interface';

@Injectable()
export class EaterRepository implements IEaterRepository {
  constructor(
    @InjectRepository(Eater)
    private readonly repository: Repository<Eater>,
    @InjectRepository(EaterRestriction)
    private readonly restrictionRepository: Repository<EaterRestriction>,
  ) {}

  async findById(id: string): Promise<Eater | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<Eater[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({ where: { id: In(ids) } });
  }

  async findRestrictions(eaterIds: string[]): Promise<EaterRestriction[]> {
    if (eaterIds.length === 0) {
      return [];
    }
    return this.restrictionRepository.find({
      where: { eaterId: In(eaterIds) },
    });
  }
}
