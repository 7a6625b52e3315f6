import { Eater } from '../../domain/entities/eater.entity';
import { EaterRestriction } from '../../domain/entities/eater-restriction.entity';

export interface EaterRepository {
  findById(id: string): Promise<Eater | null>;
  findByIds(ids: string[]): Promise<Eater[]>;
  findRestrictions(eaterIds: string[]): Promise<EaterRestriction[]>;
}
