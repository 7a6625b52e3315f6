import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, In } from 'typeorm';
import { OperatingHours } from '../../../domain/entities/operating-hours.entity';
import { OperatingHoursRepository as IOperatingHoursRepository } from '../../../ports/repositories/operating-hours.repository.interface';

@Injectable()
export class OperatingHoursRepository implements IOperatingHoursRepository {
  constructor(
    @InjectRepository(OperatingHours)
    private readonly repository: Repository<OperatingHours>,
  ) {}

  async findByRestaurantId(
    restaurantId: string,
  ): Promise<OperatingHours | null> {
    return this.repository.findOne({ where: { restaurantId } });
  }

  async findByRestaurantIds(
    restaurantIds: string[],
  ): Promise<OperatingHours[]> {
    if (restaurantIds.length === 0) {
      return [];
    }
    return this.repository.find({
      where: { restaurantId: In(restaurantIds) },
    });
  }
}
