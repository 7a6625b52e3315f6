import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Table } from '../../../domain/entities/table.entity';
import { TableRepository as ITableRepository } from '../../../ports/repositories/table.repository.interface';

@Injectable()
export class TableRepository implements ITableRepository {
  constructor(
    @InjectRepository(Table)
    private readonly repository: Repository<Table>,
  ) {}

  async findByRestaurantId(restaurantId: string): Promise<Table[]> {
    return this.repository.find({
      where: { restaurantId },
      order: { capacity: 'ASC', id: 'ASC' },
    });
  }
}
