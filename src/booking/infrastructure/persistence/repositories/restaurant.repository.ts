import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, In } from 'typeorm';
import { Restaurant } from '../../../domain/entities/restaurant.entity';
import { RestaurantEndorsement } from '../../../domain/entities/restaurant-endorsement.entity';
import { RestaurantRepository as IRestaurantRepository } from '../../../ports/repositories/restaurant.repository.interface';

@Injectable()
export class RestaurantRepository implements IRestaurantRepository {
  constructor(
    @InjectRepository(Restaurant)
    private readonly repository: Repository<Restaurant>,
    @InjectRepository(RestaurantEndorsement)
    private readonly endorsementRepository: Repository<RestaurantEndorsement>,
  ) {}

  async findById(id: string): Promise<Restaurant | null> {
    return this.repository.findOne({ where: { id } });
  }

  async findByIds(ids: string[]): Promise<Restaurant[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({ where: { id: In(ids) } });
  }

  async findAcceptingReservations(): Promise<Restaurant[]> {
    return this.repository.find({
      where: { acceptsReservations: true },
      order: { id: 'ASC' },
    });
  }

  async findEndorsements(
    restaurantIds: string[],
  ): Promise<RestaurantEndorsement[]> {
    if (restaurantIds.length === 0) {
      return [];
    }
    return this.endorsementRepository.find({
      where: { restaurantId: In(restaurantIds) },
    });
  }
}
