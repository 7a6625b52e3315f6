import { Table } from '../../domain/entities/table.entity';

export interface TableRepository {
  /** Tables of a restaurant, ascending by capacity. */
  findByRestaurantId(restaurantId: string): Promise<Table[]>;
}
