import { Restaurant } from '../../domain/entities/restaurant.entity';
import { RestaurantEndorsement } from '../../domain/entities/restaurant-endorsement.entity';

export interface RestaurantRepository {
  findById(id: string): Promise<Restaurant | null>;
  findByIds(ids: string[]): Promise<Restaurant[]>;
  /** Restaurants accepting reservations, in retrieval (id) order. */
  findAcceptingReservations(): Promise<Restaurant[]>;
  findEndorsements(restaurantIds: string[]): Promise<RestaurantEndorsement[]>;
}
