import { OperatingHours } from '../../domain/entities/operating-hours.entity';

export interface OperatingHoursRepository {
  findByRestaurantId(restaurantId: string): Promise<OperatingHours | null>;
  findByRestaurantIds(restaurantIds: string[]): Promise<OperatingHours[]>;
}
