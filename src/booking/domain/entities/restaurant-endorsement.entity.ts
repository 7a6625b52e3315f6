import { Entity, PrimaryColumn } from 'typeorm';

@Entity('restaurant_endorsements')
export class RestaurantEndorsement {
  @PrimaryColumn()
  restaurantId!: string;

  @PrimaryColumn()
  endorsementId!: string;
}
