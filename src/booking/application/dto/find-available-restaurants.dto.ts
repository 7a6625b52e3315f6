import { z } from 'zod';

// Accepts ?eaterIds=E1&eaterIds=E2 as well as ?eaterIds=E1,E2
const IdListSchema = z.preprocess(
  (value) =>
    (Array.isArray(value) ? value : [value])
      .filter((item): item is string => typeof item === 'string')
      .flatMap((item) => item.split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  z.array(z.string()).min(1, 'At least one eater ID is required'),
);

export const FindAvailableRestaurantsQuerySchema = z.object({
  time: z.string().min(1, 'Reservation time is required'),
  date: z.string().optional(),
  eaterIds: IdListSchema,
  additionalGuests: z.coerce.number().int().min(0).default(0),
});

export type FindAvailableRestaurantsQuery = z.infer<
  typeof FindAvailableRestaurantsQuerySchema
>;

export interface RestaurantSummary {
  id: string;
  name: string;
  averageRating: number | null;
  address: string | null;
  phone: string | null;
  hours: {
    opening: string | null; // HH:mm
    closing: string | null; // HH:mm
  };
  endorsements: Array<{ id: string; name: string }>;
  hasParking: boolean;
  acceptsReservations: boolean;
}

export interface FindAvailableRestaurantsResponse {
  count: number;
  restaurants: RestaurantSummary[];
}
