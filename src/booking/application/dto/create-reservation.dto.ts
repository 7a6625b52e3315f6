import { z } from 'zod';

export const CreateReservationSchema = z.object({
  hostId: z.string().min(1),
  restaurantId: z.string().min(1),
  date: z.string().min(1), // YYYY-MM-DD, checked by the engine
  time: z.string().min(1), // HH:mm, checked by the engine
  attendeeIds: z.array(z.string().min(1)).default([]),
  guestsCount: z.number().int().min(0).default(0),
});

export type CreateReservationRequest = z.infer<typeof CreateReservationSchema>;
