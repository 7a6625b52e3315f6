import { z } from 'zod';

const QueryFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const GetReservationQuerySchema = z.object({
  includeInactive: QueryFlagSchema,
});

export const DeleteReservationQuerySchema = z.object({
  softDelete: QueryFlagSchema,
});

export type GetReservationQuery = z.infer<typeof GetReservationQuerySchema>;
export type DeleteReservationQuery = z.infer<
  typeof DeleteReservationQuerySchema
>;

export interface AttendeeItem {
  id: string;
  name: string;
  email: string;
}

export interface ReservationResponse {
  id: string;
  hostId: string;
  hostName: string | null;
  restaurant: {
    id: string;
    name: string | null;
  };
  tableId: string | null;
  date: string; // YYYY-MM-DD
  startTime: string; // HH:mm
  endTime: string; // HH:mm
  partySize: number;
  isActive: boolean;
  attendees: AttendeeItem[];
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}

export interface DeleteReservationResponse {
  message: string;
  deletionType: 'soft' | 'hard';
}
