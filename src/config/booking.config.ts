import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { BookingConfig } from './config.type';

const BookingEnvSchema = z.object({
  // Every reservation occupies its table for this long.
  RESERVATION_DURATION_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .max(24 * 60)
    .default(120),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export default registerAs<BookingConfig>('booking', () => {
  const env = BookingEnvSchema.parse(process.env);

  return {
    reservationDurationMinutes: env.RESERVATION_DURATION_MINUTES,
    lockTimeoutMs: env.LOCK_TIMEOUT_MS,
  };
});
