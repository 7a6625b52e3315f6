import { z } from 'zod';

// Environment flags arrive as strings; only the literal "true" enables one.
export const envFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true');
