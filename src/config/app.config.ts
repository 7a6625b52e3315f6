import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from './config.type';

const AppEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  APP_PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().min(1).default('api'),
});

export default registerAs<AppConfig>('app', () => {
  const env = AppEnvSchema.parse(process.env);

  return {
    nodeEnv: env.NODE_ENV,
    port: env.APP_PORT,
    apiPrefix: env.API_PREFIX,
  };
});
