import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { DatabaseConfig } from './config.type';
import { envFlag } from './env-flag.util';

const DatabaseEnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('table-match.db'),
  DATABASE_SYNCHRONIZE: envFlag(true),
  DROP_SCHEMA_ON_STARTUP: envFlag(false),
  DATABASE_LOGGING: envFlag(false),
});

export default registerAs<DatabaseConfig>('database', () => {
  const env = DatabaseEnvSchema.parse(process.env);

  return {
    path: env.DATABASE_PATH,
    synchronize: env.DATABASE_SYNCHRONIZE,
    dropSchema: env.DROP_SCHEMA_ON_STARTUP,
    logging: env.DATABASE_LOGGING,
  };
});
