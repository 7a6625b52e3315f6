export type AppConfig = {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  apiPrefix: string;
};

export type DatabaseConfig = {
  path: string;
  synchronize: boolean;
  dropSchema: boolean;
  logging: boolean;
};

export type BookingConfig = {
  reservationDurationMinutes: number;
  lockTimeoutMs: number;
};

export type AllConfigType = {
  app: AppConfig;
  database: DatabaseConfig;
  booking: BookingConfig;
};
