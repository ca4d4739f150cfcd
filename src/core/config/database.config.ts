import { ConfigType, registerAs } from '@nestjs/config';
import { readBool, readInt } from './env.util';

export const databaseConfig = registerAs('database', () => ({
  url: process.env.DATABASE_URL ?? '',
  poolSize: readInt(process.env.DB_POOL_SIZE, 10),
  runMigrations: readBool(process.env.DB_RUN_MIGRATIONS, true),
  queryTimeoutMs: readInt(process.env.DB_QUERY_TIMEOUT, 5000),
}));

export type DatabaseConfig = ConfigType<typeof databaseConfig>;
