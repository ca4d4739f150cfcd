import { ConfigType, registerAs } from '@nestjs/config';
import { readInt, readList } from './env.util';

export const appConfig = registerAs('app', () => ({
  port: readInt(process.env.PORT, 3001),
  corsOrigins: readList(process.env.CORS_ORIGINS, ['http://localhost:3000']),
  version: process.env.APP_VERSION || '1.0.0',
}));

export type AppConfig = ConfigType<typeof appConfig>;
