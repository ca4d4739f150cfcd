import { ConfigType, registerAs } from '@nestjs/config';
import { readInt } from './env.util';

/**
 * Signing secret and token lifetimes.
 *
 * Built once at boot; rotating `JWT_SECRET` invalidates every outstanding
 * token.
 */
export const authConfig = registerAs('auth', () => ({
  jwtSecret: process.env.JWT_SECRET ?? '',
  accessTokenTtlMinutes: readInt(process.env.JWT_ACCESS_TTL_MINUTES, 120),
  refreshTokenTtlDays: readInt(process.env.JWT_REFRESH_TTL_DAYS, 7),
  passwordResetTtlMinutes: readInt(process.env.PASSWORD_RESET_TTL_MINUTES, 30),
  bcryptRounds: readInt(process.env.BCRYPT_ROUNDS, 12),
}));

export type AuthConfig = ConfigType<typeof authConfig>;
