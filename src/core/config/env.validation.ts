import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  APP_VERSION?: string;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  JWT_ACCESS_TTL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  JWT_REFRESH_TTL_DAYS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  PASSWORD_RESET_TTL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(4)
  @Max(15)
  BCRYPT_ROUNDS?: number;

  @IsString()
  @IsNotEmpty()
  DATABASE_URL!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_POOL_SIZE?: number;

  @IsOptional()
  @IsBooleanString()
  DB_RUN_MIGRATIONS?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  PAYCHANGU_BASE_URL?: string;

  @IsString()
  @IsNotEmpty()
  PAYCHANGU_SECRET_KEY!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  PAYCHANGU_MAX_RETRIES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  API_CALL_TIMEOUT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  SMTP_PORT?: number;
}

/**
 * Fails the boot when required variables are missing or malformed.
 * Values are returned untouched; the `registerAs` factories parse them.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const env = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }

  return config;
}
