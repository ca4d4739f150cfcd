import { ConfigType, registerAs } from '@nestjs/config';
import { readInt, readOptional } from './env.util';

export const paymentsConfig = registerAs('payments', () => ({
  baseUrl: process.env.PAYCHANGU_BASE_URL || 'https://api.paychangu.com',
  secretKey: process.env.PAYCHANGU_SECRET_KEY ?? '',
  maxRetries: readInt(process.env.PAYCHANGU_MAX_RETRIES, 3),
  retryBackoffBaseMs: readInt(process.env.PAYCHANGU_RETRY_BACKOFF_BASE_MS, 1000),
  apiCallTimeoutMs: readInt(process.env.API_CALL_TIMEOUT, 10000),
  callbackUrl: readOptional(process.env.PAYMENT_CALLBACK_URL),
  returnUrl: readOptional(process.env.PAYMENT_RETURN_URL),
  circuitBreaker: {
    timeout: readInt(process.env.CIRCUIT_BREAKER_TIMEOUT, 10000),
    errorThresholdPercentage: readInt(
      process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      50,
    ),
    resetTimeout: readInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT, 30000),
  },
}));

export type PaymentsConfig = ConfigType<typeof paymentsConfig>;
