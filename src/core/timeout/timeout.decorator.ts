import { SetMetadata } from '@nestjs/common';

export const REQUEST_TIMEOUT_KEY = 'request-timeout-ms';

/**
 * Overrides the {@link TimeoutInterceptor} budget for a handler or controller.
 */
export const RequestTimeout = (timeoutMs: number) =>
  SetMetadata(REQUEST_TIMEOUT_KEY, timeoutMs);
