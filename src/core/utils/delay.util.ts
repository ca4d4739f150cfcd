const DEFAULT_RETRY_AFTER_MS = 5000;

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait before retry number `attempt` (zero-indexed): `baseDelayMs * 2^attempt`,
 * never more than `maxDelayMs`.
 *
 * @example
 * backoffDelayMs(0, 1000); // 1000
 * backoffDelayMs(3, 1000); // 8000
 */
export const backoffDelayMs = (
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 30000,
): number => Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);

/**
 * Sleeps for `baseDelayMs` moved up or down by at most `jitterPercent`, so
 * clients throttled together do not retry together.
 */
export const delayWithJitter = (
  baseDelayMs: number,
  jitterPercent: number = 20,
): Promise<void> => {
  const spread = (baseDelayMs * jitterPercent) / 100;
  const offset = (Math.random() * 2 - 1) * spread;
  return delay(Math.max(0, baseDelayMs + offset));
};

/**
 * Milliseconds to wait according to a `Retry-After` value, given either as
 * seconds or as an HTTP date.
 */
export const parseRetryAfter = (
  retryAfter: string | undefined,
  now: number = Date.now(),
): number => {
  if (retryAfter === undefined) return DEFAULT_RETRY_AFTER_MS;

  const value = retryAfter.trim();
  if (value === '') return DEFAULT_RETRY_AFTER_MS;
  if (/^\d+$/.test(value)) return Number.parseInt(value, 10) * 1000;

  const until = Date.parse(value);
  if (Number.isNaN(until)) return DEFAULT_RETRY_AFTER_MS;
  // A date in the near past or future still waits the default
  return Math.max(until - now, DEFAULT_RETRY_AFTER_MS);
};
