import { Injectable } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  name?: string;
  /**
   * Returns true for errors that must not count towards opening the circuit
   * (for example a 404 for an unknown reference).
   */
  errorFilter?: (error: unknown) => boolean;
}

export type CircuitState = 'open' | 'halfOpen' | 'closed';

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  enabled: boolean;
  failures: number;
  fires: number;
}

type ObservableBreaker = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'enabled' | 'stats'
>;

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_ERROR_THRESHOLD_PERCENTAGE = 50;
const DEFAULT_RESET_TIMEOUT_MS = 30000;

@Injectable()
export class CircuitBreakerService {
  private readonly logger = logger();
  private readonly breakers = new Map<string, ObservableBreaker>();

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const name = options?.name || 'default';

    const breaker = new CircuitBreaker<TArgs, TResult>(fn, {
      timeout: options?.timeout ?? DEFAULT_TIMEOUT_MS,
      errorThresholdPercentage:
        options?.errorThresholdPercentage ?? DEFAULT_ERROR_THRESHOLD_PERCENTAGE,
      resetTimeout: options?.resetTimeout ?? DEFAULT_RESET_TIMEOUT_MS,
      errorFilter: options?.errorFilter,
      name,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.error(
        {
          circuitBreaker: name,
          error: error instanceof Error ? error.message : String(error),
        },
        'Circuit breaker failure',
      );
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerSnapshot | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;
    return this.snapshot(breaker);
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerSnapshot> {
    const states: Record<string, CircuitBreakerSnapshot> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.snapshot(breaker);
    });
    return states;
  }

  isOpen(name: string): boolean {
    return this.getCircuitBreakerState(name)?.state === 'open';
  }

  private snapshot(breaker: ObservableBreaker): CircuitBreakerSnapshot {
    let state: CircuitState = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      failures: breaker.stats.failures,
      fires: breaker.stats.fires,
    };
  }
}
