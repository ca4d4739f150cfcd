import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import {
  PAYMENT_PROVIDER_ADAPTER,
  PaymentProviderAdapter,
} from '../../domain/subscriptions';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(
    private readonly circuitBreakerService: CircuitBreakerService,
    @Inject(PAYMENT_PROVIDER_ADAPTER)
    private readonly paymentProvider: PaymentProviderAdapter,
  ) {
    super();
  }

  checkCircuitBreakers(): HealthIndicatorResult {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.entries(allBreakers).filter(
      ([, state]) => state.state === 'open',
    );

    const isHealthy = openBreakers.length === 0;

    return this.getStatus('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers.length,
      breakers: allBreakers,
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
  }

  /**
   * Payment verification depends on this provider; an open circuit means
   * activations are currently answered with 502.
   */
  checkPaymentProvider(): HealthIndicatorResult {
    const isHealthy = this.paymentProvider.isAvailable();

    return this.getStatus('payment-provider', isHealthy, {
      provider: this.paymentProvider.providerName,
      message: isHealthy
        ? 'Payment provider reachable'
        : 'Payment provider circuit open',
    });
  }
}
