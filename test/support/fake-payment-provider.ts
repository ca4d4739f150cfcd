import { InvalidTransactionReferenceError } from '../../src/core/errors';
import {
  PaymentInitiation,
  PaymentInitiationRequest,
  PaymentProviderAdapter,
  PaymentStatus,
  PaymentVerification,
} from '../../src/domain/subscriptions';

/**
 * Payment provider stand-in. References are unknown to it until they are
 * settled, failed or broken by the test.
 */
export class FakePaymentProvider implements PaymentProviderAdapter {
  readonly providerName = 'fake-provider';
  readonly initiations: PaymentInitiationRequest[] = [];
  verifyCalls = 0;
  initiationError: Error | null = null;
  available = true;

  private readonly outcomes = new Map<string, PaymentVerification | Error>();

  async initiatePayment(request: PaymentInitiationRequest): Promise<PaymentInitiation> {
    if (this.initiationError) throw this.initiationError;
    this.initiations.push(request);
    return {
      reference: request.reference,
      checkoutUrl: `https://checkout.test/pay/${request.reference}`,
    };
  }

  async verifyTransaction(reference: string): Promise<PaymentVerification> {
    this.verifyCalls += 1;
    const outcome = this.outcomes.get(reference);
    if (outcome instanceof Error) throw outcome;
    if (!outcome) throw new InvalidTransactionReferenceError(reference);
    return outcome;
  }

  isAvailable(): boolean {
    return this.available;
  }

  settle(reference: string, overrides: Partial<PaymentVerification> = {}): void {
    this.outcomes.set(reference, {
      reference,
      status: PaymentStatus.SUCCEEDED,
      amount: null,
      currency: null,
      paidAt: null,
      ...overrides,
    });
  }

  breakVerification(reference: string, error: Error): void {
    this.outcomes.set(reference, error);
  }

  lastReference(): string {
    const last = this.initiations[this.initiations.length - 1];
    if (!last) throw new Error('No payment was initiated');
    return last.reference;
  }
}
