/**
 * Payment provider adapter
 *
 * Every payment provider the platform can take subscription payments through
 * implements this interface. Activation only ever talks to the adapter.
 */

import {
  PaymentInitiation,
  PaymentInitiationRequest,
  PaymentVerification,
} from '../models';

export const PAYMENT_PROVIDER_ADAPTER = Symbol('PAYMENT_PROVIDER_ADAPTER');

export interface PaymentProviderAdapter {
  /**
   * Provider name stored on each transaction (e.g. 'paychangu')
   */
  readonly providerName: string;

  /**
   * Open a hosted checkout for the given reference.
   *
   * @throws PaymentInitiationFailedError when the provider refuses or is unreachable
   */
  initiatePayment(request: PaymentInitiationRequest): Promise<PaymentInitiation>;

  /**
   * Ask the provider for the authoritative status of a reference.
   *
   * @throws InvalidTransactionReferenceError when the provider does not know it
   * @throws PaymentVerificationUnavailableError when the provider cannot be reached
   */
  verifyTransaction(reference: string): Promise<PaymentVerification>;

  /**
   * Circuit state of the provider client, for health checks
   */
  isAvailable(): boolean;
}
