/**
 * Payment model
 *
 * Provider-agnostic view of a checkout and of its verification result.
 */

/**
 * Payment status as reported by the provider
 */
export enum PaymentStatus {
  SUCCEEDED = 'succeeded',
  PENDING = 'pending',
  FAILED = 'failed',
}

/**
 * Everything a provider needs to open a hosted checkout
 */
export interface PaymentInitiationRequest {
  reference: string;
  amount: number;
  currency: string;
  email: string;
  firstName: string;
  lastName: string;
  callbackUrl: string | null;
  returnUrl: string | null;
  title: string;
  description: string;
}

export interface PaymentInitiation {
  reference: string;
  checkoutUrl: string;
}

/**
 * Verification result for one transaction reference
 */
export interface PaymentVerification {
  reference: string;
  status: PaymentStatus;
  /** Amount actually paid, when the provider reports it */
  amount: number | null;
  currency: string | null;
  paidAt: Date | null;
  /**
   * Provider-specific raw data
   */
  providerData?: Record<string, unknown>;
}
