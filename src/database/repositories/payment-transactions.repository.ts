import {
  NewPaymentTransaction,
  PaymentTransaction,
  SubscriptionGrant,
} from '../../domain/subscriptions/models';
import { Principal, SubscriptionHolder } from '../../domain/users';

export interface CompletionOutcome {
  /** False when the reference had already been completed */
  applied: boolean;
  transaction: PaymentTransaction;
  principal: Principal;
}

export abstract class PaymentTransactionsRepository {
  abstract create(data: NewPaymentTransaction): Promise<PaymentTransaction>;

  abstract findByReference(reference: string): Promise<PaymentTransaction | null>;

  abstract attachCheckoutUrl(reference: string, checkoutUrl: string): Promise<void>;

  /** No-op unless the transaction is still pending */
  abstract markFailed(reference: string): Promise<void>;

  /**
   * Move the transaction to COMPLETED and write `grant(owner)` to its owner,
   * atomically.
   *
   * Only the first call for a reference applies the grant; later calls return
   * `applied: false` with the owner untouched. Returns null for an unknown
   * reference.
   */
  abstract completeAndGrant(
    reference: string,
    completedAt: Date,
    grant: (owner: SubscriptionHolder) => SubscriptionGrant,
  ): Promise<CompletionOutcome | null>;

  abstract findLatestCompleted(userId: string): Promise<PaymentTransaction | null>;
}
