import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  InvalidTransactionReferenceError,
  NotFoundError,
  PaymentNotCompletedError,
} from '../../../core/errors';
import { PaymentsConfig, paymentsConfig } from '../../../core/config';
import { logger } from '../../../core/logger/logger.config';
import { Clock } from '../../../core/time/clock';
import {
  CompletionOutcome,
  PaymentTransactionsRepository,
  SubscriptionPlansRepository,
} from '../../../database/repositories';
import {
  grantSubscription,
  PAYMENT_PROVIDER_ADAPTER,
  PaymentProviderAdapter,
  PaymentStatus,
  PaymentTransaction,
  TRANSACTION_REFERENCE_PATTERN,
  TransactionStatus,
} from '../../../domain/subscriptions';
import { Principal } from '../../../domain/users';
import { PaymentCheckoutDto, PaymentVerificationResultDto } from '../dto';

export interface CheckoutRequest {
  planId: string;
  email?: string;
  callbackUrl?: string;
  returnUrl?: string;
}

export type WebhookOutcome =
  | 'ignored'
  | 'activated'
  | 'already_processed'
  | 'rejected';

/**
 * Turns verified provider payments into subscription time.
 *
 * A reference grants time at most once: the grant is written in the same
 * database transaction that moves its payment transaction to COMPLETED, and
 * only the first such move succeeds. The provider is always asked for the
 * authoritative status before that, never trusted from the caller.
 */
@Injectable()
export class SubscriptionActivationService {
  private readonly logger = logger();

  constructor(
    @Inject(PAYMENT_PROVIDER_ADAPTER)
    private readonly provider: PaymentProviderAdapter,
    private readonly plans: SubscriptionPlansRepository,
    private readonly transactions: PaymentTransactionsRepository,
    @Inject(paymentsConfig.KEY) private readonly config: PaymentsConfig,
    private readonly clock: Clock,
  ) {}

  async initiatePayment(
    principal: Principal,
    request: CheckoutRequest,
  ): Promise<PaymentCheckoutDto> {
    const plan = await this.plans.findById(request.planId);
    if (!plan || !plan.isActive) {
      throw new NotFoundError('Subscription plan');
    }

    const reference = `sub-${randomUUID()}`;
    await this.transactions.create({
      reference,
      userId: principal.id,
      planId: plan.id,
      amount: plan.price,
      currency: plan.currency,
      durationDays: plan.durationDays,
      provider: this.provider.providerName,
    });

    let checkoutUrl: string;
    try {
      const initiation = await this.provider.initiatePayment({
        reference,
        amount: plan.price,
        currency: plan.currency,
        email: request.email ?? principal.email,
        firstName: principal.firstName,
        lastName: principal.lastName,
        callbackUrl: request.callbackUrl ?? this.config.callbackUrl,
        returnUrl: request.returnUrl ?? this.config.returnUrl,
        title: `${plan.name} Subscription`,
        description: plan.description,
      });
      checkoutUrl = initiation.checkoutUrl;
    } catch (error) {
      await this.transactions.markFailed(reference);
      throw error;
    }

    await this.transactions.attachCheckoutUrl(reference, checkoutUrl);

    this.logger.info(
      { userId: principal.id, planId: plan.id, reference },
      'Payment initiated',
    );

    return {
      payment_url: checkoutUrl,
      transaction_reference: reference,
      verification_url: `/api/subscriptions/verify-payment/${reference}`,
      plan_id: plan.id,
    };
  }

  /**
   * Verification requested by the paying user. Replays of a completed
   * reference answer from the stored transaction.
   */
  async verifyPayment(
    principal: Principal,
    reference: string,
  ): Promise<PaymentVerificationResultDto> {
    const transaction = await this.findTransaction(reference);
    if (transaction.userId !== principal.id) {
      throw new InvalidTransactionReferenceError(reference);
    }

    if (transaction.status === TransactionStatus.COMPLETED) {
      return this.toVerificationResult(transaction, principal);
    }

    const outcome = await this.activate(transaction);
    return this.toVerificationResult(outcome.transaction, outcome.principal);
  }

  /**
   * Provider notification. Only a reported success leads anywhere, and then
   * only after the provider confirms it. A payment the provider has settled
   * without paying the plan in full is acknowledged as `rejected`; one still
   * pending, or a provider that cannot be reached, fails so the provider
   * delivers again.
   */
  async handleWebhook(
    reference: string,
    reportedStatus: PaymentStatus,
  ): Promise<WebhookOutcome> {
    if (reportedStatus !== PaymentStatus.SUCCEEDED) {
      this.logger.info({ reference, reportedStatus }, 'Webhook ignored');
      return 'ignored';
    }

    const transaction = await this.findTransaction(reference);
    if (transaction.status === TransactionStatus.COMPLETED) {
      this.logger.info({ reference }, 'Webhook for already processed payment');
      return 'already_processed';
    }
    if (transaction.status === TransactionStatus.FAILED) {
      this.logger.info({ reference }, 'Webhook for failed payment');
      return 'rejected';
    }

    let outcome: CompletionOutcome;
    try {
      outcome = await this.activate(transaction);
    } catch (error) {
      if (error instanceof PaymentNotCompletedError && error.isFinal) {
        this.logger.warn(
          { reference, reason: error.message },
          'Webhook acknowledged for rejected payment',
        );
        return 'rejected';
      }
      throw error;
    }
    return outcome.applied ? 'activated' : 'already_processed';
  }

  private async findTransaction(reference: string): Promise<PaymentTransaction> {
    if (!TRANSACTION_REFERENCE_PATTERN.test(reference)) {
      throw new InvalidTransactionReferenceError(reference);
    }

    const transaction = await this.transactions.findByReference(reference);
    if (!transaction) {
      throw new InvalidTransactionReferenceError(reference);
    }
    return transaction;
  }

  private async activate(transaction: PaymentTransaction): Promise<CompletionOutcome> {
    const { reference } = transaction;
    const verification = await this.provider.verifyTransaction(reference);

    if (verification.status !== PaymentStatus.SUCCEEDED) {
      const isFinal = verification.status === PaymentStatus.FAILED;
      if (isFinal) {
        await this.transactions.markFailed(reference);
      }
      this.logger.info(
        { reference, status: verification.status },
        'Payment not completed',
      );
      throw new PaymentNotCompletedError(
        undefined,
        { status: verification.status },
        isFinal,
      );
    }

    if (verification.amount !== null && verification.amount < transaction.amount) {
      this.logger.warn(
        { reference, paid: verification.amount, expected: transaction.amount },
        'Paid amount below plan price',
      );
      await this.transactions.markFailed(reference);
      throw new PaymentNotCompletedError('Paid amount is below the plan price');
    }

    if (
      verification.currency !== null &&
      verification.currency.toUpperCase() !== transaction.currency.toUpperCase()
    ) {
      this.logger.warn(
        { reference, paid: verification.currency, expected: transaction.currency },
        'Payment currency mismatch',
      );
      await this.transactions.markFailed(reference);
      throw new PaymentNotCompletedError('Payment currency does not match the plan');
    }

    const now = this.clock.now();
    const outcome = await this.transactions.completeAndGrant(
      reference,
      now,
      (owner) => grantSubscription(owner, transaction.durationDays, now),
    );
    if (!outcome) {
      // The owner was deleted while the provider was being asked
      throw new InvalidTransactionReferenceError(reference);
    }

    if (outcome.applied) {
      this.logger.info(
        {
          reference,
          userId: outcome.principal.id,
          subscriptionExpiry: outcome.principal.subscriptionExpiry,
        },
        'Subscription activated',
      );
    } else {
      this.logger.info({ reference }, 'Payment was already applied');
    }

    return outcome;
  }

  private toVerificationResult(
    transaction: PaymentTransaction,
    principal: Principal,
  ): PaymentVerificationResultDto {
    return {
      status: 'success',
      amount: transaction.amount,
      currency: transaction.currency,
      transaction_reference: transaction.reference,
      payment_date: (transaction.completedAt ?? this.clock.now()).toISOString(),
      plan_id: transaction.planId,
      expiry_date: principal.subscriptionExpiry?.toISOString() ?? null,
    };
  }
}
