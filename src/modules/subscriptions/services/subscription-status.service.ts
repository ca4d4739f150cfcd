import { Injectable } from '@nestjs/common';
import {
  PaymentTransactionsRepository,
  SubscriptionPlansRepository,
} from '../../../database/repositories';
import { Principal } from '../../../domain/users';
import { SubscriptionPolicyService } from '../../auth/services/subscription-policy.service';
import { SubscriptionStatusDto, toPlanResponse } from '../dto';

@Injectable()
export class SubscriptionStatusService {
  constructor(
    private readonly policy: SubscriptionPolicyService,
    private readonly transactions: PaymentTransactionsRepository,
    private readonly plans: SubscriptionPlansRepository,
  ) {}

  /**
   * `current_plan` is the plan of the most recent completed payment.
   */
  async statusOf(principal: Principal): Promise<SubscriptionStatusDto> {
    const latest = await this.transactions.findLatestCompleted(principal.id);
    const plan = latest ? await this.plans.findById(latest.planId) : null;

    return {
      is_subscribed: principal.isSubscribed,
      subscription_expiry: principal.subscriptionExpiry?.toISOString() ?? null,
      is_active: this.policy.isEntitled(principal),
      state: this.policy.stateOf(principal),
      current_plan: plan ? toPlanResponse(plan) : null,
    };
  }
}
