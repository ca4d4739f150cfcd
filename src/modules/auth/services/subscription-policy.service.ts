import { Injectable } from '@nestjs/common';
import { SubscriptionRequiredError } from '../../../core/errors';
import { Clock } from '../../../core/time/clock';
import { isEntitled, subscriptionStateOf } from '../../../domain/subscriptions/entitlement';
import { SubscriptionState } from '../../../domain/subscriptions/models';
import { SubscriptionHolder } from '../../../domain/users';

/**
 * Entitlement checks against the current time.
 */
@Injectable()
export class SubscriptionPolicyService {
  constructor(private readonly clock: Clock) {}

  isEntitled(holder: SubscriptionHolder): boolean {
    return isEntitled(holder, this.clock.now());
  }

  stateOf(holder: SubscriptionHolder): SubscriptionState {
    return subscriptionStateOf(holder, this.clock.now());
  }

  requireActiveSubscription<T extends SubscriptionHolder>(holder: T): T {
    if (!this.isEntitled(holder)) {
      throw new SubscriptionRequiredError();
    }
    return holder;
  }
}
