import {
  NewSubscriptionPlan,
  SubscriptionPlan,
  SubscriptionPlanChanges,
} from '../../domain/subscriptions/models';

export abstract class SubscriptionPlansRepository {
  abstract findById(id: string): Promise<SubscriptionPlan | null>;

  /** Cheapest first */
  abstract list(activeOnly: boolean): Promise<SubscriptionPlan[]>;

  abstract create(data: NewSubscriptionPlan): Promise<SubscriptionPlan>;

  abstract update(
    id: string,
    changes: SubscriptionPlanChanges,
  ): Promise<SubscriptionPlan | null>;
}
