import { SubscriptionState } from '../../../domain/subscriptions/models';
import { PlanResponseDto } from './plan.dto';

export interface SubscriptionStatusDto {
  is_subscribed: boolean;
  subscription_expiry: string | null;
  is_active: boolean;
  state: SubscriptionState;
  current_plan: PlanResponseDto | null;
}

export interface AccessGrantDto {
  granted: true;
  subscription_expiry: string | null;
}
