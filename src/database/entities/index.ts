import { PaymentTransactionEntity } from './payment-transaction.entity';
import { SubscriptionPlanEntity } from './subscription-plan.entity';
import { UserEntity } from './user.entity';

export { PaymentTransactionEntity, SubscriptionPlanEntity, UserEntity };

export const ENTITIES = [
  UserEntity,
  SubscriptionPlanEntity,
  PaymentTransactionEntity,
];
