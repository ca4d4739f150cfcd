export interface SubscriptionPlan {
  id: string;
  name: string;
  description: string;
  /** Non-negative, in `currency` */
  price: number;
  /** ISO 4217 code */
  currency: string;
  /** Strictly positive */
  durationDays: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date | null;
}

export type NewSubscriptionPlan = Pick<
  SubscriptionPlan,
  'name' | 'description' | 'price' | 'currency' | 'durationDays' | 'isActive'
>;

export type SubscriptionPlanChanges = Partial<NewSubscriptionPlan>;

export const DEFAULT_PLAN_CURRENCY = 'MWK';
