/**
 * Barrel export for subscription domain models
 */

export * from './payment-transaction.model';
export * from './payment.model';
export * from './subscription-plan.model';
export * from './subscription.model';
