export * from './payment-transactions.repository';
export * from './subscription-plans.repository';
export * from './users.repository';
