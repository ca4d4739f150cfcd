export * from './typeorm-payment-transactions.repository';
export * from './typeorm-subscription-plans.repository';
export * from './typeorm-users.repository';
