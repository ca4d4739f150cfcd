export * from './admin.guard';
export * from './jwt-auth.guard';
export * from './subscription.guard';
