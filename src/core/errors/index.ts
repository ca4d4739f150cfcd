export * from './domain-exception.filter';
export * from './domain.errors';
