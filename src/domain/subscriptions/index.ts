export * from './entitlement';
export * from './interfaces';
export * from './mappers/paychangu-mapper';
export * from './models';
