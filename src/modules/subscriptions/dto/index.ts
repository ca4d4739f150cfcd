export * from './payment.dto';
export * from './plan.dto';
export * from './status.dto';
