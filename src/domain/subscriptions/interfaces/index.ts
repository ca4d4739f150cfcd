export * from './payment-provider-adapter.interface';
