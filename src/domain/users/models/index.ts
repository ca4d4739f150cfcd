export * from './principal.model';
