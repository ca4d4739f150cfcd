export * from './token-claims.model';
