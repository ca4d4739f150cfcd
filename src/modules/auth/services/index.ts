export * from './auth.service';
export * from './password-hasher.service';
export * from './password-reset.service';
export * from './session-resolver.service';
export * from './subscription-policy.service';
export * from './token-codec.service';
