export * from './login.dto';
export * from './password-reset.dto';
export * from './refresh-token.dto';
export * from './register.dto';
export * from './user-response.dto';
