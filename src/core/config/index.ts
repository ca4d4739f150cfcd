export * from './app.config';
export * from './auth.config';
export * from './database.config';
export * from './env.validation';
export * from './mail.config';
export * from './payments.config';
