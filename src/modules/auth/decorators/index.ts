export * from './auth.decorators';
export * from './current-user.decorator';
