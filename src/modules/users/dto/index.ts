export * from './list-users-query.dto';
export * from './update-user.dto';
