import { QueryFailedError } from 'typeorm';
import { DuplicateIdentityError } from '../../core/errors';

const UNIQUE_VIOLATION = '23505';

const FIELD_BY_CONSTRAINT: Record<string, 'username' | 'email'> = {
  uq_users_username: 'username',
  uq_users_email: 'email',
};

/**
 * Translate a pg unique violation on the users table, or return the error
 * unchanged.
 */
export const toDuplicateIdentity = (error: unknown): unknown => {
  if (!(error instanceof QueryFailedError)) return error;

  const code: unknown = Reflect.get(error.driverError, 'code');
  const constraint: unknown = Reflect.get(error.driverError, 'constraint');
  if (code !== UNIQUE_VIOLATION || typeof constraint !== 'string') return error;

  const field = FIELD_BY_CONSTRAINT[constraint];
  return field ? new DuplicateIdentityError(field) : error;
};
