import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { CredentialsInvalidError } from '../../../core/errors';
import { Principal } from '../../../domain/users';
import { AuthenticatedRequest } from '../types/authenticated-request';

export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Principal => {
    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) throw new CredentialsInvalidError();
    return user;
  },
);
