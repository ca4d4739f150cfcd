import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { CredentialsInvalidError, ForbiddenError } from '../../../core/errors';
import { AuthenticatedRequest } from '../types/authenticated-request';

@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) throw new CredentialsInvalidError();
    if (!user.isAdmin) throw new ForbiddenError();
    return true;
  }
}
