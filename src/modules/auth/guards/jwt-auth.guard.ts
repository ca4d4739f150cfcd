import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { CredentialsInvalidError } from '../../../core/errors';
import { SessionResolverService } from '../services/session-resolver.service';
import { AuthenticatedRequest } from '../types/authenticated-request';

/**
 * The token of an `Authorization: Bearer <token>` header, or null.
 */
export const extractBearerToken = (header: string | undefined): string | null => {
  if (!header) return null;
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (rest.length > 0 || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }
  return token;
};

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly sessionResolver: SessionResolverService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new CredentialsInvalidError();
    }

    request.user = await this.sessionResolver.resolve(token);
    return true;
  }
}
