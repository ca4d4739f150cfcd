import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { CredentialsInvalidError } from '../../../core/errors';
import { SubscriptionPolicyService } from '../services/subscription-policy.service';
import { AuthenticatedRequest } from '../types/authenticated-request';

/**
 * Runs after {@link JwtAuthGuard}; rejects principals without an active
 * subscription with 403.
 */
@Injectable()
export class SubscriptionGuard implements CanActivate {
  constructor(private readonly policy: SubscriptionPolicyService) {}

  canActivate(context: ExecutionContext): boolean {
    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) throw new CredentialsInvalidError();

    this.policy.requireActiveSubscription(user);
    return true;
  }
}
