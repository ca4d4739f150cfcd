import { Controller, Get } from '@nestjs/common';
import { Principal } from '../../../domain/users';
import {
  Authenticated,
  RequiresSubscription,
} from '../../auth/decorators/auth.decorators';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { AccessGrantDto, SubscriptionStatusDto } from '../dto';
import { SubscriptionStatusService } from '../services/subscription-status.service';

@Controller('subscriptions')
export class SubscriptionStatusController {
  constructor(private readonly statusService: SubscriptionStatusService) {}

  @Get('status')
  @Authenticated()
  status(@CurrentUser() user: Principal): Promise<SubscriptionStatusDto> {
    return this.statusService.statusOf(user);
  }

  /**
   * Gate for subscription-only content.
   */
  @Get('access')
  @RequiresSubscription()
  access(@CurrentUser() user: Principal): AccessGrantDto {
    return {
      granted: true,
      subscription_expiry: user.subscriptionExpiry?.toISOString() ?? null,
    };
  }
}
