import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { PaychanguModule } from '../providers/paychangu/paychangu.module';
import { PaymentsController } from './controllers/payments.controller';
import { SubscriptionPlansController } from './controllers/subscription-plans.controller';
import { SubscriptionStatusController } from './controllers/subscription-status.controller';
import { SubscriptionActivationService } from './services/subscription-activation.service';
import { SubscriptionPlansService } from './services/subscription-plans.service';
import { SubscriptionStatusService } from './services/subscription-status.service';

@Module({
  imports: [AuthModule, PaychanguModule],
  controllers: [
    SubscriptionPlansController,
    PaymentsController,
    SubscriptionStatusController,
  ],
  providers: [
    SubscriptionPlansService,
    SubscriptionActivationService,
    SubscriptionStatusService,
  ],
  exports: [SubscriptionActivationService],
})
export class SubscriptionsModule {}
