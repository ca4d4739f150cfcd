import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { RequestTimeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { PaychanguMapper } from '../../../domain/subscriptions';
import { Principal } from '../../../domain/users';
import { Authenticated } from '../../auth/decorators/auth.decorators';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import {
  InitiatePaymentDto,
  PaychanguWebhookDto,
  PaymentCheckoutDto,
  PaymentVerificationResultDto,
  WebhookAcknowledgementDto,
} from '../dto';
import { SubscriptionActivationService } from '../services/subscription-activation.service';

const PROVIDER_CALL_TIMEOUT_MS = 60000;

@Controller('subscriptions')
@UseInterceptors(TimeoutInterceptor)
export class PaymentsController {
  constructor(
    private readonly activation: SubscriptionActivationService,
    private readonly payloadValidator: PayloadValidatorService,
  ) {}

  @Post('initiate-payment')
  @HttpCode(HttpStatus.OK)
  @Authenticated()
  @RequestTimeout(PROVIDER_CALL_TIMEOUT_MS)
  initiatePayment(
    @CurrentUser() user: Principal,
    @Body() body: InitiatePaymentDto,
  ): Promise<PaymentCheckoutDto> {
    return this.activation.initiatePayment(user, {
      planId: body.plan_id,
      email: body.email,
      callbackUrl: body.callback_url,
      returnUrl: body.return_url,
    });
  }

  @Get('verify-payment/:reference')
  @Authenticated()
  @RequestTimeout(PROVIDER_CALL_TIMEOUT_MS)
  verifyPayment(
    @CurrentUser() user: Principal,
    @Param('reference') reference: string,
  ): Promise<PaymentVerificationResultDto> {
    return this.activation.verifyPayment(user, reference);
  }

  /**
   * Untyped body: the provider sends fields the whitelist pipe would reject.
   */
  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  @RequestTimeout(PROVIDER_CALL_TIMEOUT_MS)
  async webhook(@Body() payload: unknown): Promise<WebhookAcknowledgementDto> {
    const event = await this.payloadValidator.validatePayload(
      payload,
      PaychanguWebhookDto,
      ['tx_ref', 'status'],
    );

    await this.activation.handleWebhook(
      event.tx_ref,
      PaychanguMapper.mapStatus(event.status),
    );
    return { status: 'success' };
  }
}
