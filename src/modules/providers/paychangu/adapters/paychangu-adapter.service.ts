import { HttpException, HttpStatus, Injectable } from '@nestjs/common';
import {
  InvalidTransactionReferenceError,
  PaymentInitiationFailedError,
  PaymentVerificationUnavailableError,
} from '../../../../core/errors';
import { logger } from '../../../../core/logger/logger.config';
import {
  PaychanguMapper,
  PaymentInitiation,
  PaymentInitiationRequest,
  PaymentProviderAdapter,
  PaymentVerification,
} from '../../../../domain/subscriptions';
import { PaychanguApiClientService } from './paychangu-api-client.service';

const UNKNOWN_REFERENCE_STATUSES: number[] = [
  HttpStatus.BAD_REQUEST,
  HttpStatus.NOT_FOUND,
];

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

@Injectable()
export class PaychanguAdapter implements PaymentProviderAdapter {
  private readonly logger = logger();
  readonly providerName = 'paychangu';

  constructor(private readonly paychanguApiClient: PaychanguApiClientService) {}

  async initiatePayment(
    request: PaymentInitiationRequest,
  ): Promise<PaymentInitiation> {
    let body: unknown;
    try {
      body = await this.paychanguApiClient.createPayment({
        tx_ref: request.reference,
        amount: request.amount,
        currency: request.currency,
        email: request.email,
        first_name: request.firstName,
        last_name: request.lastName,
        callback_url: request.callbackUrl ?? undefined,
        return_url: request.returnUrl ?? undefined,
        customization: {
          title: request.title,
          description: request.description,
        },
      });
    } catch (error) {
      this.logger.error(
        { reference: request.reference, error: errorMessage(error) },
        'Failed to initiate payment',
      );
      throw new PaymentInitiationFailedError(error);
    }

    const initiation = PaychanguMapper.toInitiation(body, request.reference);
    if (!initiation) {
      this.logger.error(
        { reference: request.reference },
        'Payment initiation response has no checkout URL',
      );
      throw new PaymentInitiationFailedError();
    }

    return initiation;
  }

  async verifyTransaction(reference: string): Promise<PaymentVerification> {
    let body: unknown;
    try {
      body = await this.paychanguApiClient.verifyPayment(reference);
    } catch (error) {
      if (
        error instanceof HttpException &&
        UNKNOWN_REFERENCE_STATUSES.includes(error.getStatus())
      ) {
        throw new InvalidTransactionReferenceError(reference);
      }

      // Timeouts, 5xx and an open circuit all mean "try again later"
      this.logger.error(
        { reference, error: errorMessage(error) },
        'Failed to verify payment',
      );
      throw new PaymentVerificationUnavailableError(error);
    }

    const verification = PaychanguMapper.toVerification(body, reference);
    if (!verification) {
      this.logger.error({ reference }, 'Unreadable payment verification response');
      throw new PaymentVerificationUnavailableError();
    }

    return verification;
  }

  isAvailable(): boolean {
    return !this.paychanguApiClient.isCircuitOpen();
  }
}
