import { HttpService } from '@nestjs/axios';
import { HttpException, HttpStatus, Inject, Injectable } from '@nestjs/common';
import { isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import { PaymentsConfig, paymentsConfig } from '../../../../core/config';
import { logger } from '../../../../core/logger/logger.config';
import {
  backoffDelayMs,
  delayWithJitter,
  parseRetryAfter,
} from '../../../../core/utils/delay.util';

export const PAYCHANGU_CIRCUIT = 'paychangu-api';

type HttpMethod = 'GET' | 'POST';

interface ProviderRequest {
  method: HttpMethod;
  endpoint: string;
  data?: unknown;
}

/**
 * Body of `POST /payment` (hosted checkout)
 */
export interface PaychanguPaymentRequest {
  tx_ref: string;
  amount: number;
  currency: string;
  email: string;
  first_name: string;
  last_name: string;
  callback_url?: string;
  return_url?: string;
  customization: {
    title: string;
    description: string;
  };
}

const isNonRetryableClientError = (error: unknown): boolean => {
  if (!(error instanceof HttpException)) return false;
  const status = error.getStatus();
  return status >= 400 && status < 500 && status !== HttpStatus.TOO_MANY_REQUESTS;
};

const describeProviderError = (data: unknown, fallback: string): string => {
  if (typeof data === 'string' && data.length > 0) return data;
  if (typeof data === 'object' && data !== null) {
    const message: unknown = Reflect.get(data, 'message');
    if (typeof message === 'string') return message;
  }
  return fallback;
};

@Injectable()
export class PaychanguApiClientService {
  private readonly logger = logger();
  private circuitBreaker: CircuitBreaker<[ProviderRequest], unknown> | null =
    null;

  constructor(
    private readonly httpService: HttpService,
    @Inject(paymentsConfig.KEY) private readonly config: PaymentsConfig,
    private readonly circuitBreakerService: CircuitBreakerService,
  ) {}

  /**
   * Open a hosted checkout.
   */
  createPayment(body: PaychanguPaymentRequest): Promise<unknown> {
    return this.getCircuitBreaker().fire({
      method: 'POST',
      endpoint: '/payment',
      data: body,
    });
  }

  verifyPayment(txRef: string): Promise<unknown> {
    return this.getCircuitBreaker().fire({
      method: 'GET',
      endpoint: `/verify-payment/${encodeURIComponent(txRef)}`,
    });
  }

  isCircuitOpen(): boolean {
    return this.circuitBreakerService.isOpen(PAYCHANGU_CIRCUIT);
  }

  private getCircuitBreaker(): CircuitBreaker<[ProviderRequest], unknown> {
    if (!this.circuitBreaker) {
      this.circuitBreaker = this.circuitBreakerService.createCircuitBreaker(
        (request: ProviderRequest) => this.makeRequestWithRetry(request),
        {
          name: PAYCHANGU_CIRCUIT,
          timeout: this.config.circuitBreaker.timeout,
          errorThresholdPercentage:
            this.config.circuitBreaker.errorThresholdPercentage,
          resetTimeout: this.config.circuitBreaker.resetTimeout,
          // An unknown reference says nothing about the provider's health
          errorFilter: isNonRetryableClientError,
        },
      );
    }
    return this.circuitBreaker;
  }

  /**
   * Retries rate-limited calls with backoff; every other failure is thrown
   * as an HttpException carrying the provider's status.
   */
  private async makeRequestWithRetry(
    request: ProviderRequest,
    attempt: number = 0,
  ): Promise<unknown> {
    try {
      return await this.makeRequest(request);
    } catch (error) {
      const statusCode = isAxiosError(error) ? error.response?.status : undefined;

      if (
        statusCode === HttpStatus.TOO_MANY_REQUESTS &&
        attempt < this.config.maxRetries
      ) {
        const retryAfterHeader: unknown = isAxiosError(error)
          ? error.response?.headers['retry-after']
          : undefined;
        const retryAfter = parseRetryAfter(
          typeof retryAfterHeader === 'string' ? retryAfterHeader : undefined,
        );
        const backoffDelay = backoffDelayMs(
          attempt,
          this.config.retryBackoffBaseMs,
        );
        const waitTime = Math.max(retryAfter, backoffDelay);

        this.logger.warn(
          {
            endpoint: request.endpoint,
            method: request.method,
            attempt,
            waitTime,
            nextAttempt: attempt + 1,
            maxRetries: this.config.maxRetries,
          },
          'Rate limit hit, retrying with backoff',
        );

        await delayWithJitter(waitTime, 30);
        return this.makeRequestWithRetry(request, attempt + 1);
      }

      if (statusCode === HttpStatus.TOO_MANY_REQUESTS) {
        this.logger.error(
          { endpoint: request.endpoint, method: request.method, attempt },
          'Rate limit exceeded - max retries exhausted',
        );
      }

      throw this.toHttpException(error, request);
    }
  }

  private async makeRequest(request: ProviderRequest): Promise<unknown> {
    const url = `${this.config.baseUrl}${request.endpoint}`;

    this.logger.debug({ method: request.method, url }, 'Making HTTP request');

    const response = await firstValueFrom(
      this.httpService.request<unknown>({
        method: request.method,
        url,
        data: request.data,
        timeout: this.config.apiCallTimeoutMs,
        headers: {
          Authorization: `Bearer ${this.config.secretKey}`,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      }),
    );

    return response.data;
  }

  private toHttpException(error: unknown, request: ProviderRequest): HttpException {
    if (error instanceof HttpException) return error;

    const response = isAxiosError(error) ? error.response : undefined;
    // No response at all means a timeout or a connection failure
    const statusCode = response?.status ?? HttpStatus.BAD_GATEWAY;
    const errorMessage = describeProviderError(
      response?.data,
      error instanceof Error ? error.message : 'PayChangu API request failed',
    );

    this.logger.error(
      {
        endpoint: request.endpoint,
        method: request.method,
        statusCode,
        errorMessage,
      },
      'PayChangu API request failed',
    );

    return new HttpException(
      {
        statusCode,
        message: 'PayChangu API error',
        error: errorMessage,
        endpoint: request.endpoint,
      },
      statusCode,
    );
  }
}
