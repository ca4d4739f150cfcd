import { HttpService } from '@nestjs/axios';
import { HttpException } from '@nestjs/common';
import axios, {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import { PaymentsConfig } from '../../../../core/config';
import {
  PAYCHANGU_CIRCUIT,
  PaychanguApiClientService,
} from './paychangu-api-client.service';

const config: PaymentsConfig = {
  baseUrl: 'https://payments.test',
  secretKey: 'test-secret',
  maxRetries: 2,
  retryBackoffBaseMs: 1,
  apiCallTimeoutMs: 1000,
  callbackUrl: null,
  returnUrl: null,
  circuitBreaker: { timeout: 5000, errorThresholdPercentage: 50, resetTimeout: 1000 },
};

type Reply = { status: number; data: unknown; headers?: Record<string, string> };

/** Axios adapter that replays queued replies and records each request */
const scriptedTransport = (replies: Reply[]) => {
  const seen: InternalAxiosRequestConfig[] = [];

  const adapter = async (
    request: InternalAxiosRequestConfig,
  ): Promise<AxiosResponse<unknown>> => {
    seen.push(request);
    const reply = replies.shift();
    if (!reply) {
      throw new AxiosError('socket hang up', 'ECONNRESET', request);
    }

    const response: AxiosResponse<unknown> = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config: request,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        'ERR_BAD_RESPONSE',
        request,
        undefined,
        response,
      );
    }
    return response;
  };

  return { seen, http: new HttpService(axios.create({ adapter })) };
};

describe('PaychanguApiClientService', () => {
  let breakers: CircuitBreakerService;

  beforeEach(() => {
    breakers = new CircuitBreakerService();
  });

  it('calls the verification endpoint with the secret key', async () => {
    const { seen, http } = scriptedTransport([
      { status: 200, data: { data: { status: 'success' } } },
    ]);
    const client = new PaychanguApiClientService(http, config, breakers);

    await expect(client.verifyPayment('sub-abc')).resolves.toEqual({
      data: { status: 'success' },
    });
    expect(seen[0].method).toBe('get');
    expect(seen[0].url).toBe('https://payments.test/verify-payment/sub-abc');
    expect(seen[0].headers.Authorization).toBe('Bearer test-secret');
  });

  it('retries rate-limited calls', async () => {
    const { seen, http } = scriptedTransport([
      { status: 429, data: {}, headers: { 'retry-after': '0' } },
      { status: 200, data: { data: { checkout_url: 'https://checkout.test/x' } } },
    ]);
    const client = new PaychanguApiClientService(http, config, breakers);

    await expect(
      client.createPayment({
        tx_ref: 'sub-abc',
        amount: 5000,
        currency: 'MWK',
        email: 'dan@example.com',
        first_name: 'Dan',
        last_name: 'Tembo',
        customization: { title: 'Monthly', description: 'Thirty days' },
      }),
    ).resolves.toEqual({ data: { checkout_url: 'https://checkout.test/x' } });
    expect(seen).toHaveLength(2);
  });

  it('surfaces provider statuses as HttpExceptions', async () => {
    const { http } = scriptedTransport([
      { status: 404, data: { message: 'Transaction not found' } },
    ]);
    const client = new PaychanguApiClientService(http, config, breakers);

    const failure = await client.verifyPayment('sub-abc').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpException);
    if (failure instanceof HttpException) {
      expect(failure.getStatus()).toBe(404);
      expect(failure.getResponse()).toMatchObject({ error: 'Transaction not found' });
    }
  });

  it('reports a lost connection as a bad gateway', async () => {
    const { http } = scriptedTransport([]);
    const client = new PaychanguApiClientService(http, config, breakers);

    const failure = await client.verifyPayment('sub-abc').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(HttpException);
    if (failure instanceof HttpException) {
      expect(failure.getStatus()).toBe(502);
    }
  });

  it('keeps the circuit closed on unknown references', async () => {
    const { http } = scriptedTransport(
      Array.from({ length: 5 }, () => ({ status: 404, data: {} })),
    );
    const client = new PaychanguApiClientService(http, config, breakers);

    for (let i = 0; i < 5; i++) {
      await client.verifyPayment('sub-abc').catch((error: unknown) => error);
    }

    expect(client.isCircuitOpen()).toBe(false);
    expect(breakers.getCircuitBreakerState(PAYCHANGU_CIRCUIT)?.state).toBe('closed');
  });
});
