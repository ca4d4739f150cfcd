import { DynamicModule, INestApplication, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import {
  appConfig,
  authConfig,
  databaseConfig,
  mailConfig,
  paymentsConfig,
} from '../../src/core/config';
import { CoreModule } from '../../src/core/core.module';
import { DomainExceptionFilter } from '../../src/core/errors';
import { Clock } from '../../src/core/time/clock';
import { createValidationPipe } from '../../src/core/validation/validation-pipe';
import {
  PaymentTransactionsRepository,
  SubscriptionPlansRepository,
  UsersRepository,
} from '../../src/database/repositories';
import { SessionTokens } from '../../src/domain/auth';
import { PAYMENT_PROVIDER_ADAPTER } from '../../src/domain/subscriptions';
import { AuthModule } from '../../src/modules/auth/auth.module';
import { SubscriptionsModule } from '../../src/modules/subscriptions/subscriptions.module';
import { UsersModule } from '../../src/modules/users/users.module';
import { FakePaymentProvider } from './fake-payment-provider';
import { FixedClock } from './fixed-clock';
import {
  InMemoryPaymentTransactionsRepository,
  InMemorySubscriptionPlansRepository,
  InMemoryUsersRepository,
} from './in-memory-repositories';

@Module({})
class InMemoryPersistenceModule {
  static register(
    users: InMemoryUsersRepository,
    plans: InMemorySubscriptionPlansRepository,
    transactions: InMemoryPaymentTransactionsRepository,
  ): DynamicModule {
    return {
      module: InMemoryPersistenceModule,
      global: true,
      providers: [
        { provide: UsersRepository, useValue: users },
        { provide: SubscriptionPlansRepository, useValue: plans },
        { provide: PaymentTransactionsRepository, useValue: transactions },
      ],
      exports: [
        UsersRepository,
        SubscriptionPlansRepository,
        PaymentTransactionsRepository,
      ],
    };
  }
}

export interface TestApp {
  app: INestApplication;
  clock: FixedClock;
  users: InMemoryUsersRepository;
  plans: InMemorySubscriptionPlansRepository;
  transactions: InMemoryPaymentTransactionsRepository;
  provider: FakePaymentProvider;
  http: () => ReturnType<typeof request>;
}

/**
 * The feature modules behind the real pipe, filter and prefix, with the
 * database and payment provider replaced by in-process stand-ins.
 */
export const createTestApp = async (): Promise<TestApp> => {
  const clock = new FixedClock();
  const users = new InMemoryUsersRepository(clock);
  const plans = new InMemorySubscriptionPlansRepository(clock);
  const transactions = new InMemoryPaymentTransactionsRepository(users, clock);
  const provider = new FakePaymentProvider();

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [appConfig, authConfig, databaseConfig, paymentsConfig, mailConfig],
      }),
      CoreModule,
      InMemoryPersistenceModule.register(users, plans, transactions),
      AuthModule,
      UsersModule,
      SubscriptionsModule,
    ],
  })
    .overrideProvider(Clock)
    .useValue(clock)
    .overrideProvider(PAYMENT_PROVIDER_ADAPTER)
    .useValue(provider)
    .compile();

  const app = moduleRef.createNestApplication({ logger: false });
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new DomainExceptionFilter());
  app.setGlobalPrefix('api');
  await app.init();

  return {
    app,
    clock,
    users,
    plans,
    transactions,
    provider,
    http: () => request(app.getHttpServer()),
  };
};

export interface RegisteredUser {
  id: string;
  username: string;
  password: string;
  tokens: SessionTokens;
}

export const registerUser = async (
  testApp: TestApp,
  username: string,
): Promise<RegisteredUser> => {
  const password = 'test-password';
  const response = await testApp
    .http()
    .post('/api/auth/register')
    .send({
      username,
      email: `${username}@example.com`,
      first_name: 'Test',
      last_name: 'User',
      phone_number: '0999000000',
      password,
    })
    .expect(201);

  const principal = await testApp.users.findByUsername(username);
  if (!principal) throw new Error(`Registration of ${username} did not persist`);

  return { id: principal.id, username, password, tokens: response.body };
};

export const bearer = (token: string): string => `Bearer ${token}`;
