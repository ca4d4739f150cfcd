import { Global, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseConfig, databaseConfig } from '../core/config';
import { ENTITIES } from './entities';
import { InitialSchema1729000000000 } from './migrations/1729000000000-initial-schema';
import {
  PaymentTransactionsRepository,
  SubscriptionPlansRepository,
  UsersRepository,
} from './repositories';
import {
  TypeOrmPaymentTransactionsRepository,
  TypeOrmSubscriptionPlansRepository,
  TypeOrmUsersRepository,
} from './typeorm';

/**
 * PostgreSQL persistence. Feature modules depend on the abstract repositories
 * only.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (config: DatabaseConfig): TypeOrmModuleOptions => ({
        type: 'postgres',
        url: config.url,
        entities: ENTITIES,
        migrations: [InitialSchema1729000000000],
        migrationsRun: config.runMigrations,
        synchronize: false,
        extra: {
          max: config.poolSize,
          statement_timeout: config.queryTimeoutMs,
        },
      }),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  providers: [
    { provide: UsersRepository, useClass: TypeOrmUsersRepository },
    {
      provide: SubscriptionPlansRepository,
      useClass: TypeOrmSubscriptionPlansRepository,
    },
    {
      provide: PaymentTransactionsRepository,
      useClass: TypeOrmPaymentTransactionsRepository,
    },
  ],
  exports: [
    UsersRepository,
    SubscriptionPlansRepository,
    PaymentTransactionsRepository,
  ],
})
export class DatabaseModule {}
