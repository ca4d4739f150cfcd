import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
import { PaymentsConfig, paymentsConfig } from './config';
import { Clock, SystemClock } from './time/clock';
import { PayloadValidatorService } from './validation/payload-validator.service';

@Global()
@Module({
  imports: [
    ConfigModule,
    HttpModule.registerAsync({
      inject: [paymentsConfig.KEY],
      useFactory: (config: PaymentsConfig) => ({
        timeout: config.apiCallTimeoutMs,
        maxRedirects: 5,
      }),
    }),
  ],
  providers: [
    CircuitBreakerService,
    PayloadValidatorService,
    { provide: Clock, useClass: SystemClock },
  ],
  exports: [HttpModule, CircuitBreakerService, PayloadValidatorService, Clock],
})
export class CoreModule {}
