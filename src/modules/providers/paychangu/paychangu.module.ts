import { Module } from '@nestjs/common';
import { PAYMENT_PROVIDER_ADAPTER } from '../../../domain/subscriptions';
import { PaychanguAdapter } from './adapters/paychangu-adapter.service';
import { PaychanguApiClientService } from './adapters/paychangu-api-client.service';

@Module({
  providers: [
    PaychanguApiClientService,
    PaychanguAdapter,
    { provide: PAYMENT_PROVIDER_ADAPTER, useExisting: PaychanguAdapter },
  ],
  exports: [PAYMENT_PROVIDER_ADAPTER, PaychanguApiClientService],
})
export class PaychanguModule {}
