import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { PaychanguModule } from '../providers/paychangu/paychangu.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [TerminusModule, PaychanguModule],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
