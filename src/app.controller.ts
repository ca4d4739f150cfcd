import { Controller, Get, Inject } from '@nestjs/common';
import { AppConfig, appConfig } from './core/config';

/**
 * Liveness ping. Dependency checks live under `/health`.
 */
@Controller()
export class AppController {
  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  @Get()
  ping(): { status: 'healthy'; version: string } {
    return { status: 'healthy', version: this.config.version };
  }
}
