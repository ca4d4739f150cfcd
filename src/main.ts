import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppConfig, appConfig } from './core/config';
import { DomainExceptionFilter } from './core/errors';
import { logger } from './core/logger/logger.config';
import { createValidationPipe } from './core/validation/validation-pipe';

const describeError = (error: unknown) =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };

async function bootstrap() {
  const pinoLogger = logger();

  try {
    const app = await NestFactory.create(AppModule, {
      logger: false,
    });

    const config = app.get<AppConfig>(appConfig.KEY);

    app.useGlobalPipes(createValidationPipe());
    app.useGlobalFilters(new DomainExceptionFilter());

    app.enableCors({ origin: config.corsOrigins, credentials: true });
    app.setGlobalPrefix('api');
    app.enableShutdownHooks();

    await app.listen(config.port);

    pinoLogger.info(`Application running on: http://localhost:${config.port}`);
  } catch (error) {
    pinoLogger.error(describeError(error), 'Bootstrap failed');
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(describeError(error), 'Failed to start application');
  process.exit(1);
});
