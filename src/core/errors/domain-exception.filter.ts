import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { logger } from '../logger/logger.config';
import { CredentialsInvalidError, DomainError } from './domain.errors';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string;
}

/**
 * Renders every failure that escapes a handler.
 *
 * Domain errors keep their kind and message. Nest HTTP exceptions keep their
 * own body. Anything else is logged in full and answered with a bare 500.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = logger();

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (exception instanceof DomainError) {
      if (exception instanceof CredentialsInvalidError) {
        response.setHeader('WWW-Authenticate', 'Bearer');
      }

      this.logger.debug(
        {
          kind: exception.kind,
          method: request.method,
          path: request.url,
          details: exception.details,
        },
        'Request rejected',
      );

      const body: ErrorResponseBody = {
        statusCode: exception.status,
        error: exception.kind,
        message: exception.message,
      };
      response.status(exception.status).json(body);
      return;
    }

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).json(exception.getResponse());
      return;
    }

    const error =
      exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(
      {
        error: error.message,
        stack: error.stack,
        method: request.method,
        path: request.url,
      },
      'Unhandled error while processing request',
    );

    const body: ErrorResponseBody = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'internal_error',
      message: 'Internal server error',
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
