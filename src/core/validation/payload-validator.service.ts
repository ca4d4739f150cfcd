import { BadRequestException, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { logger } from '../logger/logger.config';

/**
 * Validates bodies that arrive untyped, such as provider webhooks, where the
 * global whitelist pipe would reject the provider's extra fields.
 */
@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  isValidPayloadStructure(payload: unknown): payload is Record<string, unknown> {
    return (
      typeof payload === 'object' && payload !== null && !Array.isArray(payload)
    );
  }

  hasRequiredFields(payload: unknown, requiredFields: string[]): boolean {
    if (!this.isValidPayloadStructure(payload)) {
      return false;
    }

    const fields: Record<string, unknown> = payload;
    return requiredFields.every(
      (field) => fields[field] !== undefined && fields[field] !== null,
    );
  }

  async validateWithDto<T extends object>(
    payload: Record<string, unknown>,
    dtoClass: new () => T,
  ): Promise<T> {
    const dto = plainToInstance(dtoClass, payload);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const errorMessages = errors.flatMap((error) =>
        Object.values(error.constraints || {}),
      );
      this.logger.warn({ errors: errorMessages }, 'Payload validation failed');
      throw new BadRequestException({
        message: 'Validation failed',
        errors: errorMessages,
      });
    }

    return dto;
  }

  async validatePayload<T extends object>(
    payload: unknown,
    dtoClass: new () => T,
    requiredFields?: string[],
  ): Promise<T> {
    if (!this.isValidPayloadStructure(payload)) {
      this.logger.warn('Invalid payload structure');
      throw new BadRequestException('Invalid payload structure');
    }

    if (requiredFields && !this.hasRequiredFields(payload, requiredFields)) {
      this.logger.warn({ requiredFields }, 'Missing required fields');
      throw new BadRequestException('Missing required fields');
    }

    return this.validateWithDto(payload, dtoClass);
  }
}
