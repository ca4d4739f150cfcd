import { Injectable } from '@nestjs/common';
import { CredentialsInvalidError, isTokenError } from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { UsersRepository } from '../../../database/repositories';
import { TokenKind } from '../../../domain/auth';
import { Principal } from '../../../domain/users';
import { TokenCodecService } from './token-codec.service';

/**
 * Turns a bearer access token into the live principal record.
 *
 * Every failure, including a token whose account has since been deleted,
 * surfaces as {@link CredentialsInvalidError}.
 */
@Injectable()
export class SessionResolverService {
  private readonly logger = logger();

  constructor(
    private readonly tokenCodec: TokenCodecService,
    private readonly users: UsersRepository,
  ) {}

  async resolve(token: string): Promise<Principal> {
    let userId: string;
    try {
      userId = this.tokenCodec.verify(token, TokenKind.ACCESS).user_id;
    } catch (error) {
      if (isTokenError(error)) {
        this.logger.debug({ reason: error.kind }, 'Bearer token rejected');
        throw new CredentialsInvalidError();
      }
      throw error;
    }

    const principal = await this.users.findById(userId);
    if (!principal) {
      this.logger.debug({ userId }, 'Bearer token for unknown user');
      throw new CredentialsInvalidError();
    }

    return principal;
  }
}
