import { Injectable } from '@nestjs/common';
import { InvalidResetTokenError, isTokenError } from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { UsersRepository } from '../../../database/repositories';
import { TokenKind } from '../../../domain/auth';
import { MailService } from '../../mail/mail.service';
import { PasswordHasherService } from './password-hasher.service';
import { TokenCodecService } from './token-codec.service';

/**
 * Emailed, single-use password reset tokens. The outstanding token is kept on
 * the account and cleared when it is used.
 */
@Injectable()
export class PasswordResetService {
  private readonly logger = logger();

  constructor(
    private readonly users: UsersRepository,
    private readonly tokenCodec: TokenCodecService,
    private readonly hasher: PasswordHasherService,
    private readonly mail: MailService,
  ) {}

  async requestReset(email: string): Promise<void> {
    const principal = await this.users.findByEmail(email);
    if (!principal) {
      this.logger.info('Password reset requested for unknown email');
      return;
    }

    const token = this.tokenCodec.issue(TokenKind.PASSWORD_RESET, {
      sub: principal.email,
    });
    await this.users.update(principal.id, { resetToken: token });
    await this.mail.sendPasswordReset(principal.email, token);

    this.logger.info({ userId: principal.id }, 'Password reset token issued');
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    let email: string;
    try {
      email = this.tokenCodec.verify(token, TokenKind.PASSWORD_RESET).sub;
    } catch (error) {
      if (isTokenError(error)) throw new InvalidResetTokenError();
      throw error;
    }

    const principal = await this.users.findByEmail(email);
    if (!principal || principal.resetToken !== token) {
      throw new InvalidResetTokenError();
    }

    await this.users.update(principal.id, {
      passwordHash: await this.hasher.hash(newPassword),
      resetToken: null,
    });

    this.logger.info({ userId: principal.id }, 'Password reset completed');
  }
}
