import { InvalidResetTokenError } from '../../../core/errors';
import { AuthConfig, MailConfig } from '../../../core/config';
import { TokenKind } from '../../../domain/auth';
import { Principal } from '../../../domain/users';
import { FixedClock } from '../../../../test/support/fixed-clock';
import { InMemoryUsersRepository } from '../../../../test/support/in-memory-repositories';
import { MailService } from '../../mail/mail.service';
import { accessClaimsOf } from './auth.service';
import { PasswordHasherService } from './password-hasher.service';
import { PasswordResetService } from './password-reset.service';
import { TokenCodecService } from './token-codec.service';

const authConfig: AuthConfig = {
  jwtSecret: 'test-secret',
  accessTokenTtlMinutes: 120,
  refreshTokenTtlDays: 7,
  passwordResetTtlMinutes: 30,
  bcryptRounds: 4,
};

const mailConfig: MailConfig = {
  host: null,
  port: 587,
  secure: false,
  user: null,
  password: null,
  from: 'no-reply@localhost',
};

describe('PasswordResetService', () => {
  let clock: FixedClock;
  let users: InMemoryUsersRepository;
  let hasher: PasswordHasherService;
  let codec: TokenCodecService;
  let mail: MailService;
  let sendPasswordReset: jest.SpyInstance;
  let service: PasswordResetService;
  let principal: Principal;

  beforeEach(async () => {
    clock = new FixedClock();
    users = new InMemoryUsersRepository(clock);
    hasher = new PasswordHasherService(authConfig);
    codec = new TokenCodecService(authConfig, clock);
    mail = new MailService(mailConfig);
    sendPasswordReset = jest.spyOn(mail, 'sendPasswordReset');
    service = new PasswordResetService(users, codec, hasher, mail);

    principal = await users.create({
      username: 'carol',
      email: 'carol@example.com',
      firstName: 'Carol',
      lastName: 'Mwale',
      phoneNumber: '0999000003',
      passwordHash: await hasher.hash('old-password'),
    });
  });

  const outstandingToken = async (): Promise<string> => {
    const token = (await users.findById(principal.id))?.resetToken;
    if (!token) throw new Error('no reset token stored');
    return token;
  };

  it('stores a reset token and mails it', async () => {
    await service.requestReset('carol@example.com');

    const token = await outstandingToken();
    expect(sendPasswordReset).toHaveBeenCalledWith('carol@example.com', token);
    expect(codec.verify(token, TokenKind.PASSWORD_RESET).sub).toBe(
      'carol@example.com',
    );
  });

  it('does nothing for an unknown email', async () => {
    await service.requestReset('nobody@example.com');

    expect(sendPasswordReset).not.toHaveBeenCalled();
  });

  it('replaces the password and clears the token', async () => {
    await service.requestReset('carol@example.com');
    const token = await outstandingToken();

    await service.resetPassword(token, 'new-password');

    const updated = await users.findById(principal.id);
    expect(updated?.resetToken).toBeNull();
    await expect(
      hasher.verify('new-password', updated?.passwordHash ?? ''),
    ).resolves.toBe(true);
  });

  it('accepts a token only once', async () => {
    await service.requestReset('carol@example.com');
    const token = await outstandingToken();
    await service.resetPassword(token, 'new-password');

    await expect(service.resetPassword(token, 'another-password')).rejects.toThrow(
      InvalidResetTokenError,
    );
  });

  it('rejects a token superseded by a newer request', async () => {
    await service.requestReset('carol@example.com');
    const first = await outstandingToken();
    clock.advance(1000);
    await service.requestReset('carol@example.com');

    await expect(service.resetPassword(first, 'new-password')).rejects.toThrow(
      InvalidResetTokenError,
    );
  });

  it('rejects an expired token', async () => {
    await service.requestReset('carol@example.com');
    const token = await outstandingToken();
    clock.advance(30 * 60 * 1000);

    await expect(service.resetPassword(token, 'new-password')).rejects.toThrow(
      'Invalid or expired token',
    );
  });

  it('rejects an access token', async () => {
    const token = codec.issue(TokenKind.ACCESS, accessClaimsOf(principal));

    await expect(service.resetPassword(token, 'new-password')).rejects.toThrow(
      InvalidResetTokenError,
    );
  });
});
