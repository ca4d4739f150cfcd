import { Injectable } from '@nestjs/common';
import {
  CredentialsInvalidError,
  DuplicateIdentityError,
  isTokenError,
} from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { UsersRepository } from '../../../database/repositories';
import {
  AccessClaims,
  RefreshedAccessToken,
  SessionTokens,
  TokenKind,
} from '../../../domain/auth';
import { Principal } from '../../../domain/users';
import { PasswordHasherService } from './password-hasher.service';
import { TokenCodecService } from './token-codec.service';

export interface Registration {
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
}

export const accessClaimsOf = (principal: Principal): AccessClaims => ({
  sub: principal.username,
  user_id: principal.id,
  email: principal.email,
  phone: principal.phoneNumber,
});

/** Epoch seconds, the resolution of `iat` */
const heldUsernameSince = (principal: Principal): number =>
  Math.floor(
    (principal.usernameChangedAt ?? principal.createdAt).getTime() / 1000,
  );

@Injectable()
export class AuthService {
  private readonly logger = logger();

  constructor(
    private readonly users: UsersRepository,
    private readonly hasher: PasswordHasherService,
    private readonly tokenCodec: TokenCodecService,
  ) {}

  /**
   * The principal whose username and password match, or null. An unknown
   * username and a wrong password are indistinguishable to the caller.
   */
  async authenticate(username: string, password: string): Promise<Principal | null> {
    const principal = await this.users.findByUsername(username);
    if (!principal) {
      await this.hasher.verifyAgainstNothing(password);
      return null;
    }

    const matches = await this.hasher.verify(password, principal.passwordHash);
    return matches ? principal : null;
  }

  issueSession(principal: Principal): SessionTokens {
    return {
      access_token: this.tokenCodec.issue(
        TokenKind.ACCESS,
        accessClaimsOf(principal),
      ),
      refresh_token: this.tokenCodec.issue(TokenKind.REFRESH, {
        sub: principal.username,
      }),
      token_type: 'bearer',
    };
  }

  async login(username: string, password: string): Promise<SessionTokens> {
    const principal = await this.authenticate(username, password);
    if (!principal) {
      this.logger.info({ username }, 'Login rejected');
      throw new CredentialsInvalidError('Incorrect username or password');
    }

    this.logger.info({ userId: principal.id }, 'Login succeeded');
    return this.issueSession(principal);
  }

  async register(registration: Registration): Promise<SessionTokens> {
    if (await this.users.findByUsername(registration.username)) {
      throw new DuplicateIdentityError('username');
    }
    if (await this.users.findByEmail(registration.email)) {
      throw new DuplicateIdentityError('email');
    }

    // A concurrent registration can still lose on the unique indexes; the
    // repository reports that as DuplicateIdentityError too.
    const principal = await this.users.create({
      username: registration.username,
      email: registration.email,
      firstName: registration.firstName,
      lastName: registration.lastName,
      phoneNumber: registration.phoneNumber,
      passwordHash: await this.hasher.hash(registration.password),
    });

    this.logger.info(
      { userId: principal.id, username: principal.username },
      'User registered',
    );
    return this.issueSession(principal);
  }

  /**
   * New access token for a valid refresh token. The refresh token itself is
   * neither rotated nor revoked, but it only ever speaks for the account that
   * held its username when it was issued.
   */
  async refresh(refreshToken: string): Promise<RefreshedAccessToken> {
    let username: string;
    let issuedAt: number;
    try {
      const claims = this.tokenCodec.verify(refreshToken, TokenKind.REFRESH);
      username = claims.sub;
      issuedAt = claims.iat;
    } catch (error) {
      if (isTokenError(error)) {
        throw new CredentialsInvalidError('Invalid refresh token');
      }
      throw error;
    }

    const principal = await this.users.findByUsername(username);
    if (!principal) {
      throw new CredentialsInvalidError('Invalid refresh token');
    }
    if (issuedAt < heldUsernameSince(principal)) {
      this.logger.info(
        { userId: principal.id },
        'Refresh token predates the current holder of its username',
      );
      throw new CredentialsInvalidError('Invalid refresh token');
    }

    return {
      access_token: this.tokenCodec.issue(
        TokenKind.ACCESS,
        accessClaimsOf(principal),
      ),
      token_type: 'bearer',
    };
  }
}
