import { Inject, Injectable } from '@nestjs/common';
import {
  JwtPayload,
  TokenExpiredError as JwtTokenExpiredError,
  sign,
  verify,
} from 'jsonwebtoken';
import { AuthConfig, authConfig } from '../../../core/config';
import {
  TokenExpiredError,
  TokenInvalidError,
  TokenKindMismatchError,
} from '../../../core/errors';
import { Clock } from '../../../core/time/clock';
import {
  ClaimsByKind,
  TokenKind,
  VerifiedClaims,
} from '../../../domain/auth';

const ALGORITHM = 'HS256';

type ClaimParser<C> = (payload: JwtPayload) => C | null;

const readString = (payload: JwtPayload, key: string): string | null => {
  const value: unknown = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
};

const CLAIM_PARSERS: { [K in TokenKind]: ClaimParser<ClaimsByKind[K]> } = {
  [TokenKind.ACCESS]: (payload) => {
    const sub = readString(payload, 'sub');
    const userId = readString(payload, 'user_id');
    const email = readString(payload, 'email');
    const phone: unknown = payload.phone;
    if (!sub || !userId || !email || typeof phone !== 'string') return null;
    return { sub, user_id: userId, email, phone };
  },
  [TokenKind.REFRESH]: (payload) => {
    const sub = readString(payload, 'sub');
    return sub ? { sub } : null;
  },
  [TokenKind.PASSWORD_RESET]: (payload) => {
    const sub = readString(payload, 'sub');
    return sub ? { sub } : null;
  },
};

/**
 * Signs and verifies the platform's HS256 bearer tokens.
 *
 * Every token carries a `token_type` claim; {@link verify} rejects a token of
 * any other kind than the one asked for.
 */
@Injectable()
export class TokenCodecService {
  constructor(
    @Inject(authConfig.KEY) private readonly config: AuthConfig,
    private readonly clock: Clock,
  ) {}

  issue<K extends TokenKind>(kind: K, claims: ClaimsByKind[K]): string {
    const iat = this.nowSeconds();
    return sign(
      { ...claims, token_type: kind, iat, exp: iat + this.ttlSeconds(kind) },
      this.config.jwtSecret,
      { algorithm: ALGORITHM },
    );
  }

  /**
   * @throws TokenInvalidError bad signature, malformed token or missing claims
   * @throws TokenExpiredError
   * @throws TokenKindMismatchError
   */
  verify<K extends TokenKind>(token: string, expectedKind: K): VerifiedClaims<K> {
    let payload: JwtPayload | string;
    try {
      payload = verify(token, this.config.jwtSecret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof JwtTokenExpiredError) {
        throw new TokenExpiredError(error.expiredAt);
      }
      throw new TokenInvalidError();
    }

    if (typeof payload === 'string') throw new TokenInvalidError();

    const tokenType: unknown = payload.token_type;
    if (tokenType !== expectedKind) {
      throw new TokenKindMismatchError(
        expectedKind,
        typeof tokenType === 'string' ? tokenType : null,
      );
    }

    const { iat, exp } = payload;
    const claims = CLAIM_PARSERS[expectedKind](payload);
    if (!claims || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new TokenInvalidError('Token is missing required claims');
    }

    return { ...claims, token_type: expectedKind, iat, exp };
  }

  private ttlSeconds(kind: TokenKind): number {
    switch (kind) {
      case TokenKind.ACCESS:
        return this.config.accessTokenTtlMinutes * 60;
      case TokenKind.REFRESH:
        return this.config.refreshTokenTtlDays * 24 * 60 * 60;
      case TokenKind.PASSWORD_RESET:
        return this.config.passwordResetTtlMinutes * 60;
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}
