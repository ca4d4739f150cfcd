import { sign } from 'jsonwebtoken';
import {
  TokenExpiredError,
  TokenInvalidError,
  TokenKindMismatchError,
} from '../../../core/errors';
import { AuthConfig } from '../../../core/config';
import { TokenKind } from '../../../domain/auth';
import { FixedClock } from '../../../../test/support/fixed-clock';
import { TokenCodecService } from './token-codec.service';

const config: AuthConfig = {
  jwtSecret: 'test-secret',
  accessTokenTtlMinutes: 120,
  refreshTokenTtlDays: 7,
  passwordResetTtlMinutes: 30,
  bcryptRounds: 4,
};

const accessClaims = {
  sub: 'alice',
  user_id: '3f1c7a52-8d2e-4c8b-9b1e-0a4d6f2e7c11',
  email: 'alice@example.com',
  phone: '0999000000',
};

describe('TokenCodecService', () => {
  let clock: FixedClock;
  let codec: TokenCodecService;

  beforeEach(() => {
    clock = new FixedClock(new Date('2025-03-01T12:00:00.000Z'));
    codec = new TokenCodecService(config, clock);
  });

  it('verifies its own access tokens and returns the typed claims', () => {
    const token = codec.issue(TokenKind.ACCESS, accessClaims);
    const iat = Date.parse('2025-03-01T12:00:00.000Z') / 1000;

    expect(codec.verify(token, TokenKind.ACCESS)).toEqual({
      ...accessClaims,
      token_type: 'access',
      iat,
      exp: iat + 120 * 60,
    });
  });

  it('gives refresh tokens a lifetime in days', () => {
    const token = codec.issue(TokenKind.REFRESH, { sub: 'alice' });
    const claims = codec.verify(token, TokenKind.REFRESH);

    expect(claims.sub).toBe('alice');
    expect(claims.exp - claims.iat).toBe(7 * 24 * 60 * 60);
  });

  it('rejects a token once its expiry is reached', () => {
    const token = codec.issue(TokenKind.ACCESS, accessClaims);
    clock.advance(120 * 60 * 1000);

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(TokenExpiredError);
  });

  it('accepts a token one second before expiry', () => {
    const token = codec.issue(TokenKind.ACCESS, accessClaims);
    clock.advance(120 * 60 * 1000 - 1000);

    expect(codec.verify(token, TokenKind.ACCESS).user_id).toBe(accessClaims.user_id);
  });

  it('reports the expiry instant on expired tokens', () => {
    const token = codec.issue(TokenKind.PASSWORD_RESET, { sub: 'alice@example.com' });
    clock.advance(31 * 60 * 1000);

    try {
      codec.verify(token, TokenKind.PASSWORD_RESET);
      throw new Error('expected verification to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(TokenExpiredError);
      if (error instanceof TokenExpiredError) {
        expect(error.expiredAt).toEqual(new Date('2025-03-01T12:30:00.000Z'));
      }
    }
  });

  it('refuses a refresh token where an access token is expected', () => {
    const token = codec.issue(TokenKind.REFRESH, { sub: 'alice' });

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(
      TokenKindMismatchError,
    );
  });

  it('refuses an access token where a reset token is expected', () => {
    const token = codec.issue(TokenKind.ACCESS, accessClaims);

    expect(() => codec.verify(token, TokenKind.PASSWORD_RESET)).toThrow(
      TokenKindMismatchError,
    );
  });

  it('rejects tokens signed with another secret', () => {
    const foreign = new TokenCodecService(
      { ...config, jwtSecret: 'other-test-secret' },
      clock,
    );
    const token = foreign.issue(TokenKind.ACCESS, accessClaims);

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(TokenInvalidError);
  });

  it('rejects tokens signed with another algorithm', () => {
    const token = sign(
      { ...accessClaims, token_type: 'access' },
      config.jwtSecret,
      { algorithm: 'HS512' },
    );

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(TokenInvalidError);
  });

  it('rejects malformed tokens', () => {
    expect(() => codec.verify('not-a-token', TokenKind.ACCESS)).toThrow(
      TokenInvalidError,
    );
  });

  it('rejects access tokens missing required claims', () => {
    const token = sign(
      { sub: 'alice', token_type: 'access', exp: 4102444800 },
      config.jwtSecret,
      { algorithm: 'HS256' },
    );

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(TokenInvalidError);
  });

  it('rejects tokens without a token_type claim as a kind mismatch', () => {
    const token = sign({ ...accessClaims, exp: 4102444800 }, config.jwtSecret, {
      algorithm: 'HS256',
    });

    expect(() => codec.verify(token, TokenKind.ACCESS)).toThrow(
      TokenKindMismatchError,
    );
  });
});
