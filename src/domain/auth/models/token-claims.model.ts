/**
 * Claim sets carried by each kind of bearer token.
 *
 * The `token_type` claim discriminates the kinds so that a refresh or reset
 * token can never stand in for an access token.
 */

export enum TokenKind {
  ACCESS = 'access',
  REFRESH = 'refresh',
  PASSWORD_RESET = 'password_reset',
}

export interface AccessClaims {
  /** Username */
  sub: string;
  user_id: string;
  email: string;
  phone: string;
}

export interface RefreshClaims {
  /** Username */
  sub: string;
}

export interface PasswordResetClaims {
  /** Email address the reset was requested for */
  sub: string;
}

export interface ClaimsByKind {
  [TokenKind.ACCESS]: AccessClaims;
  [TokenKind.REFRESH]: RefreshClaims;
  [TokenKind.PASSWORD_RESET]: PasswordResetClaims;
}

export type VerifiedClaims<K extends TokenKind> = ClaimsByKind[K] & {
  token_type: K;
  iat: number;
  exp: number;
};

export interface SessionTokens {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export interface RefreshedAccessToken {
  access_token: string;
  token_type: 'bearer';
}
