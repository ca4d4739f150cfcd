/**
 * Failure kinds raised by the access-control and subscription layers.
 *
 * Every kind carries a stable identifier and the HTTP status it is rendered
 * with by {@link DomainExceptionFilter}. Services throw these; controllers
 * never translate them by hand.
 */

export enum ErrorKind {
  CREDENTIALS_INVALID = 'credentials_invalid',
  TOKEN_INVALID = 'token_invalid',
  TOKEN_EXPIRED = 'token_expired',
  TOKEN_KIND_MISMATCH = 'token_kind_mismatch',
  SUBSCRIPTION_REQUIRED = 'subscription_required',
  FORBIDDEN = 'forbidden',
  DUPLICATE_IDENTITY = 'duplicate_identity',
  INVALID_RESET_TOKEN = 'invalid_reset_token',
  NOT_FOUND = 'not_found',
  PAYMENT_NOT_COMPLETED = 'payment_not_completed',
  INVALID_TRANSACTION_REFERENCE = 'invalid_transaction_reference',
  PAYMENT_VERIFICATION_UNAVAILABLE = 'payment_verification_unavailable',
  PAYMENT_INITIATION_FAILED = 'payment_initiation_failed',
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKind.CREDENTIALS_INVALID]: 401,
  [ErrorKind.TOKEN_INVALID]: 401,
  [ErrorKind.TOKEN_EXPIRED]: 401,
  [ErrorKind.TOKEN_KIND_MISMATCH]: 401,
  [ErrorKind.SUBSCRIPTION_REQUIRED]: 403,
  [ErrorKind.FORBIDDEN]: 403,
  [ErrorKind.DUPLICATE_IDENTITY]: 400,
  [ErrorKind.INVALID_RESET_TOKEN]: 400,
  [ErrorKind.NOT_FOUND]: 404,
  [ErrorKind.PAYMENT_NOT_COMPLETED]: 402,
  [ErrorKind.INVALID_TRANSACTION_REFERENCE]: 400,
  [ErrorKind.PAYMENT_VERIFICATION_UNAVAILABLE]: 502,
  [ErrorKind.PAYMENT_INITIATION_FAILED]: 502,
};

export const statusForKind = (kind: ErrorKind): number => STATUS_BY_KIND[kind];

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }

  get status(): number {
    return statusForKind(this.kind);
  }
}

// Token codec

export class TokenInvalidError extends DomainError {
  readonly kind = ErrorKind.TOKEN_INVALID;

  constructor(message = 'Token is invalid') {
    super(message);
  }
}

export class TokenExpiredError extends DomainError {
  readonly kind = ErrorKind.TOKEN_EXPIRED;

  constructor(readonly expiredAt: Date) {
    super('Token has expired');
  }
}

export class TokenKindMismatchError extends DomainError {
  readonly kind = ErrorKind.TOKEN_KIND_MISMATCH;

  constructor(expected: string, actual: string | null) {
    super('Token kind does not match', { expected, actual });
  }
}

export const isTokenError = (
  error: unknown,
): error is TokenInvalidError | TokenExpiredError | TokenKindMismatchError =>
  error instanceof TokenInvalidError ||
  error instanceof TokenExpiredError ||
  error instanceof TokenKindMismatchError;

// Access control

export class CredentialsInvalidError extends DomainError {
  readonly kind = ErrorKind.CREDENTIALS_INVALID;

  constructor(message = 'Could not validate credentials') {
    super(message);
  }
}

export class SubscriptionRequiredError extends DomainError {
  readonly kind = ErrorKind.SUBSCRIPTION_REQUIRED;

  constructor() {
    super(
      'Subscription required to access this content. Please subscribe to continue.',
    );
  }
}

export class ForbiddenError extends DomainError {
  readonly kind = ErrorKind.FORBIDDEN;

  constructor(message = 'Not authorized') {
    super(message);
  }
}

export class DuplicateIdentityError extends DomainError {
  readonly kind = ErrorKind.DUPLICATE_IDENTITY;

  constructor(readonly field: 'username' | 'email') {
    super(
      field === 'username'
        ? 'Username already registered'
        : 'Email already registered',
      { field },
    );
  }
}

export class InvalidResetTokenError extends DomainError {
  readonly kind = ErrorKind.INVALID_RESET_TOKEN;

  constructor() {
    super('Invalid or expired token');
  }
}

export class NotFoundError extends DomainError {
  readonly kind = ErrorKind.NOT_FOUND;

  constructor(resource: string) {
    super(`${resource} not found`);
  }
}

// Subscription activation

/**
 * `isFinal` is false while the provider still reports the payment as pending,
 * so asking again later may succeed.
 */
export class PaymentNotCompletedError extends DomainError {
  readonly kind = ErrorKind.PAYMENT_NOT_COMPLETED;

  constructor(
    message = 'Payment not completed or failed',
    details?: Record<string, unknown>,
    readonly isFinal: boolean = true,
  ) {
    super(message, details);
  }
}

export class InvalidTransactionReferenceError extends DomainError {
  readonly kind = ErrorKind.INVALID_TRANSACTION_REFERENCE;

  constructor(readonly reference: string) {
    super('Invalid transaction reference');
  }
}

export class PaymentVerificationUnavailableError extends DomainError {
  readonly kind = ErrorKind.PAYMENT_VERIFICATION_UNAVAILABLE;

  constructor(readonly providerError?: unknown) {
    super('Payment verification is temporarily unavailable, please retry');
  }
}

export class PaymentInitiationFailedError extends DomainError {
  readonly kind = ErrorKind.PAYMENT_INITIATION_FAILED;

  constructor(readonly providerError?: unknown) {
    super('Payment initiation failed');
  }
}
