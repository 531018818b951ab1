export type AuthFailureKind = 'expired' | 'invalid_credentials' | 'decode_error';

export type AuthErrorCode = 'token_expired' | 'invalid_credentials' | 'token_decode_error' | 'unauthenticated';

/** Authentication failed. Surfaces as HTTP 401. */
export class AuthenticationError extends Error {
  readonly statusCode: number = 401;
  readonly code: AuthErrorCode;
  /** Provider-supplied reason, without the code prefix. */
  readonly detail: string;

  constructor(message: string, code: AuthErrorCode = 'unauthenticated', detail: string = message) {
    super(message);
    this.name = 'AuthenticationError';
    this.code = code;
    this.detail = detail;
  }
}

export class TokenExpiredError extends AuthenticationError {
  constructor(detail: string) {
    super(`token_expired: ${detail}`, 'token_expired', detail);
    this.name = 'TokenExpiredError';
  }
}

/** Signature, issuer or audience mismatch, or any other provider-side rejection. */
export class InvalidTokenError extends AuthenticationError {
  constructor(detail: string) {
    super(`invalid_credentials: ${detail}`, 'invalid_credentials', detail);
    this.name = 'InvalidTokenError';
  }
}

/** The token could not be parsed at all. */
export class TokenDecodeError extends AuthenticationError {
  constructor(detail: string) {
    super(`token_decode_error: ${detail}`, 'token_decode_error', detail);
    this.name = 'TokenDecodeError';
  }
}

/** Authorization failed. Surfaces as HTTP 403. */
export class AuthorizationError extends Error {
  readonly statusCode: number = 403;
  readonly code: string = 'forbidden';

  constructor(message: string) {
    super(message);
    this.name = 'AuthorizationError';
  }
}

export class PermissionDeniedError extends AuthorizationError {
  readonly missingRoles: readonly string[];

  constructor(missingRoles: readonly string[]) {
    super(`Missing required roles: ${missingRoles.join(', ')}`);
    this.name = 'PermissionDeniedError';
    this.missingRoles = [...missingRoles];
  }
}

export function authFailureToError(kind: AuthFailureKind, detail: string): AuthenticationError {
  switch (kind) {
    case 'expired':
      return new TokenExpiredError(detail);
    case 'invalid_credentials':
      return new InvalidTokenError(detail);
    case 'decode_error':
      return new TokenDecodeError(detail);
  }
}

/** Inverse of authFailureToError; undefined for errors outside the three failure kinds. */
export function classifyAuthError(error: unknown): AuthFailureKind | undefined {
  if (error instanceof TokenExpiredError) return 'expired';
  if (error instanceof InvalidTokenError) return 'invalid_credentials';
  if (error instanceof TokenDecodeError) return 'decode_error';
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
