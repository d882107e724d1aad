export type IdentityErrorCode =
  | 'CONFIG_ERROR'
  | 'NETWORK_ERROR'
  | 'HTTP_STATUS_ERROR'
  | 'DECODE_ERROR'
  | 'MALFORMED_TOKEN'
  | 'MISSING_KID_HEADER'
  | 'SIGNATURE_INVALID'
  | 'TOKEN_EXPIRED'
  | 'INVALID_DURATION';

/**
 * Base class for every error raised while loading keys or validating a token.
 * Callers translate `code` into whatever response their protocol needs.
 */
export class IdentityError extends Error {
  constructor(
    public readonly code: IdentityErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IdentityError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message
    };
  }
}

// Key set side

export class ConfigError extends IdentityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export class NetworkError extends IdentityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NETWORK_ERROR', message, options);
    this.name = 'NetworkError';
  }
}

export class HttpStatusError extends IdentityError {
  constructor(public readonly status: number, statusText: string) {
    super('HTTP_STATUS_ERROR', `JWKS request failed: ${status} ${statusText}`.trim());
    this.name = 'HttpStatusError';
  }
}

export class DecodeError extends IdentityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
  }
}

// Token side

export class MalformedTokenError extends IdentityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_TOKEN', message, options);
    this.name = 'MalformedTokenError';
  }
}

export class MissingKidHeaderError extends IdentityError {
  constructor(kid: unknown) {
    super('MISSING_KID_HEADER', `Invalid kid value ${JSON.stringify(kid) ?? 'undefined'}`);
    this.name = 'MissingKidHeaderError';
  }
}

export class SignatureInvalidError extends IdentityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SIGNATURE_INVALID', message, options);
    this.name = 'SignatureInvalidError';
  }
}

/**
 * Raised before any key lookup for tokens whose `alg` is outside the
 * asymmetric allow-list (HS*, none, ...).
 */
export class AlgorithmNotAllowedError extends SignatureInvalidError {
  constructor(public readonly algorithm: string) {
    super(`Algorithm not allowed: ${algorithm}`);
    this.name = 'AlgorithmNotAllowedError';
  }
}

export class TokenExpiredError extends IdentityError {
  constructor(message = 'Token is expired') {
    super('TOKEN_EXPIRED', message);
    this.name = 'TokenExpiredError';
  }
}

export class InvalidDurationError extends IdentityError {
  constructor(message = 'Invalid duration') {
    super('INVALID_DURATION', message);
    this.name = 'InvalidDurationError';
  }
}
