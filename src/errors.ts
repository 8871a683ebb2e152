export type VerificationErrorCode =
  | 'missing_credential'
  | 'malformed_credential'
  | 'invalid_signature'
  | 'expired_token'
  | 'token_exhausted'
  | 'store_unavailable';

export class TokenVerificationError extends Error {
  constructor(
    public readonly code: VerificationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TokenVerificationError';
  }
}

export class IssuanceError extends Error {
  readonly code = 'issuance_failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IssuanceError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}
