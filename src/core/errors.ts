/**
 * Token Errors: the rejection taxonomy surfaced by the parser.
 */

export type TokenErrorCode =
  | 'truncated_or_invalid'
  | 'unsupported_version'
  | 'disallowed_purpose'
  | 'invalid_key_type'
  | 'unknown_purpose'
  | 'purpose_mismatch'
  | 'protocol_verification_failed'
  | 'not_a_json_token'
  | 'unsupported_purpose_or_version';

/** Error thrown for every rejected token or refused parser configuration. */
export class TokenError extends Error {
  readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenError';
    this.code = code;
  }
}

/**
 * Raised inside protocol suites. The parser converts it (and anything else a
 * suite throws) into a single `protocol_verification_failed` TokenError.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

const VERIFICATION_FAILED_MESSAGE = 'Token verification failed';

/** Wrap a protocol failure; the message never varies with the cause. */
export function verificationFailed(cause: unknown): TokenError {
  return new TokenError('protocol_verification_failed', VERIFICATION_FAILED_MESSAGE, { cause });
}

export function isTokenError(value: unknown): value is TokenError {
  return value instanceof TokenError;
}
