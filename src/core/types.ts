/**
 * Tessera Core Types
 * Single source of truth for all shared types and interfaces.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Purposes ──

export const PURPOSES = ['auth', 'enc', 'seal', 'sign'] as const;

/** Cryptographic operation class declared by the second token segment */
export type Purpose = (typeof PURPOSES)[number];

// ── Keys ──

export const KEY_CAPABILITIES = [
  'symmetric-authentication',
  'symmetric-encryption',
  'asymmetric-secret',
  'asymmetric-public',
] as const;

export type KeyCapability = (typeof KEY_CAPABILITIES)[number];

/**
 * Opaque key material tagged with what it may be used for. The bytes are
 * held privately; `bytes()` hands out a fresh copy on every call.
 */
export interface KeyOf<C extends KeyCapability> {
  readonly capability: C;
  /** Length of the key material in bytes */
  readonly length: number;
  bytes(): Uint8Array;
}

export type SymmetricAuthenticationKey = KeyOf<'symmetric-authentication'>;
export type SymmetricEncryptionKey = KeyOf<'symmetric-encryption'>;
export type AsymmetricSecretKey = KeyOf<'asymmetric-secret'>;
export type AsymmetricPublicKey = KeyOf<'asymmetric-public'>;

export type Key =
  | SymmetricAuthenticationKey
  | SymmetricEncryptionKey
  | AsymmetricSecretKey
  | AsymmetricPublicKey;

export interface KeyPair {
  secretKey: AsymmetricSecretKey;
  publicKey: AsymmetricPublicKey;
}

// ── Protocol ──

/**
 * One versioned suite of token operations.
 *
 * Verifying operations take the full raw token, re-validate its framing and
 * throw on any failure. They never return partially verified bytes.
 */
export interface Protocol {
  /** Version header this suite answers to, e.g. `v2` */
  readonly header: string;

  authenticate(message: Uint8Array, key: SymmetricAuthenticationKey, footer?: Uint8Array): string;
  authVerify(token: string, key: SymmetricAuthenticationKey, footer: Uint8Array): Uint8Array;

  encrypt(message: Uint8Array, key: SymmetricEncryptionKey, footer?: Uint8Array): string;
  decrypt(token: string, key: SymmetricEncryptionKey, footer: Uint8Array): Uint8Array;

  /** Seal to a recipient's public key; only the matching secret key unseals. */
  seal(message: Uint8Array, key: AsymmetricPublicKey, footer?: Uint8Array): string;
  unseal(token: string, key: AsymmetricSecretKey, footer: Uint8Array): Uint8Array;

  sign(message: Uint8Array, key: AsymmetricSecretKey, footer?: Uint8Array): string;
  signVerify(token: string, key: AsymmetricPublicKey, footer: Uint8Array): Uint8Array;

  generateKeyPair(): KeyPair;
}

// ── Claims ──

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Decoded token payload: always a JSON object at the top level */
export type Claims = { [key: string]: JsonValue };

export interface RegisteredClaims {
  iss?: string;
  sub?: string;
  aud?: string;
  jti?: string;
  /** ISO-8601 date-time */
  exp?: string;
  nbf?: string;
  iat?: string;
}

export type TimeClaimStatus = 'ok' | 'expired' | 'not_yet_valid' | 'issued_in_future';

// ── Parsed Token ──

export interface ParsedToken {
  readonly version: string;
  readonly purpose: Purpose;
  readonly footer: Uint8Array;
  readonly key: Key;
  readonly claims: Readonly<Claims>;
}
