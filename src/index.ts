/**
 * Tessera — versioned, self-describing security tokens.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export { PURPOSES, KEY_CAPABILITIES } from './core/types.js';
export type {
  Result,
  Purpose,
  KeyCapability,
  KeyOf,
  Key,
  KeyPair,
  SymmetricAuthenticationKey,
  SymmetricEncryptionKey,
  AsymmetricSecretKey,
  AsymmetricPublicKey,
  Protocol,
  JsonValue,
  Claims,
  RegisteredClaims,
  TimeClaimStatus,
  ParsedToken,
} from './core/types.js';

// ── Errors ──
export { TokenError, ProtocolError, isTokenError } from './core/errors.js';
export type { TokenErrorCode } from './core/errors.js';

// ── Keys ──
export {
  PURPOSE_KEY_CAPABILITY,
  PURPOSE_MIN_SEGMENTS,
  SYMMETRIC_KEY_BYTES,
  createKey,
  symmetricAuthenticationKey,
  symmetricEncryptionKey,
  asymmetricSecretKey,
  asymmetricPublicKey,
  generateSymmetricKey,
  isPurpose,
  isKeyCapability,
  purposeForCapability,
} from './core/keys.js';

// ── Encoding ──
export {
  toBase64url,
  fromBase64url,
  pae,
  constantTimeEqual,
  constantTimeStringEqual,
} from './core/crypto.js';

// ── Claims ──
export {
  encodeClaims,
  decodeClaims,
  readRegisteredClaims,
  checkTimeClaims,
} from './core/claims.js';

// ── Protocols ──
export {
  Version1,
  Version2,
  DEFAULT_ALLOWED_VERSIONS,
  DEFAULT_PROTOCOLS,
  getProtocol,
} from './protocol/index.js';

// ── Parser ──
export { Parser, ParserBuilder } from './core/parser.js';
export type { ParserOptions, TokenParser } from './core/parser.js';

// ── Observability ──
export {
  createLogger,
  ConsoleLogger,
  LogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
export { MetricsCollector, globalMetrics, DEFAULT_HISTOGRAM_LIMIT, PARSE_COUNTER, PARSE_DURATION } from './core/metrics.js';
export type { MetricsAdapter, MetricsCollectorOptions, MetricsSnapshot, Tags } from './core/metrics.js';
