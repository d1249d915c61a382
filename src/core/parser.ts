/**
 * Parser: validates token structure, gates version, purpose and key
 * capability, then hands the token to its versioned protocol suite.
 */

import type {
  Key,
  KeyCapability,
  KeyOf,
  ParsedToken,
  Protocol,
  Purpose,
  Result,
} from './types.js';
import { TokenError, verificationFailed } from './errors.js';
import { PURPOSE_KEY_CAPABILITY, PURPOSE_MIN_SEGMENTS, isPurpose, purposeForCapability } from './keys.js';
import { constantTimeStringEqual, fromBase64url } from './crypto.js';
import { decodeClaims } from './claims.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { globalMetrics, PARSE_COUNTER, PARSE_DURATION } from './metrics.js';
import type { MetricsCollector } from './metrics.js';
import { DEFAULT_ALLOWED_VERSIONS, DEFAULT_PROTOCOLS, getProtocol } from '../protocol/index.js';

// ── Purpose Dispatch ──

type RequiredKey<P extends Purpose> = KeyOf<(typeof PURPOSE_KEY_CAPABILITY)[P]>;

type Verifier<P extends Purpose> = (
  protocol: Protocol,
  token: string,
  key: RequiredKey<P>,
  footer: Uint8Array,
) => Uint8Array;

const VERIFIERS: { [P in Purpose]: Verifier<P> } = {
  auth: (protocol, token, key, footer) => protocol.authVerify(token, key, footer),
  enc: (protocol, token, key, footer) => protocol.decrypt(token, key, footer),
  seal: (protocol, token, key, footer) => protocol.unseal(token, key, footer),
  sign: (protocol, token, key, footer) => protocol.signVerify(token, key, footer),
};

function keyFitsPurpose<P extends Purpose>(key: KeyOf<KeyCapability>, purpose: P): key is RequiredKey<P> {
  return key.capability === PURPOSE_KEY_CAPABILITY[purpose];
}

/** The final segment is the footer when the purpose minimum is exceeded. */
function extractFooter(purpose: Purpose, pieces: string[]): Uint8Array {
  if (pieces.length <= PURPOSE_MIN_SEGMENTS[purpose]) return new Uint8Array(0);
  try {
    return fromBase64url(pieces[pieces.length - 1]);
  } catch (e) {
    throw new TokenError('truncated_or_invalid', 'Truncated or invalid token', { cause: e });
  }
}

// ── Configuration ──

export interface ParserOptions {
  /** Version headers to accept (default: `v1`, `v2`) */
  allowedVersions?: readonly string[];
  /** Pin a purpose; tokens declaring any other are rejected */
  purpose?: Purpose;
  /** Bound with a purpose check at construction */
  key?: Key;
  /** Suites keyed by header (default: the built-in suites) */
  protocols?: ReadonlyMap<string, Protocol>;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/** Read-only parser produced by {@link ParserBuilder}. */
export interface TokenParser {
  readonly allowedVersions: readonly string[];
  readonly purpose: Purpose | undefined;
  parse(tainted: string): ParsedToken;
  safeParse(tainted: string): Result<ParsedToken, TokenError>;
}

// ── Parser ──

/**
 * Mutable parser with checked and unchecked setters for staged
 * configuration. Reconfiguring an instance while it is shared with other
 * callers is not supported; build a {@link TokenParser} for that.
 */
export class Parser {
  private allowedVersions: readonly string[];
  private purpose: Purpose | undefined;
  private key: Key | undefined;
  private readonly protocols: ReadonlyMap<string, Protocol>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  /** @throws TokenError when `key` does not fit `purpose` (always checked here) */
  constructor(options: ParserOptions = {}) {
    this.allowedVersions = [...(options.allowedVersions ?? DEFAULT_ALLOWED_VERSIONS)];
    this.purpose = options.purpose;
    this.protocols = options.protocols ?? DEFAULT_PROTOCOLS;
    this.logger = options.logger ?? createLogger('Parser');
    this.metrics = options.metrics ?? globalMetrics;
    if (options.key !== undefined) {
      this.setKey(options.key, true);
    }
  }

  static builder(): ParserBuilder {
    return new ParserBuilder();
  }

  getAllowedVersions(): string[] {
    return [...this.allowedVersions];
  }

  getPurpose(): Purpose | undefined {
    return this.purpose;
  }

  getKey(): Key | undefined {
    return this.key;
  }

  /**
   * Replace the key. With `checkPurpose`, the key must carry the capability
   * the pinned purpose requires; otherwise binding is left to `parse`.
   */
  setKey(key: Key, checkPurpose = false): this {
    if (checkPurpose) {
      if (this.purpose === undefined) {
        throw new TokenError('unknown_purpose', 'Unknown purpose');
      }
      const expected = PURPOSE_KEY_CAPABILITY[this.purpose];
      if (key.capability !== expected) {
        throw new TokenError('invalid_key_type', `Invalid key type. Expected ${expected}, got ${key.capability}`);
      }
    }
    this.key = key;
    return this;
  }

  /**
   * Replace the pinned purpose. With `checkKeyType`, the held key's
   * capability must imply the same purpose (compared in constant time).
   */
  setPurpose(purpose: Purpose, checkKeyType = false): this {
    if (checkKeyType) {
      if (this.key === undefined) {
        throw new TokenError('unknown_purpose', `Unknown purpose: no key to check ${purpose} against`);
      }
      const expected = purposeForCapability(this.key.capability);
      if (!constantTimeStringEqual(expected, purpose)) {
        throw new TokenError('purpose_mismatch', `Invalid purpose. Expected ${expected}, got ${purpose}`);
      }
    }
    this.purpose = purpose;
    return this;
  }

  /**
   * Verify or decrypt a token and return its claims.
   * @throws TokenError on any rejection; nothing partial is returned
   */
  parse(tainted: string): ParsedToken {
    const started = performance.now();
    try {
      const token = this.verify(tainted);
      this.metrics.counter(PARSE_COUNTER, { outcome: 'accepted', version: token.version, purpose: token.purpose });
      this.logger.debug('Token accepted', { version: token.version, purpose: token.purpose });
      return token;
    } catch (e) {
      const code = e instanceof TokenError ? e.code : 'unexpected';
      this.metrics.counter(PARSE_COUNTER, { outcome: 'rejected', code });
      this.logger.debug('Token rejected', { code });
      throw e;
    } finally {
      this.metrics.histogram(PARSE_DURATION, performance.now() - started);
    }
  }

  /** Like `parse`, but reports rejection as a Result. */
  safeParse(tainted: string): Result<ParsedToken, TokenError> {
    try {
      return { ok: true, value: this.parse(tainted) };
    } catch (e) {
      if (e instanceof TokenError) return { ok: false, error: e };
      throw e;
    }
  }

  private verify(tainted: string): ParsedToken {
    const pieces = tainted.split('.');
    if (pieces.length < 3) {
      throw new TokenError('truncated_or_invalid', 'Truncated or invalid token');
    }

    const header = pieces[0];
    if (!this.allowedVersions.includes(header)) {
      throw new TokenError('unsupported_version', 'Disallowed or unsupported version');
    }
    const protocol = getProtocol(header, this.protocols);
    if (protocol === undefined) {
      throw new TokenError('unsupported_version', 'Disallowed or unsupported version');
    }

    const purpose = pieces[1];
    if (this.purpose !== undefined && !constantTimeStringEqual(this.purpose, purpose)) {
      throw new TokenError('disallowed_purpose', 'Disallowed or unsupported purpose');
    }
    if (!isPurpose(purpose)) {
      // No suite operation matches, so nothing was decoded
      throw new TokenError('unsupported_purpose_or_version', 'Unsupported purpose or version');
    }

    return this.verifyFor(protocol, header, purpose, pieces, tainted);
  }

  private verifyFor<P extends Purpose>(
    protocol: Protocol,
    header: string,
    purpose: P,
    pieces: string[],
    tainted: string,
  ): ParsedToken {
    const key = this.key;
    if (key === undefined || !keyFitsPurpose(key, purpose)) {
      throw new TokenError('invalid_key_type', 'Invalid key type');
    }

    const footer = extractFooter(purpose, pieces);

    let decoded: Uint8Array;
    try {
      decoded = VERIFIERS[purpose](protocol, tainted, key, footer);
    } catch (e) {
      throw verificationFailed(e);
    }

    const claims = decodeClaims(decoded);
    return Object.freeze({
      version: header,
      purpose,
      footer,
      key,
      claims: Object.freeze(claims),
    });
  }
}

// ── Builder ──

/** Stages configuration and produces an immutable {@link TokenParser}. */
export class ParserBuilder {
  private versions: readonly string[] = DEFAULT_ALLOWED_VERSIONS;
  private purpose?: Purpose;
  private key?: Key;
  private protocols?: ReadonlyMap<string, Protocol>;
  private logger?: Logger;
  private metrics?: MetricsCollector;

  withVersions(...versions: string[]): this {
    this.versions = versions;
    return this;
  }

  withPurpose(purpose: Purpose): this {
    this.purpose = purpose;
    return this;
  }

  withKey(key: Key): this {
    this.key = key;
    return this;
  }

  withProtocols(protocols: ReadonlyMap<string, Protocol>): this {
    this.protocols = protocols;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  withMetrics(metrics: MetricsCollector): this {
    this.metrics = metrics;
    return this;
  }

  /** @throws TokenError without a key, or when the key does not fit the purpose */
  build(): TokenParser {
    if (this.key === undefined) {
      throw new TokenError('invalid_key_type', 'A key is required');
    }
    const parser = new Parser({
      allowedVersions: this.versions,
      purpose: this.purpose,
      protocols: this.protocols,
      logger: this.logger,
      metrics: this.metrics,
    });
    parser.setKey(this.key, this.purpose !== undefined);

    return Object.freeze({
      allowedVersions: Object.freeze(parser.getAllowedVersions()),
      purpose: this.purpose,
      parse: (tainted: string) => parser.parse(tainted),
      safeParse: (tainted: string) => parser.safeParse(tainted),
    });
  }
}
