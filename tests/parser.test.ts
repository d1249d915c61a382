import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Parser } from '../src/core/parser.js';
import { TokenError, ProtocolError } from '../src/core/errors.js';
import type { TokenErrorCode } from '../src/core/errors.js';
import { Version1, Version2 } from '../src/protocol/index.js';
import { generateSymmetricKey, asymmetricPublicKey, symmetricAuthenticationKey } from '../src/core/keys.js';
import { encodeClaims } from '../src/core/claims.js';
import { utf8 } from '../src/core/crypto.js';
import { MetricsCollector, PARSE_COUNTER, PARSE_DURATION } from '../src/core/metrics.js';
import { LogLevel, setGlobalLogLevel, setLogOutput, resetLogOutput } from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';
import type { Claims, Key, Protocol, Purpose } from '../src/core/types.js';

// ── Helpers ──

const claims: Claims = { sub: 'alice', exp: '2099-01-01T00:00:00Z' };
const footer = utf8('kid:1');

function rejection(fn: () => unknown): TokenError {
  try {
    fn();
  } catch (e) {
    if (e instanceof TokenError) return e;
    throw e;
  }
  throw new Error('expected a TokenError');
}

function codeOf(fn: () => unknown): TokenErrorCode {
  return rejection(fn).code;
}

/** Issue a token for `purpose` and return it with the key that parses it. */
function issue(protocol: Protocol, purpose: Purpose, payload = encodeClaims(claims), tokenFooter = footer) {
  switch (purpose) {
    case 'auth': {
      const key = generateSymmetricKey('symmetric-authentication');
      return { token: protocol.authenticate(payload, key, tokenFooter), key };
    }
    case 'enc': {
      const key = generateSymmetricKey('symmetric-encryption');
      return { token: protocol.encrypt(payload, key, tokenFooter), key };
    }
    case 'seal': {
      const pair = protocol.generateKeyPair();
      return { token: protocol.seal(payload, pair.publicKey, tokenFooter), key: pair.secretKey };
    }
    case 'sign': {
      const pair = protocol.generateKeyPair();
      return { token: protocol.sign(payload, pair.secretKey, tokenFooter), key: pair.publicKey };
    }
  }
}

function spyProtocol(base: Protocol) {
  return {
    header: base.header,
    authenticate: vi.fn(base.authenticate),
    authVerify: vi.fn(base.authVerify),
    encrypt: vi.fn(base.encrypt),
    decrypt: vi.fn(base.decrypt),
    seal: vi.fn(base.seal),
    unseal: vi.fn(base.unseal),
    sign: vi.fn(base.sign),
    signVerify: vi.fn(base.signVerify),
    generateKeyPair: vi.fn(base.generateKeyPair),
  } satisfies Protocol;
}

type SpyProtocol = ReturnType<typeof spyProtocol>;

function verifierCalls(spy: SpyProtocol): number {
  return (
    spy.authVerify.mock.calls.length +
    spy.decrypt.mock.calls.length +
    spy.unseal.mock.calls.length +
    spy.signVerify.mock.calls.length
  );
}

const PURPOSE_LIST: Purpose[] = ['auth', 'enc', 'seal', 'sign'];

// ── Tests ──

describe('Parser', () => {
  describe('round trip', () => {
    describe.each([Version1, Version2])('$header', (protocol) => {
      it.each(PURPOSE_LIST)('parses a %s token with claims and footer', (purpose) => {
        const { token, key } = issue(protocol, purpose);
        const parsed = new Parser({ purpose, key }).parse(token);

        expect(parsed.version).toBe(protocol.header);
        expect(parsed.purpose).toBe(purpose);
        expect(parsed.footer).toEqual(footer);
        expect(parsed.claims).toEqual(claims);
        expect(parsed.key).toBe(key);
      });

      it.each(PURPOSE_LIST)('parses a %s token without footer', (purpose) => {
        const { token, key } = issue(protocol, purpose, encodeClaims(claims), new Uint8Array(0));
        const parsed = new Parser().setKey(key).parse(token);
        expect(parsed.footer).toEqual(new Uint8Array(0));
        expect(parsed.claims).toEqual(claims);
      });
    });

    it('returns a frozen result', () => {
      const { token, key } = issue(Version2, 'auth');
      const parsed = new Parser({ purpose: 'auth', key }).parse(token);
      expect(Object.isFrozen(parsed)).toBe(true);
      expect(Object.isFrozen(parsed.claims)).toBe(true);
    });
  });

  describe('key isolation', () => {
    it('keeps the bound key intact when a result key is written to', () => {
      const { token, key } = issue(Version2, 'auth');
      const parser = new Parser({ purpose: 'auth', key });
      const first = parser.parse(token);

      first.key.bytes().fill(0);
      const second = parser.safeParse(token);
      expect(second.ok).toBe(true);
    });

    it('ignores later writes to the bytes a key was built from', () => {
      const raw = new Uint8Array(32).fill(5);
      const key = symmetricAuthenticationKey(raw);
      const token = Version1.authenticate(encodeClaims(claims), key, footer);
      const parser = new Parser({ purpose: 'auth', key });

      raw.fill(0);
      key.bytes()[0] ^= 1;
      expect(parser.parse(token).claims).toEqual(claims);
    });
  });

  describe('structure', () => {
    it('rejects tokens with fewer than 3 segments', () => {
      const { key } = issue(Version2, 'auth');
      const parser = new Parser().setKey(key);
      for (const token of ['', 'v2', 'v2.auth', 'garbage']) {
        expect(codeOf(() => parser.parse(token))).toBe('truncated_or_invalid');
      }
    });

    it('rejects a footer segment that is not base64url before any protocol call', () => {
      const spy = spyProtocol(Version2);
      const { token, key } = issue(Version2, 'auth', encodeClaims(claims), new Uint8Array(0));
      const parser = new Parser({ protocols: new Map([['v2', spy]]) }).setKey(key);

      expect(codeOf(() => parser.parse(`${token}.a+b`))).toBe('truncated_or_invalid');
      expect(codeOf(() => parser.parse(`${token}.QR`))).toBe('truncated_or_invalid');
      expect(verifierCalls(spy)).toBe(0);
    });

    it('decodes the final segment as the footer', () => {
      const { token, key } = issue(Version2, 'auth');
      const parser = new Parser().setKey(key);
      expect(codeOf(() => parser.parse(`${token}.a+b`))).toBe('truncated_or_invalid');
      expect(codeOf(() => parser.parse(`${token}.AA`))).toBe('protocol_verification_failed');
    });
  });

  describe('version gate', () => {
    it('rejects headers outside the allow-list even when a suite exists', () => {
      const { token, key } = issue(Version1, 'auth');
      const parser = new Parser({ allowedVersions: ['v2'] }).setKey(key);
      const err = rejection(() => parser.parse(token));
      expect(err.code).toBe('unsupported_version');
      expect(err.message).toBe('Disallowed or unsupported version');
    });

    it('rejects unknown headers', () => {
      const parser = new Parser().setKey(generateSymmetricKey('symmetric-authentication'));
      expect(codeOf(() => parser.parse('v3.auth.AAAA'))).toBe('unsupported_version');
      expect(codeOf(() => parser.parse('V2.auth.AAAA'))).toBe('unsupported_version');
    });

    it('rejects allowed headers that have no suite', () => {
      const parser = new Parser({ allowedVersions: ['v2', 'v9', 'constructor'] })
        .setKey(generateSymmetricKey('symmetric-authentication'));
      expect(codeOf(() => parser.parse('v9.auth.AAAA'))).toBe('unsupported_version');
      expect(codeOf(() => parser.parse('constructor.auth.AAAA'))).toBe('unsupported_version');
    });

    it('exposes a copy of the allow-list', () => {
      const parser = new Parser();
      const versions = parser.getAllowedVersions();
      versions.push('v9');
      expect(parser.getAllowedVersions()).toEqual(['v1', 'v2']);
    });
  });

  describe('purpose gate', () => {
    it('rejects a different purpose without invoking any cryptography', () => {
      const spy = spyProtocol(Version2);
      const { token } = issue(Version2, 'enc');
      const parser = new Parser({
        purpose: 'auth',
        key: generateSymmetricKey('symmetric-authentication'),
        protocols: new Map([['v2', spy]]),
      });

      const err = rejection(() => parser.parse(token));
      expect(err.code).toBe('disallowed_purpose');
      expect(err.message).toBe('Disallowed or unsupported purpose');
      expect(verifierCalls(spy)).toBe(0);
    });

    it('rejects unrecognised purposes with nothing decoded', () => {
      const spy = spyProtocol(Version2);
      const parser = new Parser({ protocols: new Map([['v2', spy]]) })
        .setKey(generateSymmetricKey('symmetric-authentication'));
      const err = rejection(() => parser.parse('v2.local.e30'));
      expect(err.code).toBe('unsupported_purpose_or_version');
      expect(err.message).toBe('Unsupported purpose or version');
      expect(verifierCalls(spy)).toBe(0);
    });

    it('rejects unrecognised purposes at the pin first', () => {
      const parser = new Parser({ purpose: 'auth', key: generateSymmetricKey('symmetric-authentication') });
      expect(codeOf(() => parser.parse('v2.local.e30'))).toBe('disallowed_purpose');
    });

    it('compares purposes exactly', () => {
      const parser = new Parser({ purpose: 'auth', key: generateSymmetricKey('symmetric-authentication') });
      expect(codeOf(() => parser.parse('v2.auth .e30'))).toBe('disallowed_purpose');
      expect(codeOf(() => parser.parse('v2.Auth.e30'))).toBe('disallowed_purpose');
    });
  });

  describe('key-capability gate', () => {
    it('rejects an enc token under an authentication key before decrypting', () => {
      const spy = spyProtocol(Version2);
      const { token } = issue(Version2, 'enc');
      const parser = new Parser({ protocols: new Map([['v2', spy]]) })
        .setKey(generateSymmetricKey('symmetric-authentication'));

      const err = rejection(() => parser.parse(token));
      expect(err.code).toBe('invalid_key_type');
      expect(spy.decrypt).not.toHaveBeenCalled();
      expect(verifierCalls(spy)).toBe(0);
    });

    it('rejects when no key is held', () => {
      const { token } = issue(Version2, 'auth');
      expect(codeOf(() => new Parser().parse(token))).toBe('invalid_key_type');
    });

    const mismatched: { purpose: Purpose; wrong: () => Key }[] = [
      { purpose: 'auth', wrong: () => generateSymmetricKey('symmetric-encryption') },
      { purpose: 'enc', wrong: () => generateSymmetricKey('symmetric-authentication') },
      { purpose: 'seal', wrong: () => Version2.generateKeyPair().publicKey },
      { purpose: 'sign', wrong: () => Version2.generateKeyPair().secretKey },
    ];

    it.each(mismatched)('rejects a $purpose token under another capability', ({ purpose, wrong }) => {
      const { token } = issue(Version2, purpose);
      expect(codeOf(() => new Parser().setKey(wrong()).parse(token))).toBe('invalid_key_type');
    });
  });

  describe('protocol dispatch', () => {
    it('passes the whole token, the key and the footer to the suite', () => {
      const spy = spyProtocol(Version2);
      const { token, key } = issue(Version2, 'auth');
      new Parser({ purpose: 'auth', key, protocols: new Map([['v2', spy]]) }).parse(token);

      expect(spy.authVerify).toHaveBeenCalledTimes(1);
      const [passedToken, passedKey, passedFooter] = spy.authVerify.mock.calls[0];
      expect(passedToken).toBe(token);
      expect(passedKey).toBe(key);
      expect(passedFooter).toEqual(footer);
    });

    it('reads seal and sign footers from the fifth segment', () => {
      const spy = spyProtocol(Version2);
      const protocols = new Map([['v2', spy]]);
      const sealed = issue(Version2, 'seal');
      const signed = issue(Version2, 'sign');

      new Parser({ protocols }).setKey(sealed.key).parse(sealed.token);
      new Parser({ protocols }).setKey(signed.key).parse(signed.token);

      expect(spy.unseal.mock.calls[0][2]).toEqual(footer);
      expect(spy.signVerify.mock.calls[0][2]).toEqual(footer);
    });

    it('reports a tampered auth payload as a verification failure', () => {
      const { token, key } = issue(Version2, 'auth');
      const pieces = token.split('.');
      pieces[2] = (pieces[2][0] === 'A' ? 'B' : 'A') + pieces[2].slice(1);

      const err = rejection(() => new Parser({ purpose: 'auth', key }).parse(pieces.join('.')));
      expect(err.code).toBe('protocol_verification_failed');
      expect(err.message).toBe('Token verification failed');
      expect(err.cause).toBeInstanceOf(ProtocolError);
    });

    it('uses one message for every cryptographic failure', () => {
      const { token, key } = issue(Version2, 'auth');
      const wrongKey = rejection(() =>
        new Parser().setKey(generateSymmetricKey('symmetric-authentication')).parse(token),
      );
      const wrongFooter = rejection(() => new Parser().setKey(key).parse(token.replace(/\.[^.]+$/, '.a2lkOjI')));
      expect(wrongKey.message).toBe(wrongFooter.message);
      expect(wrongKey.code).toBe('protocol_verification_failed');
      expect(wrongFooter.code).toBe('protocol_verification_failed');
    });

    it('wraps anything a suite throws', () => {
      const failing: Protocol = {
        ...Version2,
        authVerify: () => {
          throw new RangeError('boom');
        },
      };
      const { token, key } = issue(Version2, 'auth');
      const err = rejection(() => new Parser({ protocols: new Map([['v2', failing]]) }).setKey(key).parse(token));
      expect(err.code).toBe('protocol_verification_failed');
      expect(err.cause).toBeInstanceOf(RangeError);
    });
  });

  describe('claims decode', () => {
    it('rejects a verified top-level array', () => {
      const { token, key } = issue(Version2, 'auth', utf8('["a","b"]'));
      expect(codeOf(() => new Parser({ purpose: 'auth', key }).parse(token))).toBe('not_a_json_token');
    });

    it('rejects a verified scalar', () => {
      const { token, key } = issue(Version1, 'sign', utf8('true'));
      expect(codeOf(() => new Parser().setKey(key).parse(token))).toBe('not_a_json_token');
    });
  });

  describe('configuration', () => {
    it('checks the key against the purpose at construction', () => {
      const publicKey = Version2.generateKeyPair().publicKey;
      const err = rejection(() => new Parser({ purpose: 'auth', key: publicKey }));
      expect(err.code).toBe('invalid_key_type');
      expect(err.message).toBe('Invalid key type. Expected symmetric-authentication, got asymmetric-public');
    });

    it('refuses a checked key binding without a purpose', () => {
      const key = generateSymmetricKey('symmetric-authentication');
      expect(codeOf(() => new Parser({ key }))).toBe('unknown_purpose');
      expect(codeOf(() => new Parser().setKey(key, true))).toBe('unknown_purpose');
    });

    it('setKey without a check defers binding to parse', () => {
      const parser = new Parser({ purpose: 'auth' });
      const publicKey = Version2.generateKeyPair().publicKey;
      expect(parser.setKey(publicKey)).toBe(parser);
      expect(parser.getKey()).toBe(publicKey);

      const { token } = issue(Version2, 'auth');
      expect(codeOf(() => parser.parse(token))).toBe('invalid_key_type');
    });

    it('setPurpose with a check rejects a purpose the key does not serve', () => {
      const parser = new Parser().setKey(asymmetricPublicKey(new Uint8Array(32).fill(9)));
      const err = rejection(() => parser.setPurpose('auth', true));
      expect(err.code).toBe('purpose_mismatch');
      expect(err.message).toBe('Invalid purpose. Expected sign, got auth');
      expect(parser.getPurpose()).toBeUndefined();
    });

    it('setPurpose without a check is accepted and parse still gates the key', () => {
      const parser = new Parser().setKey(asymmetricPublicKey(new Uint8Array(32).fill(9)));
      expect(parser.setPurpose('auth', false)).toBe(parser);
      expect(parser.getPurpose()).toBe('auth');

      const { token } = issue(Version2, 'auth');
      expect(codeOf(() => parser.parse(token))).toBe('invalid_key_type');
    });

    it('setPurpose with a check and a matching key succeeds', () => {
      const parser = new Parser().setKey(generateSymmetricKey('symmetric-encryption'));
      expect(parser.setPurpose('enc', true).getPurpose()).toBe('enc');
    });

    it('setPurpose with a check and no key fails', () => {
      expect(codeOf(() => new Parser().setPurpose('sign', true))).toBe('unknown_purpose');
    });
  });

  describe('safeParse', () => {
    it('returns the token on success', () => {
      const { token, key } = issue(Version2, 'enc');
      const result = new Parser({ purpose: 'enc', key }).safeParse(token);
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.claims).toEqual(claims);
    });

    it('returns the error on rejection', () => {
      const result = new Parser().safeParse('v2.auth');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('truncated_or_invalid');
    });
  });

  describe('observability', () => {
    let captured: LogEntry[];

    beforeEach(() => {
      captured = [];
      setLogOutput((entry) => captured.push(entry));
      setGlobalLogLevel(LogLevel.DEBUG);
    });

    afterEach(() => {
      resetLogOutput();
      setGlobalLogLevel(LogLevel.WARN);
    });

    it('counts accepted and rejected tokens', () => {
      const metrics = new MetricsCollector();
      const { token, key } = issue(Version2, 'auth');
      const parser = new Parser({ purpose: 'auth', key, metrics });

      parser.parse(token);
      parser.safeParse('v3.auth.e30');
      parser.safeParse('v2.auth');

      expect(metrics.getCounter(PARSE_COUNTER, { outcome: 'accepted', version: 'v2', purpose: 'auth' })).toBe(1);
      expect(metrics.getCounter(PARSE_COUNTER, { outcome: 'rejected', code: 'unsupported_version' })).toBe(1);
      expect(metrics.getCounter(PARSE_COUNTER, { outcome: 'rejected', code: 'truncated_or_invalid' })).toBe(1);
      expect(metrics.getHistogramValues(PARSE_DURATION)).toHaveLength(3);
    });

    it('logs rejections with the code only', () => {
      const parser = new Parser({ metrics: new MetricsCollector() });
      parser.safeParse('v3.auth.e30');

      expect(captured).toHaveLength(1);
      expect(captured[0].module).toBe('Parser');
      expect(captured[0].level).toBe('DEBUG');
      expect(captured[0].message).toBe('Token rejected');
      expect(captured[0].context).toEqual({ code: 'unsupported_version' });
    });
  });
});

describe('ParserBuilder', () => {
  it('requires a key', () => {
    const err = rejection(() => Parser.builder().withPurpose('auth').build());
    expect(err.code).toBe('invalid_key_type');
    expect(err.message).toBe('A key is required');
  });

  it('checks the key against a pinned purpose', () => {
    const builder = Parser.builder().withPurpose('enc').withKey(generateSymmetricKey('symmetric-authentication'));
    expect(codeOf(() => builder.build())).toBe('invalid_key_type');
  });

  it('builds a frozen parser that verifies tokens', () => {
    const { token, key } = issue(Version1, 'sign');
    const parser = Parser.builder().withVersions('v1').withPurpose('sign').withKey(key).build();

    expect(Object.isFrozen(parser)).toBe(true);
    expect(parser.allowedVersions).toEqual(['v1']);
    expect(parser.purpose).toBe('sign');
    expect(parser.parse(token).claims).toEqual(claims);
  });

  it('leaves key binding to parse when no purpose is pinned', () => {
    const parser = Parser.builder().withKey(generateSymmetricKey('symmetric-encryption')).build();
    const { token } = issue(Version2, 'auth');
    const result = parser.safeParse(token);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('invalid_key_type');
  });

  it('applies the version allow-list', () => {
    const { token, key } = issue(Version2, 'auth');
    const parser = Parser.builder().withVersions('v1').withKey(key).build();
    expect(codeOf(() => parser.parse(token))).toBe('unsupported_version');
  });
});
