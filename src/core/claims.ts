/**
 * Claims: JSON object payload encoding and the registered claim helpers.
 */

import { Ajv } from 'ajv';
import type { Claims, RegisteredClaims, Result, TimeClaimStatus } from './types.js';
import { TokenError } from './errors.js';
import { canonicalize, utf8 } from './crypto.js';

const ajv = new Ajv({ strict: false });

const DATE_TIME_PATTERN = '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?(Z|[+-]\\d{2}:\\d{2})$';

const registeredClaimsSchema = {
  type: 'object',
  properties: {
    iss: { type: 'string' },
    sub: { type: 'string' },
    aud: { type: 'string' },
    jti: { type: 'string' },
    exp: { type: 'string', pattern: DATE_TIME_PATTERN },
    nbf: { type: 'string', pattern: DATE_TIME_PATTERN },
    iat: { type: 'string', pattern: DATE_TIME_PATTERN },
  },
};

const validateRegistered = ajv.compile<RegisteredClaims>(registeredClaimsSchema);

/** Encode claims as canonical JSON (RFC 8785) bytes. */
export function encodeClaims(claims: Claims): Uint8Array {
  return utf8(canonicalize(claims));
}

function isJsonObject(value: unknown): value is Claims {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode verified payload bytes. Anything other than UTF-8 JSON with an
 * object at the top level is rejected.
 */
export function decodeClaims(bytes: Uint8Array): Claims {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (e) {
    throw new TokenError('not_a_json_token', 'Not a JSON token', { cause: e });
  }
  if (!isJsonObject(parsed)) {
    throw new TokenError('not_a_json_token', 'Not a JSON token');
  }
  return parsed;
}

const DATE_FIELDS = /^(\d{4})-(\d{2})-(\d{2})T/;

/** The calendar day must exist; Date.parse alone rolls 02-30 into March. */
function isDateTime(value: string): boolean {
  if (Number.isNaN(Date.parse(value))) return false;
  const fields = DATE_FIELDS.exec(value);
  if (fields === null) return false;
  const year = Number(fields[1]);
  const month = Number(fields[2]) - 1;
  const day = Number(fields[3]);
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month && date.getUTCDate() === day;
}

/** Pick out the registered claims, checking their types. */
export function readRegisteredClaims(claims: Claims): Result<RegisteredClaims, string> {
  if (!validateRegistered(claims)) {
    return { ok: false, error: ajv.errorsText(validateRegistered.errors) };
  }
  const registered: RegisteredClaims = {};
  for (const name of ['iss', 'sub', 'aud', 'jti', 'exp', 'nbf', 'iat'] as const) {
    const value = claims[name];
    if (typeof value === 'string') registered[name] = value;
  }
  for (const name of ['exp', 'nbf', 'iat'] as const) {
    const value = registered[name];
    if (value !== undefined && !isDateTime(value)) {
      return { ok: false, error: `${name} is not a valid date-time` };
    }
  }
  return { ok: true, value: registered };
}

/** Evaluate exp, nbf and iat against `now`. Absent claims pass. */
export function checkTimeClaims(claims: RegisteredClaims, now: Date = new Date()): TimeClaimStatus {
  const t = now.getTime();
  if (claims.exp !== undefined && Date.parse(claims.exp) <= t) return 'expired';
  if (claims.nbf !== undefined && Date.parse(claims.nbf) > t) return 'not_yet_valid';
  if (claims.iat !== undefined && Date.parse(claims.iat) > t) return 'issued_in_future';
  return 'ok';
}
