/**
 * Token framing shared by the protocol suites.
 */

import type { Key, Purpose } from '../core/types.js';
import { ProtocolError } from '../core/errors.js';
import { PURPOSE_MIN_SEGMENTS } from '../core/keys.js';
import { constantTimeEqual, fromBase64url, toBase64url, utf8 } from '../core/crypto.js';

export const EMPTY: Uint8Array = new Uint8Array(0);

/** `<header>.<purpose>.` as bytes, the first piece of every PAE input */
export function prefixBytes(header: string, purpose: Purpose): Uint8Array {
  return utf8(`${header}.${purpose}.`);
}

/** Join header, purpose, payload pieces and a non-empty footer into a token. */
export function encodeToken(
  header: string,
  purpose: Purpose,
  payload: Uint8Array[],
  footer: Uint8Array = EMPTY,
): string {
  const segments = [header, purpose, ...payload.map(toBase64url)];
  if (footer.length > 0) segments.push(toBase64url(footer));
  return segments.join('.');
}

function decodeSegment(segment: string): Uint8Array {
  try {
    return fromBase64url(segment);
  } catch {
    throw new ProtocolError('Invalid token encoding');
  }
}

/**
 * Re-validate a token's framing and return its decoded payload pieces.
 * The footer carried by the token must equal the one the caller supplies.
 */
export function openToken(
  token: string,
  header: string,
  purpose: Purpose,
  footer: Uint8Array,
): Uint8Array[] {
  const pieces = token.split('.');
  const min = PURPOSE_MIN_SEGMENTS[purpose];
  if (pieces.length !== min && pieces.length !== min + 1) {
    throw new ProtocolError('Invalid segment count');
  }
  if (pieces[0] !== header) {
    throw new ProtocolError('Invalid header');
  }
  if (pieces[1] !== purpose) {
    throw new ProtocolError('Invalid purpose');
  }

  let tokenFooter: Uint8Array = EMPTY;
  if (pieces.length > min) {
    if (pieces[min] === '') throw new ProtocolError('Empty footer segment');
    tokenFooter = decodeSegment(pieces[min]);
  }
  if (!constantTimeEqual(tokenFooter, footer)) {
    throw new ProtocolError('Footer mismatch');
  }

  return pieces.slice(2, min).map(decodeSegment);
}

/** Copy of the key's bytes, checked against the suite's key length. */
export function keyMaterial(key: Key, length: number, what: string): Uint8Array {
  if (key.length !== length) {
    throw new ProtocolError(`${what} must be ${length} bytes`);
  }
  return key.bytes();
}

export function requireLength(bytes: Uint8Array, length: number, what: string): void {
  if (bytes.length !== length) {
    throw new ProtocolError(`${what} must be ${length} bytes`);
  }
}
