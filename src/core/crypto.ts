/**
 * Cryptographic utilities for Tessera.
 * Uses @noble/ed25519 for signing and blakejs for hashing.
 */

import * as ed from '@noble/ed25519';
import { blake2b } from 'blakejs';
import canonicalizeJson from 'canonicalize';
import { sha512 } from '@noble/hashes/sha2.js';
import { randomBytes as nobleRandomBytes } from '@noble/hashes/utils.js';

// ed25519 v2 requires setting the sha512 hash
ed.etc.sha512Sync = (...m: Uint8Array[]) => {
  const h = sha512.create();
  for (const msg of m) h.update(msg);
  return h.digest();
};

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Base64url decode. Only the canonical unpadded form is accepted, so every
 * byte string has exactly one encoding.
 */
export function fromBase64url(str: string): Uint8Array {
  if (!BASE64URL_PATTERN.test(str) || str.length % 4 === 1) {
    throw new Error('Invalid base64url');
  }
  const binary = atob(str.replace(/-/g, '+').replace(/_/g, '/'));
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  if (toBase64url(bytes) !== str) {
    throw new Error('Non-canonical base64url');
  }
  return bytes;
}

export function utf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function randomBytes(length: number): Uint8Array {
  return nobleRandomBytes(length);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const p of parts) total += p.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

/** Generate a random Ed25519 secret key */
export function generateSecretKey(): Uint8Array {
  return ed.utils.randomPrivateKey();
}

/** Derive the Ed25519 public key for a secret key */
export function getPublicKey(secretKey: Uint8Array): Uint8Array {
  return ed.getPublicKey(secretKey);
}

/** Sign a message with Ed25519 */
export function sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array {
  return ed.sign(message, secretKey);
}

/** Verify an Ed25519 signature */
export function verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** Keyed BLAKE2b with a caller-chosen output length */
export function blake2bKeyed(data: Uint8Array, key: Uint8Array, outlen: number): Uint8Array {
  return blake2b(data, key, outlen);
}

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

function le64(n: number): Uint8Array {
  const out = new Uint8Array(8);
  let rest = n;
  for (let i = 0; i < 8; i++) {
    out[i] = rest % 256;
    rest = Math.floor(rest / 256);
  }
  // MSB cleared
  out[7] &= 0x7f;
  return out;
}

/**
 * Pre-authentication encoding: piece count, then each piece prefixed by its
 * length, all as little-endian 64-bit integers.
 */
export function pae(...pieces: Uint8Array[]): Uint8Array {
  const parts: Uint8Array[] = [le64(pieces.length)];
  for (const piece of pieces) {
    parts.push(le64(piece.length), piece);
  }
  return concatBytes(...parts);
}

/** Compare two byte arrays of equal length without early exit. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

// Per-process comparison key
const compareKey = nobleRandomBytes(32);

/**
 * Constant-time equality for byte strings of any length. Both sides are
 * reduced to keyed digests first, so neither content nor length leaks.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  return bytesEqual(blake2b(a, compareKey, 32), blake2b(b, compareKey, 32));
}

/** Constant-time equality for strings. */
export function constantTimeStringEqual(a: string, b: string): boolean {
  return constantTimeEqual(utf8(a), utf8(b));
}
