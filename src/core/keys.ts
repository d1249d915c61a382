/**
 * Keys: capability-tagged key material and the purpose binding tables.
 */

import { KEY_CAPABILITIES, PURPOSES } from './types.js';
import type {
  AsymmetricPublicKey,
  AsymmetricSecretKey,
  KeyCapability,
  KeyOf,
  Purpose,
  SymmetricAuthenticationKey,
  SymmetricEncryptionKey,
} from './types.js';
import { randomBytes } from './crypto.js';

export const SYMMETRIC_KEY_BYTES = 32;

// ── Binding Tables ──

/** The key capability each purpose requires */
export const PURPOSE_KEY_CAPABILITY = {
  auth: 'symmetric-authentication',
  enc: 'symmetric-encryption',
  seal: 'asymmetric-secret',
  sign: 'asymmetric-public',
} as const satisfies Record<Purpose, KeyCapability>;

/** Segment count of a footer-less token; one more means a footer is present */
export const PURPOSE_MIN_SEGMENTS = {
  auth: 3,
  enc: 3,
  seal: 4,
  sign: 4,
} as const satisfies Record<Purpose, number>;

const CAPABILITY_PURPOSE = {
  'symmetric-authentication': 'auth',
  'symmetric-encryption': 'enc',
  'asymmetric-secret': 'seal',
  'asymmetric-public': 'sign',
} as const satisfies Record<KeyCapability, Purpose>;

/** The purpose a key capability is used for when parsing */
export function purposeForCapability(capability: KeyCapability): Purpose {
  return CAPABILITY_PURPOSE[capability];
}

export function isPurpose(value: string): value is Purpose {
  return (PURPOSES as readonly string[]).includes(value);
}

export function isKeyCapability(value: string): value is KeyCapability {
  return (KEY_CAPABILITIES as readonly string[]).includes(value);
}

// ── Construction ──

class CapabilityKey<C extends KeyCapability> implements KeyOf<C> {
  readonly #material: Uint8Array;

  constructor(
    readonly capability: C,
    material: Uint8Array,
  ) {
    this.#material = Uint8Array.from(material);
    Object.freeze(this);
  }

  get length(): number {
    return this.#material.length;
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.#material);
  }
}

/** Build an immutable key. The material is copied in. */
export function createKey<C extends KeyCapability>(capability: C, material: Uint8Array): KeyOf<C> {
  if (!isKeyCapability(capability)) {
    throw new Error(`Unknown key capability: ${String(capability)}`);
  }
  if (!(material instanceof Uint8Array) || material.length === 0) {
    throw new Error('Key material must be a non-empty Uint8Array');
  }
  return new CapabilityKey(capability, material);
}

export function symmetricAuthenticationKey(material: Uint8Array): SymmetricAuthenticationKey {
  return createKey('symmetric-authentication', material);
}

export function symmetricEncryptionKey(material: Uint8Array): SymmetricEncryptionKey {
  return createKey('symmetric-encryption', material);
}

export function asymmetricSecretKey(material: Uint8Array): AsymmetricSecretKey {
  return createKey('asymmetric-secret', material);
}

export function asymmetricPublicKey(material: Uint8Array): AsymmetricPublicKey {
  return createKey('asymmetric-public', material);
}

/** Generate a random 32-byte symmetric key */
export function generateSymmetricKey<C extends 'symmetric-authentication' | 'symmetric-encryption'>(
  capability: C,
): KeyOf<C> {
  return createKey(capability, randomBytes(SYMMETRIC_KEY_BYTES));
}
