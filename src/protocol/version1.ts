/**
 * Version 1: SHA-384, HMAC, HKDF, AES-256-CTR and P-384.
 */

import { ctr } from '@noble/ciphers/aes';
import { p384 } from '@noble/curves/p384';
import { hkdf } from '@noble/hashes/hkdf.js';
import { hmac } from '@noble/hashes/hmac.js';
import { sha384 } from '@noble/hashes/sha2.js';
import type {
  AsymmetricPublicKey,
  AsymmetricSecretKey,
  KeyPair,
  Protocol,
  Purpose,
  SymmetricAuthenticationKey,
  SymmetricEncryptionKey,
} from '../core/types.js';
import { ProtocolError } from '../core/errors.js';
import { asymmetricPublicKey, asymmetricSecretKey, SYMMETRIC_KEY_BYTES } from '../core/keys.js';
import { bytesEqual, concatBytes, pae, randomBytes, utf8 } from '../core/crypto.js';
import { EMPTY, encodeToken, keyMaterial, openToken, prefixBytes, requireLength } from './framing.js';

const HEADER = 'v1';
const MAC_BYTES = 48;
const NONCE_BYTES = 32;
const SECRET_KEY_BYTES = 48;
const PUBLIC_KEY_BYTES = 49;
const SIGNATURE_BYTES = 96;

const ENCRYPTION_KEY_INFO = utf8('encryption-key');
const AUTHENTICATION_KEY_INFO = utf8('authentication-key');
const SEAL_KEY_INFO = utf8('seal-key');

// ── AES-256-CTR then HMAC-SHA384 ──

function splitKeys(key: Uint8Array, nonce: Uint8Array) {
  const salt = nonce.slice(0, 16);
  return {
    encryptionKey: hkdf(sha384, key, salt, ENCRYPTION_KEY_INFO, 32),
    authenticationKey: hkdf(sha384, key, salt, AUTHENTICATION_KEY_INFO, 32),
  };
}

/**
 * Encrypt-then-MAC. `bound` pieces are covered by the tag between the
 * prefix and the nonce. Output is nonce ‖ ciphertext ‖ tag.
 */
function boxEncrypt(
  purpose: Purpose,
  key: Uint8Array,
  bound: Uint8Array[],
  message: Uint8Array,
  footer: Uint8Array,
): Uint8Array {
  const nonce = randomBytes(NONCE_BYTES);
  const { encryptionKey, authenticationKey } = splitKeys(key, nonce);
  const ciphertext = ctr(encryptionKey, nonce.slice(16)).encrypt(message);
  const tag = hmac(sha384, authenticationKey, pae(prefixBytes(HEADER, purpose), ...bound, nonce, ciphertext, footer));
  return concatBytes(nonce, ciphertext, tag);
}

function boxDecrypt(
  purpose: Purpose,
  key: Uint8Array,
  bound: Uint8Array[],
  body: Uint8Array,
  footer: Uint8Array,
): Uint8Array {
  if (body.length < NONCE_BYTES + MAC_BYTES) throw new ProtocolError('Message too short');
  const nonce = body.slice(0, NONCE_BYTES);
  const ciphertext = body.slice(NONCE_BYTES, body.length - MAC_BYTES);
  const tag = body.slice(body.length - MAC_BYTES);

  const { encryptionKey, authenticationKey } = splitKeys(key, nonce);
  const expected = hmac(sha384, authenticationKey, pae(prefixBytes(HEADER, purpose), ...bound, nonce, ciphertext, footer));
  if (!bytesEqual(tag, expected)) {
    throw new ProtocolError('Invalid message authentication code');
  }
  return ctr(encryptionKey, nonce.slice(16)).decrypt(ciphertext);
}

// ── P-384 helpers ──

function sharedKey(secret: Uint8Array, peer: Uint8Array, ephemeral: Uint8Array, recipient: Uint8Array): Uint8Array {
  // x coordinate of the shared point
  const shared = p384.getSharedSecret(secret, peer, true).slice(1);
  return hkdf(sha384, shared, concatBytes(ephemeral, recipient), SEAL_KEY_INFO, 32);
}

function signingDigest(message: Uint8Array, footer: Uint8Array): Uint8Array {
  return sha384(pae(prefixBytes(HEADER, 'sign'), message, footer));
}

export const Version1: Protocol = {
  header: HEADER,

  authenticate(message: Uint8Array, key: SymmetricAuthenticationKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Authentication key');
    const tag = hmac(sha384, material, pae(prefixBytes(HEADER, 'auth'), message, footer));
    return encodeToken(HEADER, 'auth', [concatBytes(message, tag)], footer);
  },

  authVerify(token: string, key: SymmetricAuthenticationKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Authentication key');
    const [body] = openToken(token, HEADER, 'auth', footer);
    if (body.length < MAC_BYTES) throw new ProtocolError('Message too short');

    const message = body.slice(0, body.length - MAC_BYTES);
    const tag = body.slice(body.length - MAC_BYTES);
    const expected = hmac(sha384, material, pae(prefixBytes(HEADER, 'auth'), message, footer));
    if (!bytesEqual(tag, expected)) {
      throw new ProtocolError('Invalid message authentication code');
    }
    return message;
  },

  encrypt(message: Uint8Array, key: SymmetricEncryptionKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Encryption key');
    const body = boxEncrypt('enc', material, [], message, footer);
    return encodeToken(HEADER, 'enc', [body], footer);
  },

  decrypt(token: string, key: SymmetricEncryptionKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Encryption key');
    const [body] = openToken(token, HEADER, 'enc', footer);
    return boxDecrypt('enc', material, [], body, footer);
  },

  seal(message: Uint8Array, key: AsymmetricPublicKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, PUBLIC_KEY_BYTES, 'Public key');
    const ephemeralSecret = p384.utils.randomPrivateKey();
    const ephemeral = p384.getPublicKey(ephemeralSecret, true);
    const boxKey = sharedKey(ephemeralSecret, material, ephemeral, material);
    const body = boxEncrypt('seal', boxKey, [ephemeral], message, footer);
    return encodeToken(HEADER, 'seal', [ephemeral, body], footer);
  },

  unseal(token: string, key: AsymmetricSecretKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, SECRET_KEY_BYTES, 'Secret key');
    const [ephemeral, body] = openToken(token, HEADER, 'seal', footer);
    requireLength(ephemeral, PUBLIC_KEY_BYTES, 'Ephemeral public key');

    const recipient = p384.getPublicKey(material, true);
    const boxKey = sharedKey(material, ephemeral, ephemeral, recipient);
    return boxDecrypt('seal', boxKey, [ephemeral], body, footer);
  },

  sign(message: Uint8Array, key: AsymmetricSecretKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, SECRET_KEY_BYTES, 'Secret key');
    const signature = p384.sign(signingDigest(message, footer), material).toCompactRawBytes();
    return encodeToken(HEADER, 'sign', [message, signature], footer);
  },

  signVerify(token: string, key: AsymmetricPublicKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, PUBLIC_KEY_BYTES, 'Public key');
    const [message, signature] = openToken(token, HEADER, 'sign', footer);
    requireLength(signature, SIGNATURE_BYTES, 'Signature');

    const parsed = p384.Signature.fromCompact(signature);
    if (!p384.verify(parsed, signingDigest(message, footer), material)) {
      throw new ProtocolError('Invalid signature');
    }
    return message;
  },

  generateKeyPair(): KeyPair {
    const secret = p384.utils.randomPrivateKey();
    return {
      secretKey: asymmetricSecretKey(secret),
      publicKey: asymmetricPublicKey(p384.getPublicKey(secret, true)),
    };
  },
};
