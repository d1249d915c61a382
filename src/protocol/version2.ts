/**
 * Version 2: BLAKE2b, XChaCha20-Poly1305, X25519 and Ed25519.
 *
 * Sealed tokens are addressed to an Ed25519 public key: the key is mapped to
 * its Montgomery form and an ephemeral X25519 exchange derives the box key.
 * The same key pair therefore serves both `seal` and `sign`.
 */

import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { edwardsToMontgomeryPriv, edwardsToMontgomeryPub, x25519 } from '@noble/curves/ed25519';
import type {
  AsymmetricPublicKey,
  AsymmetricSecretKey,
  KeyPair,
  Protocol,
  SymmetricAuthenticationKey,
  SymmetricEncryptionKey,
} from '../core/types.js';
import { ProtocolError } from '../core/errors.js';
import { asymmetricPublicKey, asymmetricSecretKey, SYMMETRIC_KEY_BYTES } from '../core/keys.js';
import {
  blake2bKeyed,
  bytesEqual,
  concatBytes,
  generateSecretKey,
  getPublicKey,
  pae,
  randomBytes,
  sign,
  utf8,
  verify,
} from '../core/crypto.js';
import { EMPTY, encodeToken, keyMaterial, openToken, prefixBytes, requireLength } from './framing.js';

const HEADER = 'v2';
const MAC_BYTES = 32;
const NONCE_BYTES = 24;
const POLY1305_TAG_BYTES = 16;
const CURVE25519_KEY_BYTES = 32;
const SIGNATURE_BYTES = 64;

const SEAL_KEY_INFO = utf8('seal-key');
const SEAL_NONCE_INFO = utf8('seal-nonce');

function mac(key: Uint8Array, message: Uint8Array, footer: Uint8Array): Uint8Array {
  return blake2bKeyed(pae(prefixBytes(HEADER, 'auth'), message, footer), key, MAC_BYTES);
}

function sealParams(shared: Uint8Array, ephemeral: Uint8Array, recipient: Uint8Array) {
  return {
    key: blake2bKeyed(pae(SEAL_KEY_INFO, ephemeral, recipient), shared, 32),
    nonce: blake2bKeyed(pae(SEAL_NONCE_INFO, ephemeral, recipient), shared, NONCE_BYTES),
  };
}

export const Version2: Protocol = {
  header: HEADER,

  authenticate(message: Uint8Array, key: SymmetricAuthenticationKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Authentication key');
    const tag = mac(material, message, footer);
    return encodeToken(HEADER, 'auth', [concatBytes(message, tag)], footer);
  },

  authVerify(token: string, key: SymmetricAuthenticationKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Authentication key');
    const [body] = openToken(token, HEADER, 'auth', footer);
    if (body.length < MAC_BYTES) throw new ProtocolError('Message too short');

    const message = body.slice(0, body.length - MAC_BYTES);
    const tag = body.slice(body.length - MAC_BYTES);
    if (!bytesEqual(tag, mac(material, message, footer))) {
      throw new ProtocolError('Invalid message authentication code');
    }
    return message;
  },

  encrypt(message: Uint8Array, key: SymmetricEncryptionKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Encryption key');
    const nonce = randomBytes(NONCE_BYTES);
    const aad = pae(prefixBytes(HEADER, 'enc'), nonce, footer);
    const ciphertext = xchacha20poly1305(material, nonce, aad).encrypt(message);
    return encodeToken(HEADER, 'enc', [concatBytes(nonce, ciphertext)], footer);
  },

  decrypt(token: string, key: SymmetricEncryptionKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, SYMMETRIC_KEY_BYTES, 'Encryption key');
    const [body] = openToken(token, HEADER, 'enc', footer);
    if (body.length < NONCE_BYTES + POLY1305_TAG_BYTES) throw new ProtocolError('Message too short');

    const nonce = body.slice(0, NONCE_BYTES);
    const ciphertext = body.slice(NONCE_BYTES);
    const aad = pae(prefixBytes(HEADER, 'enc'), nonce, footer);
    return xchacha20poly1305(material, nonce, aad).decrypt(ciphertext);
  },

  seal(message: Uint8Array, key: AsymmetricPublicKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, CURVE25519_KEY_BYTES, 'Public key');
    const recipient = edwardsToMontgomeryPub(material);
    const ephemeralSecret = x25519.utils.randomPrivateKey();
    const ephemeral = x25519.getPublicKey(ephemeralSecret);
    const shared = x25519.getSharedSecret(ephemeralSecret, recipient);

    const params = sealParams(shared, ephemeral, recipient);
    const aad = pae(prefixBytes(HEADER, 'seal'), ephemeral, footer);
    const ciphertext = xchacha20poly1305(params.key, params.nonce, aad).encrypt(message);
    return encodeToken(HEADER, 'seal', [ephemeral, ciphertext], footer);
  },

  unseal(token: string, key: AsymmetricSecretKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, CURVE25519_KEY_BYTES, 'Secret key');
    const [ephemeral, ciphertext] = openToken(token, HEADER, 'seal', footer);
    requireLength(ephemeral, CURVE25519_KEY_BYTES, 'Ephemeral public key');

    const recipient = edwardsToMontgomeryPub(getPublicKey(material));
    const shared = x25519.getSharedSecret(edwardsToMontgomeryPriv(material), ephemeral);

    const params = sealParams(shared, ephemeral, recipient);
    const aad = pae(prefixBytes(HEADER, 'seal'), ephemeral, footer);
    return xchacha20poly1305(params.key, params.nonce, aad).decrypt(ciphertext);
  },

  sign(message: Uint8Array, key: AsymmetricSecretKey, footer: Uint8Array = EMPTY): string {
    const material = keyMaterial(key, CURVE25519_KEY_BYTES, 'Secret key');
    const signature = sign(material, pae(prefixBytes(HEADER, 'sign'), message, footer));
    return encodeToken(HEADER, 'sign', [message, signature], footer);
  },

  signVerify(token: string, key: AsymmetricPublicKey, footer: Uint8Array): Uint8Array {
    const material = keyMaterial(key, CURVE25519_KEY_BYTES, 'Public key');
    const [message, signature] = openToken(token, HEADER, 'sign', footer);
    requireLength(signature, SIGNATURE_BYTES, 'Signature');
    if (!verify(material, pae(prefixBytes(HEADER, 'sign'), message, footer), signature)) {
      throw new ProtocolError('Invalid signature');
    }
    return message;
  },

  generateKeyPair(): KeyPair {
    const secret = generateSecretKey();
    return {
      secretKey: asymmetricSecretKey(secret),
      publicKey: asymmetricPublicKey(getPublicKey(secret)),
    };
  },
};
