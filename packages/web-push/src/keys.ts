/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * P-256 key format helpers
 *
 * Raw format: 0x04 || x (32 bytes) || y (32 bytes)
 * JWK format: { kty: "EC", crv: "P-256", x: "...", y: "..." }
 */

import { decodeBase64Url, encodeBase64Url } from './base64';
import { MalformedKeyError } from './errors';
import { subtle, type CryptoKey, type JsonWebKey } from './webcrypto';

export const P256_PUBLIC_KEY_LENGTH = 65;
export const P256_PRIVATE_KEY_LENGTH = 32;

/**
 * Check length and the uncompressed-point prefix. Curve membership is checked on import.
 */
export function assertUncompressedPoint(publicKey: Uint8Array, label = 'public key'): void {
  if (publicKey.byteLength !== P256_PUBLIC_KEY_LENGTH) {
    throw new MalformedKeyError(`${label} must be ${P256_PUBLIC_KEY_LENGTH} bytes, got ${publicKey.byteLength}`);
  }
  if (publicKey[0] !== 0x04) {
    throw new MalformedKeyError(`${label} must be an uncompressed point (0x04 prefix)`);
  }
}

export function rawP256ToJwk(rawPublicKey: Uint8Array): JsonWebKey {
  assertUncompressedPoint(rawPublicKey);
  return {
    kty: 'EC',
    crv: 'P-256',
    x: encodeBase64Url(rawPublicKey.slice(1, 33)),
    y: encodeBase64Url(rawPublicKey.slice(33, 65)),
  };
}

/**
 * ANSI X9.62 point encoding of a JWK's coordinates
 */
export function ecJwkToBytes(jwk: JsonWebKey): Uint8Array {
  if (!jwk.x || !jwk.y) {
    throw new MalformedKeyError('JWK is missing x or y');
  }
  const x = decodeBase64Url(jwk.x);
  const y = decodeBase64Url(jwk.y);
  if (x.byteLength !== 32 || y.byteLength !== 32) {
    throw new MalformedKeyError('JWK coordinates must be 32 bytes');
  }
  const raw = new Uint8Array(P256_PUBLIC_KEY_LENGTH);
  raw[0] = 0x04;
  raw.set(x, 1);
  raw.set(y, 33);
  return raw;
}

/**
 * Import a subscriber's public key for ECDH. Points that are not on P-256 are rejected.
 */
export async function importEcdhPublicKey(rawPublicKey: Uint8Array): Promise<CryptoKey> {
  assertUncompressedPoint(rawPublicKey, 'client public key');
  try {
    return await subtle.importKey('raw', rawPublicKey, { name: 'ECDH', namedCurve: 'P-256' }, false, []);
  } catch (error) {
    throw new MalformedKeyError('client public key is not a valid P-256 point', { cause: error });
  }
}

/**
 * Import a raw private scalar (with its public point) as an ECDH private key
 */
export async function importEcdhPrivateKey(privateKey: Uint8Array, publicKey: Uint8Array): Promise<CryptoKey> {
  if (privateKey.byteLength !== P256_PRIVATE_KEY_LENGTH) {
    throw new MalformedKeyError(`private key must be ${P256_PRIVATE_KEY_LENGTH} bytes, got ${privateKey.byteLength}`);
  }
  try {
    return await subtle.importKey(
      'jwk',
      { ...rawP256ToJwk(publicKey), d: encodeBase64Url(privateKey) },
      { name: 'ECDH', namedCurve: 'P-256' },
      false,
      ['deriveBits'],
    );
  } catch (error) {
    throw new MalformedKeyError('private key does not match a P-256 key pair', { cause: error });
  }
}
