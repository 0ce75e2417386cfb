/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * HMAC-based Extract-and-Expand Key Derivation Function (HKDF, RFC 5869)
 * Implementation for Web Push encryption, limited to outputs of one hash length.
 */

import { concatBytes } from './utils';
import { subtle } from './webcrypto';

const SHA256_HASH_LENGTH = 32;

/**
 * Create HMAC-SHA-256 hash function keyed with `key`
 */
function createHMAC(key: Uint8Array) {
  // WebCrypto refuses zero-length HMAC keys; HMAC zero-pads the key, so HashLen zero bytes is the same key
  const keyBytes = key.byteLength === 0 ? new Uint8Array(SHA256_HASH_LENGTH) : key;
  const keyPromise = subtle.importKey('raw', keyBytes, { name: 'HMAC', hash: 'SHA-256' }, false, ['sign']);

  return {
    hash: async (input: Uint8Array): Promise<Uint8Array> => {
      const k = await keyPromise;
      return new Uint8Array(await subtle.sign('HMAC', k, input));
    },
  };
}

/**
 * PRK = HMAC-Hash(salt, IKM)
 */
export async function hkdfExtract(salt: Uint8Array, ikm: Uint8Array): Promise<Uint8Array> {
  return createHMAC(salt).hash(ikm);
}

/**
 * First block of HKDF-Expand: T(1) = HMAC-Hash(PRK, info || 0x01), truncated to `length`
 */
export async function hkdfExpand(prk: Uint8Array, info: Uint8Array, length: number): Promise<Uint8Array> {
  if (length > SHA256_HASH_LENGTH) {
    throw new RangeError(`HKDF output longer than ${SHA256_HASH_LENGTH} bytes is not supported`);
  }
  const block = await createHMAC(prk).hash(concatBytes(info, new Uint8Array([1])));
  return block.slice(0, length);
}

/**
 * HKDF key derivation, extracting once and expanding per info string
 */
export async function hkdf(salt: Uint8Array, ikm: Uint8Array) {
  const prkPromise = hkdfExtract(salt, ikm);

  return {
    expand: async (info: Uint8Array, length: number) => hkdfExpand(await prkPromise, info, length),
  };
}
