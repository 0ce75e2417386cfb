/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * Generate local ephemeral keys for encryption
 */

import { ecJwkToBytes } from './keys';
import { subtle, type CryptoKey } from './webcrypto';

export interface LocalKeys {
  privateKey: CryptoKey;
  publicKeyBytes: Uint8Array;
}

/**
 * Fresh ECDH P-256 key pair; one per message, never reused
 */
export async function generateLocalKeys(): Promise<LocalKeys> {
  const keyPair = await subtle.generateKey({ name: 'ECDH', namedCurve: 'P-256' }, true, ['deriveBits']);
  const publicJwk = await subtle.exportKey('jwk', keyPair.publicKey);

  return {
    privateKey: keyPair.privateKey,
    publicKeyBytes: ecJwkToBytes(publicJwk),
  };
}
