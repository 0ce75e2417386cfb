/**
 * Signer holding a raw P-256 private scalar in memory.
 */

import { p256 } from '@noble/curves/p256';

import { decodeBase64Url, encodeBase64Url } from '../base64';
import { MalformedKeyError } from '../errors';
import { P256_PRIVATE_KEY_LENGTH } from '../keys';
import { DIGEST_LENGTH, type SignOptions, type Signer } from '../signer';

export interface VapidKeyPair {
  /**
   * 32-byte private scalar, base64url
   */
  privateKey: string;
  /**
   * 65-byte uncompressed public point, base64url
   */
  publicKey: string;
}

export class LocalSigner implements Signer {
  readonly #privateKey: Uint8Array;
  readonly #publicKey: Uint8Array;

  constructor(privateKey: Uint8Array) {
    if (privateKey.byteLength !== P256_PRIVATE_KEY_LENGTH) {
      throw new MalformedKeyError(
        `private key must be ${P256_PRIVATE_KEY_LENGTH} bytes, got ${privateKey.byteLength}`,
      );
    }
    if (!p256.utils.isValidPrivateKey(privateKey)) {
      throw new MalformedKeyError('private key is outside the P-256 scalar range');
    }
    this.#privateKey = privateKey.slice();
    this.#publicKey = p256.getPublicKey(this.#privateKey, false);
  }

  static generate(): LocalSigner {
    return new LocalSigner(p256.utils.randomPrivateKey());
  }

  static fromBase64(privateKey: string): LocalSigner {
    let bytes: Uint8Array;
    try {
      bytes = decodeBase64Url(privateKey);
    } catch (error) {
      throw new MalformedKeyError('private key is not valid base64url', { cause: error });
    }
    return new LocalSigner(bytes);
  }

  async sign(digest: Uint8Array, options?: SignOptions): Promise<Uint8Array> {
    options?.signal?.throwIfAborted();
    if (digest.byteLength !== DIGEST_LENGTH) {
      throw new Error(`digest must be ${DIGEST_LENGTH} bytes, got ${digest.byteLength}`);
    }
    return p256.sign(digest, this.#privateKey).toCompactRawBytes();
  }

  publicKey(): Uint8Array {
    return this.#publicKey.slice();
  }

  publicKeyBase64(): string {
    return encodeBase64Url(this.#publicKey);
  }

  /**
   * Raw private scalar, for persisting the key
   */
  exportPrivateKey(): Uint8Array {
    return this.#privateKey.slice();
  }
}

/**
 * Generate a new key pair, both halves base64url encoded
 */
export function generateVapidKeys(): VapidKeyPair {
  const signer = LocalSigner.generate();
  return {
    privateKey: encodeBase64Url(signer.exportPrivateKey()),
    publicKey: signer.publicKeyBase64(),
  };
}
