/**
 * Signing capability used for VAPID assertions.
 *
 * Implementations sign a 32-byte SHA-256 digest and return a 64-byte IEEE P1363 signature (r || s).
 * Backends that produce DER (most KMS services) convert before returning.
 */

export interface SignOptions {
  /**
   * Propagated to remote backends; aborting rejects the pending signature
   */
  signal?: AbortSignal;
}

export interface Signer {
  sign(digest: Uint8Array, options?: SignOptions): Promise<Uint8Array>;

  /**
   * Uncompressed P-256 point, 65 bytes
   */
  publicKey(): Uint8Array;
}

export const DIGEST_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;
