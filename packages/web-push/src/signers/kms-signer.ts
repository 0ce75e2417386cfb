/**
 * Remote-custody signer: the private key never leaves a key management service.
 *
 * The service is reached through the KmsClient port so that any provider (Cloud KMS, AWS KMS, an HSM
 * gateway) can be plugged in. Providers return DER signatures; this signer converts them to P1363.
 */

import { createPublicKey, type JsonWebKey } from 'node:crypto';

import { MalformedKeyError } from '../errors';
import { ecJwkToBytes } from '../keys';
import { DIGEST_LENGTH, type SignOptions, type Signer } from '../signer';
import { derToP1363 } from './der';

export interface KmsCallOptions {
  signal?: AbortSignal;
}

export interface KmsClient {
  /**
   * PEM-encoded SubjectPublicKeyInfo of the key version
   */
  getPublicKeyPem(keyName: string, options?: KmsCallOptions): Promise<string>;

  /**
   * Sign a SHA-256 digest, returning a DER-encoded ECDSA signature
   */
  asymmetricSign(keyName: string, digest: Uint8Array, options?: KmsCallOptions): Promise<Uint8Array>;
}

/**
 * Convert a PEM SubjectPublicKeyInfo into an uncompressed P-256 point
 */
export function publicKeyFromPem(pem: string): Uint8Array {
  let jwk: JsonWebKey;
  try {
    jwk = createPublicKey(pem).export({ format: 'jwk' });
  } catch (error) {
    throw new MalformedKeyError('failed to parse PEM public key', { cause: error });
  }
  if (jwk.kty !== 'EC' || jwk.crv !== 'P-256' || !jwk.x || !jwk.y) {
    throw new MalformedKeyError('key must be an EC P-256 public key');
  }
  return ecJwkToBytes({ x: jwk.x, y: jwk.y });
}

export class KmsSigner implements Signer {
  readonly #client: KmsClient;
  readonly #keyName: string;
  readonly #publicKey: Uint8Array;

  constructor(client: KmsClient, keyName: string, publicKey: Uint8Array) {
    this.#client = client;
    this.#keyName = keyName;
    this.#publicKey = publicKey.slice();
  }

  /**
   * Fetch the public key of `keyName` and build a signer for it.
   * keyName is the full key version resource name understood by the client.
   */
  static async create(client: KmsClient, keyName: string, options?: KmsCallOptions): Promise<KmsSigner> {
    const pem = await client.getPublicKeyPem(keyName, options);
    return new KmsSigner(client, keyName, publicKeyFromPem(pem));
  }

  get keyName(): string {
    return this.#keyName;
  }

  async sign(digest: Uint8Array, options?: SignOptions): Promise<Uint8Array> {
    if (digest.byteLength !== DIGEST_LENGTH) {
      throw new Error(`digest must be ${DIGEST_LENGTH} bytes, got ${digest.byteLength}`);
    }
    const der = await this.#client.asymmetricSign(this.#keyName, digest, { signal: options?.signal });
    return derToP1363(der);
  }

  publicKey(): Uint8Array {
    return this.#publicKey.slice();
  }
}

