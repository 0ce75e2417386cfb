import { createPublicKey, webcrypto } from 'node:crypto';

import { p256 } from '@noble/curves/p256';

import { encodeBase64Url } from '../src/base64';
import { rawP256ToJwk } from '../src/keys';
import { p1363ToDer } from '../src/signers/der';
import type { KmsCallOptions, KmsClient } from '../src/signers/kms-signer';
import { LocalSigner } from '../src/signers/local-signer';

export interface SubscriberKeys {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
  authSecret: Uint8Array;
}

/**
 * Key material a browser would create when subscribing
 */
export function generateSubscriberKeys(): SubscriberKeys {
  const privateKey = p256.utils.randomPrivateKey();
  return {
    privateKey,
    publicKey: p256.getPublicKey(privateKey, false),
    authSecret: webcrypto.getRandomValues(new Uint8Array(16)),
  };
}

export function subscriptionJson(keys: SubscriberKeys, endpoint = 'https://push.example.com/abc') {
  return {
    endpoint,
    expirationTime: null,
    keys: { p256dh: encodeBase64Url(keys.publicKey), auth: encodeBase64Url(keys.authSecret) },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * In-process stand-in for a key management service holding P-256 keys by version name
 */
export class FakeKmsClient implements KmsClient {
  readonly keys = new Map<string, LocalSigner>();
  readonly signCalls: Array<{ keyName: string; signal?: AbortSignal }> = [];

  addKey(keyName: string): LocalSigner {
    const signer = LocalSigner.generate();
    this.keys.set(keyName, signer);
    return signer;
  }

  async getPublicKeyPem(keyName: string): Promise<string> {
    const signer = this.#lookup(keyName);
    const key = createPublicKey({ key: { ...rawP256ToJwk(signer.publicKey()) }, format: 'jwk' });
    return key.export({ type: 'spki', format: 'pem' }).toString();
  }

  async asymmetricSign(keyName: string, digest: Uint8Array, options?: KmsCallOptions): Promise<Uint8Array> {
    this.signCalls.push({ keyName, signal: options?.signal });
    const signature = await this.#lookup(keyName).sign(digest);
    return p1363ToDer(signature);
  }

  #lookup(keyName: string): LocalSigner {
    const signer = this.keys.get(keyName);
    if (!signer) {
      throw new Error(`NOT_FOUND: ${keyName}`);
    }
    return signer;
  }
}

/**
 * Verify a P1363 signature over a prehashed digest
 */
export function verifyDigest(signature: Uint8Array, digest: Uint8Array, publicKey: Uint8Array): boolean {
  return p256.verify(signature, digest, publicKey);
}
