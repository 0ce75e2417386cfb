/**
 * Keys stored on disk as PEM ("EC PRIVATE KEY", SEC1) files.
 */

import { createPrivateKey, type JsonWebKey } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';

import { decodeBase64Url, encodeBase64Url } from '../base64';
import { MalformedKeyError } from '../errors';
import { rawP256ToJwk } from '../keys';
import { LocalSigner } from './local-signer';

/**
 * Parse a PEM private key (SEC1 or PKCS#8) into a signer. Only P-256 keys are accepted.
 */
export function signerFromPem(pem: string): LocalSigner {
  let jwk: JsonWebKey;
  try {
    jwk = createPrivateKey(pem).export({ format: 'jwk' });
  } catch (error) {
    throw new MalformedKeyError('failed to parse PEM private key', { cause: error });
  }
  if (jwk.kty !== 'EC' || jwk.crv !== 'P-256' || !jwk.d) {
    throw new MalformedKeyError('key must be an EC P-256 private key');
  }
  return new LocalSigner(decodeBase64Url(jwk.d));
}

/**
 * Serialize a signer's key as a SEC1 PEM document
 */
export function signerToPem(signer: LocalSigner): string {
  const key = createPrivateKey({
    key: { ...rawP256ToJwk(signer.publicKey()), d: encodeBase64Url(signer.exportPrivateKey()) },
    format: 'jwk',
  });
  return key.export({ type: 'sec1', format: 'pem' }).toString();
}

/**
 * Load a signer from a PEM file
 */
export async function loadFileSigner(privateKeyPath: string): Promise<LocalSigner> {
  const pem = await readFile(privateKeyPath, 'utf8');
  return signerFromPem(pem);
}

/**
 * Generate a new P-256 key, write it to `path` with owner-only permissions and return its signer
 */
export async function generateFileSigner(path: string): Promise<LocalSigner> {
  const signer = LocalSigner.generate();
  await writeFile(path, signerToPem(signer), { mode: 0o600 });
  return signer;
}
