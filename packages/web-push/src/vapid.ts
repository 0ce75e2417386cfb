/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * VAPID sender authentication (RFC 8292).
 *
 * The assertion is a compact ES256 JWT scoped to the origin of the push endpoint. Only the signature is
 * produced by the Signer; header and claims are fixed, so no general JOSE library is involved.
 */

import { decodeBase64Url, encodeBase64Url, objectToBase64Url } from './base64';
import { InvalidEndpointError, MalformedKeyError, SigningFailedError } from './errors';
import { assertUncompressedPoint } from './keys';
import { SIGNATURE_LENGTH, type Signer } from './signer';
import { subtle } from './webcrypto';

/**
 * Assertions stay valid for 12 hours
 */
export const VAPID_EXPIRATION_SECONDS = 12 * 60 * 60;

const JWT_HEADER = { typ: 'JWT', alg: 'ES256' } as const;

export interface VapidClaims {
  aud: string;
  exp: number;
  sub: string;
}

export interface VapidAssertion {
  /**
   * Signed JWT
   */
  token: string;
  /**
   * Public key of the signature, base64url
   */
  publicKey: string;
}

export interface VapidAssertionOptions {
  signal?: AbortSignal;
  /**
   * Clock override in milliseconds since the epoch
   */
  now?: number;
}

/**
 * Origin of the push endpoint without path, query or fragment: `scheme://host[:port]`
 */
export function getAudience(endpoint: string): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new InvalidEndpointError(`Invalid endpoint URL: ${endpoint}`, { cause: error });
  }
  if (!url.host) {
    throw new InvalidEndpointError(`Endpoint has no host: ${endpoint}`);
  }
  return `${url.protocol}//${url.host}`;
}

export async function buildVapidAssertion(
  endpoint: string,
  subject: string,
  signer: Signer,
  options: VapidAssertionOptions = {},
): Promise<VapidAssertion> {
  const now = options.now ?? Date.now();
  const claims: VapidClaims = {
    aud: getAudience(endpoint),
    exp: Math.floor(now / 1000) + VAPID_EXPIRATION_SECONDS,
    sub: subject,
  };

  const signingInput = `${objectToBase64Url(JWT_HEADER)}.${objectToBase64Url(claims)}`;
  const digest = new Uint8Array(await subtle.digest('SHA-256', new TextEncoder().encode(signingInput)));

  let signature: Uint8Array;
  try {
    signature = await signer.sign(digest, { signal: options.signal });
  } catch (error) {
    throw new SigningFailedError('Signer failed to produce a VAPID signature', { cause: error });
  }
  // read in the same continuation as the signature so a concurrent rotation cannot split them
  const publicKey = signer.publicKey();

  if (signature.byteLength !== SIGNATURE_LENGTH) {
    throw new SigningFailedError(`Signer returned ${signature.byteLength} bytes, expected ${SIGNATURE_LENGTH}`);
  }

  return {
    token: `${signingInput}.${encodeBase64Url(signature)}`,
    publicKey: encodeBase64Url(publicKey),
  };
}

/**
 * Value of the Authorization header
 */
export function vapidAuthorization(assertion: VapidAssertion): string {
  return `vapid t=${assertion.token}, k=${assertion.publicKey}`;
}

/**
 * Encode a public key for PushManager.subscribe({ applicationServerKey })
 */
export function applicationServerKey(publicKey: Uint8Array): string {
  assertUncompressedPoint(publicKey, 'application server key');
  return encodeBase64Url(publicKey);
}

export function decodeApplicationServerKey(value: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = decodeBase64Url(value);
  } catch (error) {
    throw new MalformedKeyError('application server key is not valid base64url', { cause: error });
  }
  assertUncompressedPoint(bytes, 'application server key');
  return bytes;
}
