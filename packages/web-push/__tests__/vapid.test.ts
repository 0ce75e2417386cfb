import { createHash, webcrypto } from 'node:crypto';

import { describe, expect, it, vi } from 'vitest';

import { base64UrlToObject, decodeBase64Url, encodeBase64Url } from '../src/base64';
import { InvalidEndpointError, MalformedKeyError, SigningFailedError } from '../src/errors';
import type { SignOptions, Signer } from '../src/signer';
import { LocalSigner } from '../src/signers/local-signer';
import {
  applicationServerKey,
  buildVapidAssertion,
  decodeApplicationServerKey,
  getAudience,
  VAPID_EXPIRATION_SECONDS,
  vapidAuthorization,
} from '../src/vapid';

const ENDPOINT = 'https://push.example.com/abc';
const SUBJECT = 'mailto:ops@example.com';

function splitToken(token: string) {
  const [header, claims, signature] = token.split('.');
  return { header, claims, signature };
}

function readExpiry(token: string): number {
  const claims = base64UrlToObject(splitToken(token).claims);
  if (typeof claims !== 'object' || claims === null || !('exp' in claims) || typeof claims.exp !== 'number') {
    throw new Error('token has no numeric exp claim');
  }
  return claims.exp;
}

class RecordingSigner implements Signer {
  readonly calls: Array<{ digest: Uint8Array; options?: SignOptions }> = [];

  constructor(
    private readonly result: () => Promise<Uint8Array>,
    private readonly key = LocalSigner.generate().publicKey(),
  ) {}

  async sign(digest: Uint8Array, options?: SignOptions): Promise<Uint8Array> {
    this.calls.push({ digest, options });
    return this.result();
  }

  publicKey(): Uint8Array {
    return this.key;
  }
}

describe('getAudience', () => {
  it('keeps scheme, host and port only', () => {
    expect(getAudience('https://push.example.com/abc?x=1#f')).toBe('https://push.example.com');
    expect(getAudience('https://push.example.com:8443/abc')).toBe('https://push.example.com:8443');
  });

  it('rejects endpoints that are not absolute URLs with a host', () => {
    expect(() => getAudience('/relative/path')).toThrow(InvalidEndpointError);
    expect(() => getAudience('mailto:ops@example.com')).toThrow(InvalidEndpointError);
  });
});

describe('buildVapidAssertion', () => {
  it('signs an ES256 JWT scoped to the endpoint origin', async () => {
    const signer = LocalSigner.generate();
    const now = 1_700_000_000_000;

    const assertion = await buildVapidAssertion(ENDPOINT, SUBJECT, signer, { now });
    const { header, claims, signature } = splitToken(assertion.token);

    expect(base64UrlToObject(header)).toEqual({ typ: 'JWT', alg: 'ES256' });
    expect(base64UrlToObject(claims)).toEqual({
      aud: 'https://push.example.com',
      exp: 1_700_000_000 + VAPID_EXPIRATION_SECONDS,
      sub: SUBJECT,
    });
    expect(decodeBase64Url(signature).byteLength).toBe(64);
    expect(assertion.publicKey).toBe(signer.publicKeyBase64());
  });

  it('produces a signature that verifies against the reported key', async () => {
    const signer = LocalSigner.generate();
    const assertion = await buildVapidAssertion(ENDPOINT, SUBJECT, signer);
    const { header, claims, signature } = splitToken(assertion.token);

    const key = await webcrypto.subtle.importKey(
      'raw',
      decodeBase64Url(assertion.publicKey),
      { name: 'ECDSA', namedCurve: 'P-256' },
      false,
      ['verify'],
    );
    const valid = await webcrypto.subtle.verify(
      { name: 'ECDSA', hash: 'SHA-256' },
      key,
      decodeBase64Url(signature),
      new TextEncoder().encode(`${header}.${claims}`),
    );
    expect(valid).toBe(true);
  });

  it('expires twelve hours after the current time', async () => {
    const before = Math.floor(Date.now() / 1000);
    const assertion = await buildVapidAssertion(ENDPOINT, SUBJECT, LocalSigner.generate());
    const after = Math.floor(Date.now() / 1000);

    const exp = readExpiry(assertion.token);
    expect(exp).toBeGreaterThanOrEqual(before + VAPID_EXPIRATION_SECONDS);
    expect(exp).toBeLessThanOrEqual(after + VAPID_EXPIRATION_SECONDS);
  });

  it('hands the SHA-256 digest of the signing input and the abort signal to the signer', async () => {
    const real = LocalSigner.generate();
    const signer = new RecordingSigner(() => real.sign(new Uint8Array(32)), real.publicKey());
    const controller = new AbortController();

    const assertion = await buildVapidAssertion(ENDPOINT, SUBJECT, signer, { signal: controller.signal });
    const { header, claims } = splitToken(assertion.token);

    expect(signer.calls).toHaveLength(1);
    const expected = createHash('sha256').update(`${header}.${claims}`).digest();
    expect(Buffer.from(signer.calls[0].digest).equals(expected)).toBe(true);
    expect(signer.calls[0].options?.signal).toBe(controller.signal);
  });

  it('wraps signer failures and keeps the original error as cause', async () => {
    const failure = new Error('kms unavailable');
    const signer = new RecordingSigner(() => Promise.reject(failure));

    const result = buildVapidAssertion(ENDPOINT, SUBJECT, signer);
    await expect(result).rejects.toBeInstanceOf(SigningFailedError);
    await expect(result).rejects.toMatchObject({ kind: 'signer', cause: failure });
  });

  it('rejects signatures that are not 64 bytes', async () => {
    const signer = new RecordingSigner(() => Promise.resolve(new Uint8Array(70)));
    await expect(buildVapidAssertion(ENDPOINT, SUBJECT, signer)).rejects.toThrow(
      'Signer returned 70 bytes, expected 64',
    );
  });

  it('does not sign for an invalid endpoint', async () => {
    const signer = new RecordingSigner(() => Promise.resolve(new Uint8Array(64)));
    const sign = vi.spyOn(signer, 'sign');

    await expect(buildVapidAssertion('not a url', SUBJECT, signer)).rejects.toBeInstanceOf(InvalidEndpointError);
    expect(sign).not.toHaveBeenCalled();
  });
});

describe('vapidAuthorization', () => {
  it('formats the Authorization header value', () => {
    expect(vapidAuthorization({ token: 'a.b.c', publicKey: 'BKey' })).toBe('vapid t=a.b.c, k=BKey');
  });
});

describe('applicationServerKey', () => {
  it('encodes and decodes the public key', () => {
    const signer = LocalSigner.generate();
    const encoded = applicationServerKey(signer.publicKey());

    expect(encoded).toBe(encodeBase64Url(signer.publicKey()));
    expect(decodeApplicationServerKey(encoded)).toEqual(signer.publicKey());
  });

  it('rejects values that are not uncompressed points', () => {
    expect(() => applicationServerKey(new Uint8Array(33))).toThrow(MalformedKeyError);
    expect(() => decodeApplicationServerKey('***')).toThrow(MalformedKeyError);
    expect(() => decodeApplicationServerKey(encodeBase64Url(new Uint8Array(65)))).toThrow(MalformedKeyError);
  });
});
