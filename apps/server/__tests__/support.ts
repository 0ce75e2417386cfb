import { randomBytes } from 'node:crypto';

import { p256 } from '@noble/curves/p256';
import type { PushSubscriptionJSON } from '@relaypush/shared';
import { decryptNotification, encodeBase64Url, type PushRequest, type PushResponse } from '@relaypush/web-push';
import { vi } from 'vitest';

export interface Subscriber {
  json: PushSubscriptionJSON;
  privateKey: Uint8Array;
  publicKey: Uint8Array;
  authSecret: Uint8Array;
}

/**
 * A browser-side key pair and the subscription JSON it would post
 */
export function createSubscriber(endpoint: string): Subscriber {
  const privateKey = p256.utils.randomPrivateKey();
  const publicKey = p256.getPublicKey(privateKey, false);
  const authSecret = new Uint8Array(randomBytes(16));
  return {
    json: {
      endpoint,
      expirationTime: null,
      keys: { p256dh: encodeBase64Url(publicKey), auth: encodeBase64Url(authSecret) },
    },
    privateKey,
    publicKey,
    authSecret,
  };
}

export async function readNotification(subscriber: Subscriber, request: PushRequest): Promise<unknown> {
  const plaintext = await decryptNotification(
    request.body,
    subscriber.privateKey,
    subscriber.publicKey,
    subscriber.authSecret,
  );
  return JSON.parse(new TextDecoder().decode(plaintext));
}

/**
 * Transport answering each endpoint with the status configured for it, 201 otherwise
 */
export function fakeTransport(statuses: Record<string, number> = {}) {
  return vi.fn(async (endpoint: string, _request: PushRequest): Promise<PushResponse> => {
    const status = statuses[endpoint] ?? 201;
    return { status, text: async () => (status < 300 ? '' : 'rejected by test') };
  });
}

/**
 * The `k=` parameter of a VAPID Authorization header
 */
export function vapidKeyOf(request: PushRequest): string {
  const match = /, k=([A-Za-z0-9_-]+)$/.exec(request.headers.Authorization ?? '');
  if (!match) {
    throw new Error('request has no VAPID Authorization header');
  }
  return match[1];
}
