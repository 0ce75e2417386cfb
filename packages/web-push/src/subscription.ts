/**
 * Validation of browser push subscriptions.
 */

import { isPushSubscriptionJSON, type PushSubscriptionJSON } from '@relaypush/shared';

import { decodeBase64Url } from './base64';
import { InvalidSubscriptionError, MalformedKeyError, MalformedSecretError } from './errors';
import { AUTH_SECRET_LENGTH } from './encrypt';
import { assertUncompressedPoint } from './keys';

/**
 * A subscription whose keys have been decoded and checked. Instances are frozen.
 */
export interface Subscription {
  readonly endpoint: string;
  /**
   * User agent's uncompressed P-256 public key (65 bytes)
   */
  readonly clientPublicKey: Uint8Array;
  /**
   * 16-byte authentication secret
   */
  readonly clientAuthSecret: Uint8Array;
}

/**
 * Parse the output of `PushSubscription.toJSON()`, given as an object or a JSON string.
 * The endpoint scheme is checked when sending, not here.
 */
export function parseSubscription(input: PushSubscriptionJSON | string): Subscription {
  let value: unknown = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new InvalidSubscriptionError('Subscription is not valid JSON', { cause: error });
    }
  }
  if (!isPushSubscriptionJSON(value)) {
    throw new InvalidSubscriptionError('Subscription must have an endpoint and keys.p256dh / keys.auth');
  }
  if (value.endpoint.length === 0) {
    throw new InvalidSubscriptionError('Subscription endpoint is empty');
  }

  let clientPublicKey: Uint8Array;
  try {
    clientPublicKey = decodeBase64Url(value.keys.p256dh);
  } catch (error) {
    throw new MalformedKeyError('keys.p256dh is not valid base64url', { cause: error });
  }
  assertUncompressedPoint(clientPublicKey, 'keys.p256dh');

  let clientAuthSecret: Uint8Array;
  try {
    clientAuthSecret = decodeBase64Url(value.keys.auth);
  } catch (error) {
    throw new MalformedSecretError('keys.auth is not valid base64url', { cause: error });
  }
  if (clientAuthSecret.byteLength !== AUTH_SECRET_LENGTH) {
    throw new MalformedSecretError(
      `keys.auth must be ${AUTH_SECRET_LENGTH} bytes, got ${clientAuthSecret.byteLength}`,
    );
  }

  return Object.freeze({ endpoint: value.endpoint, clientPublicKey, clientAuthSecret });
}
